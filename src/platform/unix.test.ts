import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { commandLines, fail, ok, permissionDenied, toolTable } from "../testing.js";

const { mockSpawnSync } = vi.hoisted(() => ({ mockSpawnSync: vi.fn() }));
vi.mock("node:child_process", () => ({ spawnSync: mockSpawnSync }));

import { UnixAdapter, parseIpLink, parseIwDev } from "./unix.js";

const iwOutput = `phy#1
	Interface wlan1
		ifindex 5
		wdev 0x100000001
		addr aa:bb:cc:dd:ee:ff
		type managed
phy#0
	Interface wlan0mon
		ifindex 4
		wdev 0x1
		addr 00:11:22:33:44:55
		type monitor
		channel 6 (2437 MHz), width: 20 MHz (no HT), center1: 2437 MHz
`;

const ipOutput = [
  "1: lo: <LOOPBACK,UP,LOWER_UP> mtu 65536 qdisc noqueue state UNKNOWN mode DEFAULT group default qlen 1000\\    link/loopback 00:00:00:00:00:00 brd 00:00:00:00:00:00",
  "2: eth0: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 qdisc fq_codel state UP mode DEFAULT group default qlen 1000\\    link/ether 52:54:00:12:34:56 brd ff:ff:ff:ff:ff:ff",
  "3: wlan0: <BROADCAST,MULTICAST> mtu 1500 qdisc noop state DOWN mode DORMANT group default qlen 1000\\    link/ether 00:11:22:33:44:55 brd ff:ff:ff:ff:ff:ff",
  "4: wlan1mon: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 qdisc mq state UNKNOWN mode DEFAULT group default qlen 1000\\    link/ieee802.11/radiotap aa:bb:cc:dd:ee:ff brd ff:ff:ff:ff:ff:ff",
].join("\n");

describe("UnixAdapter", () => {
  let adapter: UnixAdapter;

  beforeEach(() => {
    adapter = new UnixAdapter();
    mockSpawnSync.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("listInterfaces", () => {
    it("lists interfaces from iw dev with their modes", () => {
      mockSpawnSync.mockImplementation(toolTable({ "iw dev": ok(iwOutput) }));

      expect(adapter.listInterfaces()).toEqual([
        { name: "wlan1", hardwareAddress: "aa:bb:cc:dd:ee:ff", mode: "managed" },
        { name: "wlan0mon", hardwareAddress: "00:11:22:33:44:55", mode: "monitor" },
      ]);
    });

    it("prefers the current address reported by macchanger", () => {
      mockSpawnSync.mockImplementation(
        toolTable({
          "iw dev": ok(iwOutput),
          "macchanger -s wlan1": ok(
            "Current MAC:   02:de:ad:be:ef:01 (unknown)\nPermanent MAC: aa:bb:cc:dd:ee:ff (Example Corp)\n",
          ),
        }),
      );

      const [first] = adapter.listInterfaces();

      expect(first).toEqual({
        name: "wlan1",
        hardwareAddress: "02:de:ad:be:ef:01",
        mode: "managed",
      });
    });

    it("falls back to ip link for the address", () => {
      mockSpawnSync.mockImplementation(
        toolTable({
          "iw dev": ok("phy#0\n\tInterface wlan0\n\t\ttype managed\n"),
          "ip link show wlan0": ok(
            "3: wlan0: <BROADCAST,MULTICAST> mtu 1500\n    link/ether 00:11:22:33:44:55 brd ff:ff:ff:ff:ff:ff\n",
          ),
        }),
      );

      expect(adapter.listInterfaces()).toEqual([
        { name: "wlan0", hardwareAddress: "00:11:22:33:44:55", mode: "managed" },
      ]);
    });

    it("omits the address when nothing reports one", () => {
      mockSpawnSync.mockImplementation(
        toolTable({ "iw dev": ok("phy#0\n\tInterface wlan0\n\t\ttype managed\n") }),
      );

      expect(adapter.listInterfaces()).toEqual([{ name: "wlan0", mode: "managed" }]);
    });

    it("falls back to ip link when iw is missing", () => {
      mockSpawnSync.mockImplementation(
        toolTable({ "ip -o link show": ok(ipOutput) }),
      );

      expect(adapter.listInterfaces()).toEqual([
        { name: "wlan0", hardwareAddress: "00:11:22:33:44:55", mode: "unknown" },
        { name: "wlan1mon", hardwareAddress: "aa:bb:cc:dd:ee:ff", mode: "monitor" },
      ]);
      expect(commandLines(mockSpawnSync.mock.calls).slice(0, 2)).toEqual([
        "iw dev",
        "ip -o link show",
      ]);
    });

    it("falls back to ip link when iw fails", () => {
      mockSpawnSync.mockImplementation(
        toolTable({
          "iw dev": fail(1, "nl80211 not found."),
          "ip -o link show": ok(ipOutput),
        }),
      );

      expect(adapter.listInterfaces().map((i) => i.name)).toEqual([
        "wlan0",
        "wlan1mon",
      ]);
    });

    it("returns empty array when every tool is denied", () => {
      mockSpawnSync.mockImplementation((command: string) => permissionDenied(command));

      expect(adapter.listInterfaces()).toEqual([]);
      expect(commandLines(mockSpawnSync.mock.calls)).toEqual([
        "iw dev",
        "ip -o link show",
      ]);
    });

    it("skips address lookups that are denied", () => {
      mockSpawnSync.mockImplementation(
        toolTable({
          "iw dev": ok(iwOutput),
          "macchanger -s wlan1": permissionDenied("macchanger"),
          "ip link show wlan1": permissionDenied("ip"),
        }),
      );

      expect(adapter.listInterfaces()[0]).toEqual({
        name: "wlan1",
        hardwareAddress: "aa:bb:cc:dd:ee:ff",
        mode: "managed",
      });
    });

    it("returns empty array when no tool can list interfaces", () => {
      mockSpawnSync.mockImplementation(toolTable({}));

      expect(adapter.listInterfaces()).toEqual([]);
    });
  });
});

describe("parseIwDev", () => {
  it("reads name, mode and address per interface", () => {
    expect(parseIwDev(iwOutput)).toEqual([
      { name: "wlan1", mode: "managed", addr: "aa:bb:cc:dd:ee:ff" },
      { name: "wlan0mon", mode: "monitor", addr: "00:11:22:33:44:55" },
    ]);
  });

  it("maps other interface types to unknown", () => {
    expect(parseIwDev("\tInterface wlan0\n\t\ttype AP\n")).toEqual([
      { name: "wlan0", mode: "unknown" },
    ]);
  });

  it("keeps the first entry for a repeated name", () => {
    const output = "\tInterface wlan0\n\t\ttype managed\n\tInterface wlan0\n\t\ttype monitor\n";

    expect(parseIwDev(output)).toEqual([{ name: "wlan0", mode: "managed" }]);
  });

  it("returns empty array for empty output", () => {
    expect(parseIwDev("")).toEqual([]);
  });
});

describe("parseIpLink", () => {
  it("keeps wireless-looking names only", () => {
    expect(parseIpLink(ipOutput).map((e) => e.name)).toEqual(["wlan0", "wlan1mon"]);
  });

  it("marks radiotap links as monitor mode", () => {
    expect(parseIpLink(ipOutput)[1]).toEqual({
      name: "wlan1mon",
      mode: "monitor",
      addr: "aa:bb:cc:dd:ee:ff",
    });
  });

  it("strips the parent suffix from vlan style names", () => {
    expect(parseIpLink("7: wlan0@phy0: <BROADCAST> mtu 1500")).toEqual([
      { name: "wlan0", mode: "unknown" },
    ]);
  });
});
