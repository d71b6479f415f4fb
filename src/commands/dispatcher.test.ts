import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import os from "node:os";
import { MacChanger } from "../mac/changer.js";
import { ModeController } from "../mode/controller.js";
import type { PlatformAdapter, WirelessInterface } from "../platform/index.js";
import { SessionController } from "../session/controller.js";
import { KeywordAdvisor } from "./advisor.js";
import { CommandDispatcher, formatInterfaces } from "./dispatcher.js";
import { HELP_TEXT, USAGE } from "./parser.js";

const BSSID = "AA:BB:CC:DD:EE:FF";

describe("CommandDispatcher", () => {
  let interfaces: WirelessInterface[];
  let adapter: PlatformAdapter;
  let modes: ModeController;
  let sessions: SessionController;
  let mac: MacChanger;
  let output: { show: ReturnType<typeof vi.fn> };
  let confirm: ReturnType<typeof vi.fn>;
  let assumeYes: boolean;

  function dispatcher(): CommandDispatcher {
    return new CommandDispatcher({
      adapter,
      modes,
      sessions,
      mac,
      output,
      advisor: new KeywordAdvisor(),
      confirm,
      config: { assumeYes, deauthCount: 7 },
    });
  }

  beforeEach(() => {
    interfaces = [
      { name: "wlan0", hardwareAddress: "00:11:22:33:44:55", mode: "managed" },
    ];
    adapter = { supportsWirelessControl: true, listInterfaces: () => interfaces };
    modes = new ModeController(adapter);
    sessions = new SessionController({ captureDir: os.tmpdir() });
    mac = new MacChanger(adapter);
    output = { show: vi.fn() };
    confirm = vi.fn().mockResolvedValue(true);
    assumeYes = false;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("handle", () => {
    it("ignores blank lines", async () => {
      await expect(dispatcher().handle("   ")).resolves.toEqual({
        exit: false,
        title: "",
        text: "",
      });
      expect(output.show).not.toHaveBeenCalled();
    });

    it("shows parse errors with usage", async () => {
      const result = await dispatcher().handle("interface monitor");

      expect(result).toEqual({
        exit: false,
        title: "Invalid command",
        text: `Error: missing parameter iface\nUsage: ${USAGE.interface}`,
      });
      expect(output.show).toHaveBeenCalledOnce();
      expect(output.show).toHaveBeenCalledWith(result.text, "Invalid command");
    });

    it("signals exit without a message", async () => {
      await expect(dispatcher().handle("exit")).resolves.toEqual({
        exit: true,
        title: "",
        text: "",
      });
      expect(output.show).not.toHaveBeenCalled();
    });

    it("lists interfaces", async () => {
      const result = await dispatcher().handle("interface list");

      expect(result.text).toBe("wlan0        │ managed │ 00:11:22:33:44:55");
      expect(output.show).toHaveBeenCalledWith(result.text, "Listing wireless interfaces");
    });

    it("enables monitor mode", async () => {
      const enable = vi.spyOn(modes, "enableMonitorMode").mockReturnValue({
        interfaceName: "wlan0mon",
        status: "confirmed",
        message: "Monitor mode enabled on wlan0mon (was wlan0)",
      });

      await dispatcher().handle("interface monitor wlan0");

      expect(enable).toHaveBeenCalledWith("wlan0");
      expect(output.show).toHaveBeenCalledWith(
        "Monitor mode enabled on wlan0mon (was wlan0)",
        "Enabling monitor mode on wireless interface",
      );
    });

    it("sets managed mode", async () => {
      const managed = vi.spyOn(modes, "setManagedMode").mockReturnValue({
        interfaceName: "wlan0",
        status: "confirmed",
        message: "Managed mode enabled on wlan0 (was wlan0mon)",
      });

      const result = await dispatcher().handle("interface managed wlan0mon");

      expect(managed).toHaveBeenCalledWith("wlan0mon");
      expect(result.text).toBe("Managed mode enabled on wlan0 (was wlan0mon)");
    });
  });

  describe("monitor mode gate", () => {
    it("asks before switching, then captures on the new interface", async () => {
      vi.spyOn(modes, "enableMonitorMode").mockReturnValue({
        interfaceName: "wlan0mon",
        status: "confirmed",
        message: "Monitor mode enabled on wlan0mon (was wlan0)",
      });
      const start = vi.spyOn(sessions, "startCapture").mockReturnValue({
        status: "started",
        message: "Capture started.",
        targetFile: "/tmp/capture_AABBCCDDEEFF",
      });

      const result = await dispatcher().handle(`capture start wlan0 ${BSSID} 6`);

      expect(confirm).toHaveBeenCalledWith(
        "wlan0 is not in monitor mode (mode: managed). Enable monitor mode now?",
      );
      expect(start).toHaveBeenCalledWith("wlan0mon", BSSID, "6");
      expect(result.text).toBe(
        "Monitor mode enabled on wlan0mon (was wlan0)\nCapture started.",
      );
      expect(output.show).toHaveBeenCalledOnce();
    });

    it("cancels when the user declines", async () => {
      confirm.mockResolvedValue(false);
      const enable = vi.spyOn(modes, "enableMonitorMode");
      const start = vi.spyOn(sessions, "startCapture");

      const result = await dispatcher().handle(`capture start wlan0 ${BSSID} 6`);

      expect(result.text).toBe(
        "Cancelled: wlan0 is not in monitor mode. Run 'interface monitor wlan0' first.",
      );
      expect(enable).not.toHaveBeenCalled();
      expect(start).not.toHaveBeenCalled();
    });

    it("does not ask when assumeYes is set", async () => {
      assumeYes = true;
      vi.spyOn(modes, "enableMonitorMode").mockReturnValue({
        interfaceName: "wlan0mon",
        status: "uncertain",
        message: "Monitor mode may be enabled on wlan0.",
      });
      const scan = vi
        .spyOn(sessions, "scan")
        .mockResolvedValue({ status: "completed", message: "Scan finished." });

      const result = await dispatcher().handle("scan networks wlan0");

      expect(confirm).not.toHaveBeenCalled();
      expect(scan).toHaveBeenCalledWith("wlan0mon");
      expect(result.text).toBe("Monitor mode may be enabled on wlan0.\nScan finished.");
    });

    it("skips the question for an interface already in monitor mode", async () => {
      interfaces = [{ name: "wlan0mon", mode: "monitor" }];
      const attack = vi.spyOn(sessions, "startAttack").mockResolvedValue({
        status: "completed",
        message: "Deauthentication finished.",
      });

      const result = await dispatcher().handle(`attack deauth wlan0mon ${BSSID}`);

      expect(confirm).not.toHaveBeenCalled();
      expect(attack).toHaveBeenCalledWith("wlan0mon", BSSID, "broadcast", 7);
      expect(result).toEqual({
        exit: false,
        title: "Performing deauthentication attack",
        text: "Deauthentication finished.",
      });
    });

    it("names an interface that does not exist", async () => {
      confirm.mockResolvedValue(false);

      await dispatcher().handle("scan networks wlan5");

      expect(confirm).toHaveBeenCalledWith(
        "wlan5 is not in monitor mode (not found). Enable monitor mode now?",
      );
    });

    it("stops when the switch fails", async () => {
      vi.spyOn(modes, "enableMonitorMode").mockReturnValue({
        interfaceName: "wlan0",
        status: "unavailable",
        message: "airmon-ng is not installed.",
      });
      const attack = vi.spyOn(sessions, "startAttack");

      const result = await dispatcher().handle(`attack deauth wlan0 ${BSSID}`);

      expect(result.text).toBe("airmon-ng is not installed.");
      expect(attack).not.toHaveBeenCalled();
    });

    it("rejects a second capture before offering a mode switch", async () => {
      vi.spyOn(sessions, "isCapturing").mockReturnValue(true);
      const enable = vi.spyOn(modes, "enableMonitorMode");
      vi.spyOn(sessions, "startCapture").mockReturnValue({
        status: "already-active",
        message: "A capture session is already active.",
      });

      const result = await dispatcher().handle(`capture start wlan0 ${BSSID} 6`);

      expect(result.text).toBe("A capture session is already active.");
      expect(confirm).not.toHaveBeenCalled();
      expect(enable).not.toHaveBeenCalled();
    });
  });

  describe("session commands", () => {
    it("stops the capture", async () => {
      const result = await dispatcher().handle("capture stop");

      expect(result).toEqual({
        exit: false,
        title: "Stopping packet capture",
        text: "No active capture session.",
      });
    });

    it("reports capture status", async () => {
      const result = await dispatcher().handle("capture status");

      expect(result.text).toBe("No active capture session.");
      expect(result.title).toBe("Checking the packet capture session");
    });
  });

  describe("macchanger", () => {
    it("passes named strategies through", async () => {
      const change = vi
        .spyOn(mac, "changeMac")
        .mockReturnValue({ status: "changed", message: "changed" });

      await dispatcher().handle("macchanger wlan0 vendor");

      expect(change).toHaveBeenCalledWith("wlan0", "vendor");
    });

    it("wraps an explicit address", async () => {
      const change = vi
        .spyOn(mac, "changeMac")
        .mockReturnValue({ status: "changed", message: "changed" });

      await dispatcher().handle("macchanger wlan0 02:aa:bb:cc:dd:ee");

      expect(change).toHaveBeenCalledWith("wlan0", { address: "02:aa:bb:cc:dd:ee" });
    });

    it("shows the address", async () => {
      const show = vi
        .spyOn(mac, "showMac")
        .mockReturnValue({ status: "shown", message: "Current MAC:   00:11:22:33:44:55" });

      const result = await dispatcher().handle("macchanger show wlan0");

      expect(show).toHaveBeenCalledWith("wlan0");
      expect(result.title).toBe("Showing the interface MAC address");
    });
  });

  describe("other commands", () => {
    it("shows help", async () => {
      await expect(dispatcher().handle("help")).resolves.toEqual({
        exit: false,
        title: "Help",
        text: HELP_TEXT,
      });
    });

    it("reports the database as unavailable", async () => {
      await expect(dispatcher().handle("db list")).resolves.toEqual({
        exit: false,
        title: "Database",
        text: "The network database is not available in this build.",
      });
    });

    it("answers free text with advice based on the previous output", async () => {
      const result = await dispatcher().handle(
        "what about a scan",
        "Monitor mode enabled on wlan1mon (was wlan1)",
      );

      expect(result).toEqual({
        exit: false,
        title: "Suggestion",
        text: "Survey nearby access points: 'scan networks wlan1mon' (Ctrl+C to stop).",
      });
    });

    it("reports unknown commands", async () => {
      await expect(dispatcher().handle("frobnicate now")).resolves.toEqual({
        exit: false,
        title: "Unknown command",
        text: "Unknown command 'frobnicate'. Type 'help' for the list of commands.",
      });
    });
  });
});

describe("formatInterfaces", () => {
  it("aligns names and modes", () => {
    expect(
      formatInterfaces([
        { name: "wlan0", hardwareAddress: "00:11:22:33:44:55", mode: "managed" },
        { name: "wlan1mon", mode: "monitor" },
      ]),
    ).toBe(
      "wlan0        │ managed │ 00:11:22:33:44:55\nwlan1mon     │ monitor │ unknown",
    );
  });

  it("says when nothing was found", () => {
    expect(formatInterfaces([])).toBe("No wireless interfaces found.");
  });
});
