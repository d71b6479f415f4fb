import { runTool } from "../exec.js";
import { logger } from "../logger.js";
import type {
  InterfaceMode,
  PlatformAdapter,
  WirelessInterface,
} from "./types.js";

const WIRELESS_NAME = /wlan|wl|mon|wifi|ath/i;
const MAC = /([0-9a-f]{2}(?::[0-9a-f]{2}){5})/i;

/**
 * Raw discovery entry before hardware address resolution.
 */
export interface IwEntry {
  name: string;
  mode: InterfaceMode;
  addr?: string;
}

/**
 * Unix (Linux) platform adapter.
 * Uses iw with an ip-link fallback for interface discovery.
 */
export class UnixAdapter implements PlatformAdapter {
  readonly supportsWirelessControl = process.platform === "linux";

  /**
   * Discover wireless interfaces.
   * Tries iw first, falls back to ip link filtered by name.
   */
  listInterfaces(): WirelessInterface[] {
    let entries = this.tryIw();
    if (entries.length === 0) {
      entries = this.tryIpLink();
    }

    return entries.map((entry) => {
      const hardwareAddress = this.resolveHardwareAddress(entry.name) ?? entry.addr;
      return hardwareAddress
        ? { name: entry.name, hardwareAddress, mode: entry.mode }
        : { name: entry.name, mode: entry.mode };
    });
  }

  /**
   * Query `iw dev`. Returns [] when iw is missing or fails.
   */
  private tryIw(): IwEntry[] {
    const result = runTool(["iw", "dev"]);
    if (result.missing || result.exitCode !== 0) {
      logger.debug({ stderr: result.stderr }, "iw dev unavailable");
      return [];
    }
    return parseIwDev(result.stdout);
  }

  /**
   * Query `ip -o link show` and keep wireless-looking names.
   */
  private tryIpLink(): IwEntry[] {
    const result = runTool(["ip", "-o", "link", "show"]);
    if (result.missing || result.exitCode !== 0) {
      logger.warn("neither iw nor ip could list interfaces");
      return [];
    }
    return parseIpLink(result.stdout);
  }

  /**
   * Resolve a hardware address via macchanger, then ip link.
   */
  private resolveHardwareAddress(name: string): string | undefined {
    const macchanger = runTool(["macchanger", "-s", name]);
    if (!macchanger.missing && macchanger.exitCode === 0) {
      const match = macchanger.stdout.match(/Current MAC:\s+([0-9a-f:]{17})/i);
      if (match?.[1]) return match[1];
    }

    const ip = runTool(["ip", "link", "show", name]);
    if (!ip.missing && ip.exitCode === 0) {
      const match = ip.stdout.match(
        /link\/(?:ether|ieee802\.11\S*)\s+([0-9a-f:]{17})/i,
      );
      if (match?.[1]) return match[1];
    }

    return undefined;
  }
}

/**
 * Parse `iw dev` output.
 *
 * ```
 * phy#0
 *         Interface wlan0
 *                 addr 00:11:22:33:44:55
 *                 type managed
 * ```
 */
export function parseIwDev(output: string): IwEntry[] {
  const entries: IwEntry[] = [];
  let current: IwEntry | null = null;

  for (const raw of output.split("\n")) {
    const line = raw.trim();
    if (!line) continue;

    const ifaceMatch = line.match(/^Interface\s+(\S+)$/);
    if (ifaceMatch?.[1]) {
      current = { name: ifaceMatch[1], mode: "unknown" };
      entries.push(current);
      continue;
    }

    if (!current) continue;

    const typeMatch = line.match(/^type\s+(\S+)/);
    if (typeMatch?.[1]) {
      current.mode = toMode(typeMatch[1]);
      continue;
    }

    const addrMatch = line.match(/^addr\s+(\S+)/);
    if (addrMatch?.[1] && MAC.test(addrMatch[1])) {
      current.addr = addrMatch[1];
    }
  }

  return dedupe(entries);
}

/**
 * Parse `ip -o link show` output.
 * Example: 3: wlan0: <BROADCAST,MULTICAST> mtu 1500 ... link/ether 00:11:22:33:44:55 brd ...
 */
export function parseIpLink(output: string): IwEntry[] {
  const entries: IwEntry[] = [];

  for (const line of output.split("\n")) {
    const nameMatch = line.match(/^\d+:\s+([^:@\s]+)/);
    const name = nameMatch?.[1];
    if (!name || !WIRELESS_NAME.test(name)) continue;

    const mode: InterfaceMode = line.includes("link/ieee802.11/radiotap")
      ? "monitor"
      : "unknown";

    const addrMatch = line.match(/link\/\S+\s+([0-9a-f:]{17})/i);
    entries.push(
      addrMatch?.[1] ? { name, mode, addr: addrMatch[1] } : { name, mode },
    );
  }

  return dedupe(entries);
}

function toMode(type: string): InterfaceMode {
  switch (type.toLowerCase()) {
    case "managed":
      return "managed";
    case "monitor":
      return "monitor";
    default:
      return "unknown";
  }
}

function dedupe(entries: IwEntry[]): IwEntry[] {
  const seen = new Set<string>();
  return entries.filter((e) => {
    if (seen.has(e.name)) return false;
    seen.add(e.name);
    return true;
  });
}
