import { runTool } from "../exec.js";
import { logger } from "../logger.js";
import type { PlatformAdapter, WirelessInterface } from "./types.js";

/**
 * Windows platform adapter.
 * Uses netsh for wireless interface discovery; mode switching is unsupported.
 */
export class WindowsAdapter implements PlatformAdapter {
  readonly supportsWirelessControl = false;

  listInterfaces(): WirelessInterface[] {
    const result = runTool(["netsh", "wlan", "show", "interfaces"]);

    if (result.missing || result.exitCode !== 0) {
      logger.warn({ stderr: result.stderr }, "netsh could not list interfaces");
      return [];
    }

    return parseNetshInterfaces(result.stdout);
  }
}

/**
 * Parse `netsh wlan show interfaces` key/value blocks.
 * Windows adapters always report managed mode.
 */
export function parseNetshInterfaces(output: string): WirelessInterface[] {
  const interfaces: WirelessInterface[] = [];
  let current: WirelessInterface | null = null;

  for (const raw of output.split(/\r?\n/)) {
    const match = raw.match(/^\s*([^:]+?)\s*:\s*(.*)$/);
    if (!match) continue;

    const key = match[1]?.toLowerCase() ?? "";
    const value = match[2]?.trim() ?? "";

    if (key === "name" && value) {
      current = { name: value, mode: "managed" };
      interfaces.push(current);
    } else if (key === "physical address" && current && value) {
      current.hardwareAddress = value;
    }
  }

  return interfaces;
}
