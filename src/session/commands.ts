import path from "node:path";

export type Argv = [command: string, ...args: string[]];

/** Client argument that means "every station on the access point". */
export const BROADCAST_SENTINEL = "broadcast";
export const BROADCAST_ADDRESS = "FF:FF:FF:FF:FF:FF";

/**
 * Capture file prefix for a target access point.
 * airodump-ng appends -01.cap, -02.cap, ... to it.
 */
export function captureFilePrefix(captureDir: string, bssid: string): string {
  return path.join(
    captureDir,
    `capture_${bssid.replace(/[:-]/g, "").toUpperCase()}`,
  );
}

export function resolveClient(clientMac: string): string {
  return clientMac.toLowerCase() === BROADCAST_SENTINEL
    ? BROADCAST_ADDRESS
    : clientMac;
}

export function buildCaptureArgs(
  interfaceName: string,
  bssid: string,
  channel: string,
  prefix: string,
): Argv {
  return [
    "airodump-ng",
    "-c",
    channel,
    "--bssid",
    bssid,
    "-w",
    prefix,
    interfaceName,
  ];
}

/**
 * aireplay-ng deauthentication run. A count of 0 never stops on its own.
 */
export function buildDeauthArgs(
  interfaceName: string,
  bssid: string,
  clientMac: string,
  count: number,
): Argv {
  return [
    "aireplay-ng",
    "-0",
    String(count),
    "-a",
    bssid,
    "-c",
    resolveClient(clientMac),
    interfaceName,
  ];
}

export function buildScanArgs(interfaceName: string): Argv {
  return ["airodump-ng", interfaceName];
}
