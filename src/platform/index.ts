import type { PlatformAdapter } from "./types.js";
import { UnixAdapter } from "./unix.js";
import { WindowsAdapter } from "./windows.js";

export type {
  InterfaceMode,
  PlatformAdapter,
  WirelessInterface,
} from "./types.js";

/**
 * Get the platform-specific adapter for the current OS.
 */
export function getAdapter(): PlatformAdapter {
  if (process.platform === "win32") {
    return new WindowsAdapter();
  }
  // Linux and the other Unixes share the iw/ip based adapter
  return new UnixAdapter();
}
