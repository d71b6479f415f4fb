export type InterfaceMode = "managed" | "monitor" | "unknown";

/**
 * A wireless adapter as reported by one discovery call.
 * The name is not stable across mode switches.
 */
export interface WirelessInterface {
  name: string;
  hardwareAddress?: string;
  mode: InterfaceMode;
}

/**
 * Platform-specific adapter interface.
 * Implementations exist for Unix (Linux) and Windows.
 */
export interface PlatformAdapter {
  /**
   * Whether mode switching and MAC changes are available on this platform.
   */
  readonly supportsWirelessControl: boolean;

  /**
   * Discover wireless interfaces. Never throws; returns [] on failure.
   */
  listInterfaces(): WirelessInterface[];
}
