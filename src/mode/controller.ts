import { isToolAvailable, runTool, toolOutput } from "../exec.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { PlatformAdapter } from "../platform/index.js";
import {
  parseMonitorStart,
  parseMonitorStop,
  type ModeSwitchOutcome,
} from "./airmon.js";

export type ModeStatus =
  | "confirmed"
  | "uncertain"
  | "failed"
  | "unavailable"
  | "unsupported";

export interface ModeChangeResult {
  /** Name the interface should now be reachable under. */
  interfaceName: string;
  status: ModeStatus;
  message: string;
}

export interface ModeControllerOptions {
  /** Restart NetworkManager after leaving monitor mode (check kill stops it). */
  restartNetworkManager?: boolean;
}

type Target = "monitor" | "managed";

const LABEL: Record<Target, string> = {
  monitor: "Monitor mode",
  managed: "Managed mode",
};

/**
 * Drives interfaces between managed and monitor mode with airmon-ng.
 * Every outcome, including tool errors, is returned as a status.
 */
export class ModeController {
  private readonly restartNetworkManager: boolean;

  constructor(
    private readonly platform: PlatformAdapter,
    options: ModeControllerOptions = {},
  ) {
    this.restartNetworkManager = options.restartNetworkManager ?? true;
  }

  enableMonitorMode(name: string): ModeChangeResult {
    try {
      const blocked = this.precheck(name);
      if (blocked) return blocked;

      const check = runTool(["airmon-ng", "check", "kill"]);
      if (check.exitCode !== 0) {
        logger.warn({ output: toolOutput(check) }, "airmon-ng check kill failed");
      }

      const result = runTool(["airmon-ng", "start", name]);
      if (result.missing) return this.unavailable(name);
      if (result.exitCode !== 0) {
        return this.failed(
          "monitor",
          name,
          toolOutput(result) || `exit code ${result.exitCode}`,
        );
      }

      const text = `${result.stdout}\n${result.stderr}`;
      return this.describe("monitor", name, parseMonitorStart(text, name), !text.trim());
    } catch (err) {
      logger.error({ err }, "enabling monitor mode failed");
      return {
        interfaceName: name,
        status: "failed",
        message: `Error enabling monitor mode: ${errorMessage(err)}`,
      };
    }
  }

  setManagedMode(name: string): ModeChangeResult {
    try {
      const blocked = this.precheck(name);
      if (blocked) return blocked;

      const result = runTool(["airmon-ng", "stop", name]);
      if (result.missing) return this.unavailable(name);
      if (result.exitCode !== 0) {
        return this.failed(
          "managed",
          name,
          toolOutput(result) || `exit code ${result.exitCode}`,
        );
      }

      const text = `${result.stdout}\n${result.stderr}`;
      const described = this.describe(
        "managed",
        name,
        parseMonitorStop(text, name),
        !text.trim(),
      );

      if (described.status !== "failed" && this.restartNetworkManager) {
        const nm = runTool(["service", "NetworkManager", "start"]);
        if (nm.missing || nm.exitCode !== 0) {
          logger.warn({ output: toolOutput(nm) }, "could not restart NetworkManager");
        }
      }

      return described;
    } catch (err) {
      logger.error({ err }, "setting managed mode failed");
      return {
        interfaceName: name,
        status: "failed",
        message: `Error setting managed mode: ${errorMessage(err)}`,
      };
    }
  }

  /**
   * Return every interface currently in monitor mode to managed mode.
   * A failure on one interface does not stop the others.
   */
  restoreAll(): ModeChangeResult[] {
    const monitors = this.platform
      .listInterfaces()
      .filter((iface) => iface.mode === "monitor");

    const results: ModeChangeResult[] = [];
    for (const iface of monitors) {
      try {
        results.push(this.setManagedMode(iface.name));
      } catch (err) {
        logger.error({ err, iface: iface.name }, "restoring managed mode failed");
        results.push({
          interfaceName: iface.name,
          status: "failed",
          message: `Error setting managed mode: ${errorMessage(err)}`,
        });
      }
    }
    return results;
  }

  private precheck(name: string): ModeChangeResult | null {
    if (!this.platform.supportsWirelessControl) {
      return {
        interfaceName: name,
        status: "unsupported",
        message: `Mode switching is only supported on Linux, not on ${process.platform}`,
      };
    }
    if (!isToolAvailable("airmon-ng")) {
      return this.unavailable(name);
    }
    return null;
  }

  private unavailable(name: string): ModeChangeResult {
    return {
      interfaceName: name,
      status: "unavailable",
      message:
        "airmon-ng is not installed. Install the aircrack-ng suite (sudo apt-get install aircrack-ng).",
    };
  }

  private failed(target: Target, name: string, reason: string): ModeChangeResult {
    return {
      interfaceName: name,
      status: "failed",
      message: `Failed to set ${target} mode on ${name}: ${reason}`,
    };
  }

  private describe(
    target: Target,
    name: string,
    outcome: ModeSwitchOutcome,
    silent: boolean,
  ): ModeChangeResult {
    switch (outcome.kind) {
      case "confirmed": {
        const renamed =
          outcome.interfaceName !== name ? ` (was ${name})` : "";
        return {
          interfaceName: outcome.interfaceName,
          status: "confirmed",
          message: `${LABEL[target]} enabled on ${outcome.interfaceName}${renamed}`,
        };
      }
      case "uncertain":
        return {
          interfaceName: outcome.interfaceName,
          status: "uncertain",
          message: silent
            ? `Command executed successfully, but airmon-ng printed nothing. Verify the mode of ${name} with 'interface list'.`
            : `${LABEL[target]} may be enabled on ${name}, but airmon-ng did not confirm it. Verify with 'interface list'.`,
        };
      case "failed":
        return this.failed(target, name, outcome.reason);
    }
  }
}
