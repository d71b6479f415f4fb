import { isToolAvailable, runTool, toolOutput } from "../exec.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { PlatformAdapter } from "../platform/index.js";

export type MacStrategy =
  | "random"
  | "vendor"
  | "any-vendor"
  | "permanent"
  | { address: string };

export type MacStatus =
  | "changed"
  | "shown"
  | "uncertain"
  | "failed"
  | "unavailable"
  | "unsupported";

export interface MacResult {
  status: MacStatus;
  message: string;
  address?: string;
}

export interface MacchangerReport {
  current: string | null;
  permanent: string | null;
  next: string | null;
}

const NAMED: Record<Exclude<MacStrategy, { address: string }>, { flag: string; label: string }> = {
  random: { flag: "-r", label: "fully random" },
  vendor: { flag: "-a", label: "same vendor random" },
  "any-vendor": { flag: "-A", label: "random vendor" },
  permanent: { flag: "-p", label: "permanent (original)" },
};

/**
 * Parse the "Current/Permanent/New MAC:" lines macchanger prints.
 */
export function parseMacchanger(output: string): MacchangerReport {
  const find = (label: string) =>
    output.match(new RegExp(`${label} MAC:\\s+([0-9a-f:]{17})`, "i"))?.[1] ?? null;

  return {
    current: find("Current"),
    permanent: find("Permanent"),
    next: find("New"),
  };
}

/**
 * Changes and reports hardware addresses with macchanger.
 */
export class MacChanger {
  constructor(private readonly platform: PlatformAdapter) {}

  changeMac(name: string, strategy: MacStrategy = "random"): MacResult {
    const blocked = this.precheck();
    if (blocked) return blocked;

    const { flags, label } =
      typeof strategy === "string"
        ? { flags: [NAMED[strategy].flag], label: NAMED[strategy].label }
        : { flags: ["-m", strategy.address], label: `specific (${strategy.address})` };

    try {
      this.setLink(name, "down");
      const result = runTool(["macchanger", ...flags, name]);

      if (result.exitCode !== 0) {
        return {
          status: "failed",
          message: `macchanger failed on ${name}: ${toolOutput(result) || `exit code ${result.exitCode}`}`,
        };
      }

      const report = parseMacchanger(result.stdout);
      if (!report.next) {
        return {
          status: "uncertain",
          message: `Could not confirm the new MAC address of ${name}. Verify with 'macchanger show ${name}'.`,
        };
      }

      return {
        status: "changed",
        message: `MAC address of ${name} changed to ${report.next} (${label})`,
        address: report.next,
      };
    } catch (err) {
      logger.error({ err }, "changing MAC address failed");
      return {
        status: "failed",
        message: `Error changing MAC address: ${errorMessage(err)}`,
      };
    } finally {
      // The link must come back up even when macchanger failed.
      this.setLink(name, "up");
    }
  }

  showMac(name: string): MacResult {
    const blocked = this.precheck();
    if (blocked) return blocked;

    const result = runTool(["macchanger", "-s", name]);
    if (result.exitCode !== 0) {
      return {
        status: "failed",
        message: `macchanger failed on ${name}: ${toolOutput(result) || `exit code ${result.exitCode}`}`,
      };
    }

    const report = parseMacchanger(result.stdout);
    if (!report.current) {
      return {
        status: "uncertain",
        message: `Could not read the MAC address of ${name}.`,
      };
    }

    const lines = [`Current MAC:   ${report.current}`];
    if (report.permanent) {
      const changed = report.permanent.toLowerCase() !== report.current.toLowerCase();
      lines.push(`Permanent MAC: ${report.permanent}${changed ? " (changed)" : ""}`);
    }

    return { status: "shown", message: lines.join("\n"), address: report.current };
  }

  private precheck(): MacResult | null {
    if (!this.platform.supportsWirelessControl) {
      return {
        status: "unsupported",
        message: `Changing MAC addresses is only supported on Linux, not on ${process.platform}`,
      };
    }
    if (!isToolAvailable("macchanger")) {
      return {
        status: "unavailable",
        message: "macchanger is not installed. Install with: sudo apt-get install macchanger",
      };
    }
    return null;
  }

  private setLink(name: string, state: "up" | "down"): void {
    const result = runTool(["ip", "link", "set", name, state]);
    if (result.exitCode !== 0) {
      logger.warn({ output: toolOutput(result), name }, `could not bring link ${state}`);
    }
  }
}
