import path from "node:path";
import type { Level } from "pino";
import { isLogLevel, logger } from "./logger.js";

export interface Config {
  captureDir: string;
  assumeYes: boolean;
  deauthCount: number;
  restartNetworkManager: boolean;
  logLevel: Level;
}

/**
 * Subset of CLI flags that feed configuration.
 */
export interface ConfigFlags {
  captureDir?: string | undefined;
  yes?: boolean | undefined;
  deauthCount?: number | undefined;
  restartNetworkManager?: boolean | undefined;
  verbose?: boolean | undefined;
}

export const DEFAULT_DEAUTH_COUNT = 10;

/**
 * Merge flags over environment over defaults.
 */
export function loadConfig(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const captureDir = path.resolve(
    flags.captureDir ?? env.AIRHOUND_CAPTURE_DIR ?? "captures",
  );

  let deauthCount = DEFAULT_DEAUTH_COUNT;
  const rawCount = flags.deauthCount ?? env.AIRHOUND_DEAUTH_COUNT;
  if (rawCount !== undefined) {
    const parsed = typeof rawCount === "number" ? rawCount : Number(rawCount);
    if (Number.isInteger(parsed) && parsed >= 0) {
      deauthCount = parsed;
    } else {
      logger.warn({ value: rawCount }, "ignoring invalid deauth count");
    }
  }

  let logLevel: Level = "warn";
  const rawLevel = env.AIRHOUND_LOG_LEVEL?.toLowerCase();
  if (rawLevel) {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      logger.warn({ value: rawLevel }, "ignoring invalid log level");
    }
  }
  if (flags.verbose) logLevel = "debug";

  return {
    captureDir,
    assumeYes: flags.yes === true || env.AIRHOUND_ASSUME_YES === "1",
    deauthCount,
    restartNetworkManager: flags.restartNetworkManager ?? true,
    logLevel,
  };
}
