import { spawnSync, type SpawnSyncReturns } from "node:child_process";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";

/**
 * Result of a synchronous external tool invocation.
 */
export interface ToolResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** The binary could not be found (ENOENT or shell exit 127). */
  missing: boolean;
}

/**
 * Run an external tool and collect its output. Never throws: a binary that
 * cannot be found is `missing`, any other spawn error is a failed result
 * with the error message in stderr.
 */
export function runTool(argv: string[]): ToolResult {
  const [command, ...args] = argv;
  if (!command) {
    return { exitCode: null, stdout: "", stderr: "", missing: true };
  }

  logger.debug({ argv }, "running tool");

  let proc: SpawnSyncReturns<string>;
  try {
    proc = spawnSync(command, args, { encoding: "utf8" });
  } catch (err) {
    return spawnFailed(argv, err);
  }

  if (proc.error) {
    const err = proc.error;
    if ("code" in err && err.code === "ENOENT") {
      return { exitCode: null, stdout: "", stderr: "", missing: true };
    }
    return spawnFailed(argv, err);
  }

  const stdout = proc.stdout ?? "";
  const stderr = proc.stderr ?? "";

  if (proc.status === 127 || stderr.includes("command not found")) {
    return { exitCode: proc.status, stdout, stderr, missing: true };
  }

  return { exitCode: proc.status, stdout, stderr, missing: false };
}

/**
 * Check whether a tool is on PATH.
 */
export function isToolAvailable(tool: string): boolean {
  const result = runTool(["which", tool]);
  return !result.missing && result.exitCode === 0;
}

/**
 * Combined text of a tool run, stderr preferred when the tool failed.
 */
export function toolOutput(result: ToolResult): string {
  if (result.exitCode !== 0 && result.stderr.trim()) {
    return result.stderr.trim();
  }
  return (result.stdout || result.stderr).trim();
}

function spawnFailed(argv: string[], err: unknown): ToolResult {
  logger.warn({ err, argv }, "could not run tool");
  return { exitCode: null, stdout: "", stderr: errorMessage(err), missing: false };
}
