import { EventEmitter } from "node:events";

/**
 * Shape of a spawnSync result with encoding "utf8".
 */
export interface FakeSpawnResult {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export function ok(stdout = "", stderr = ""): FakeSpawnResult {
  return { status: 0, stdout, stderr };
}

export function fail(status: number, stderr = "", stdout = ""): FakeSpawnResult {
  return { status, stdout, stderr };
}

export function notFound(command: string): FakeSpawnResult {
  const error = Object.assign(new Error(`spawnSync ${command} ENOENT`), {
    code: "ENOENT",
  });
  return { status: null, stdout: "", stderr: "", error };
}

export function permissionDenied(command: string): FakeSpawnResult {
  const error = Object.assign(new Error(`spawnSync ${command} EACCES`), {
    code: "EACCES",
  });
  return { status: null, stdout: "", stderr: "", error };
}

/**
 * spawnSync stand-in answering by full command line.
 * Unlisted commands behave as if the binary were missing.
 */
export function toolTable(table: Record<string, FakeSpawnResult>) {
  return (command: string, args: readonly string[] = []): FakeSpawnResult =>
    table[[command, ...args].join(" ")] ?? notFound(command);
}

/**
 * Command lines a spawnSync mock was called with.
 */
export function commandLines(calls: unknown[][]): string[] {
  return calls.map(([command, args]) =>
    [String(command), ...(Array.isArray(args) ? args.map(String) : [])].join(" "),
  );
}

/**
 * Minimal ChildProcess stand-in. SIGKILL always ends it; other signals
 * end it unless exitOnKill is false.
 */
export class FakeChild extends EventEmitter {
  pid = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly stderr = new EventEmitter();
  readonly kills: NodeJS.Signals[] = [];

  constructor(private readonly exitOnKill = true) {
    super();
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.kills.push(signal);
    if (this.exitOnKill || signal === "SIGKILL") this.finish(null, signal);
    return true;
  }

  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitCode !== null || this.signalCode !== null) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.emit("exit", code, signal);
  }
}
