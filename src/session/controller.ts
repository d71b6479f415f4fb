import { spawn, type ChildProcess } from "node:child_process";
import { mkdirSync } from "node:fs";
import { isToolAvailable } from "../exec.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import {
  buildCaptureArgs,
  buildDeauthArgs,
  buildScanArgs,
  captureFilePrefix,
  resolveClient,
  type Argv,
} from "./commands.js";

export type SessionKind = "capture" | "attack" | "scan";

/**
 * A supervised child process. Only SessionController signals it.
 */
export interface Session {
  kind: SessionKind;
  interfaceName: string;
  bssid: string | null;
  targetFile: string | null;
  startedAt: Date;
  child: ChildProcess;
}

export type SessionStatus =
  | "started"
  | "already-active"
  | "unavailable"
  | "failed"
  | "stopped"
  | "idle"
  | "completed"
  | "interrupted";

export interface SessionResult {
  status: SessionStatus;
  message: string;
  targetFile?: string;
}

export interface SessionControllerOptions {
  captureDir: string;
  /** How long to wait after SIGTERM before sending SIGKILL. */
  graceMs?: number;
}

interface TrackedSession extends Session {
  interrupted: boolean;
}

type ForegroundOutcome =
  | { kind: "exit"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "interrupted" }
  | { kind: "error"; message: string };

const STDERR_TAIL_BYTES = 2048;
const ANSI = /\x1b\[[0-9;?]*[A-Za-z]/g;

/**
 * Owns the single background capture and the single foreground run
 * (attack or scan). Slots are claimed in the same synchronous turn as the
 * spawn, so two starts can never interleave.
 */
export class SessionController {
  private capture: TrackedSession | null = null;
  private foreground: TrackedSession | null = null;
  private lastExit: string | null = null;
  private stderrTail = "";
  private readonly captureDir: string;
  private readonly graceMs: number;

  constructor(options: SessionControllerOptions) {
    this.captureDir = options.captureDir;
    this.graceMs = options.graceMs ?? 3000;
  }

  isCapturing(): boolean {
    return this.capture !== null;
  }

  hasForeground(): boolean {
    return this.foreground !== null;
  }

  get activeCapture(): Readonly<Session> | null {
    return this.capture;
  }

  /**
   * Start a background airodump-ng capture against one access point.
   */
  startCapture(
    interfaceName: string,
    bssid: string,
    channel: string,
  ): SessionResult {
    if (this.capture) {
      return {
        status: "already-active",
        message: this.capture.interrupted
          ? `The previous capture on ${this.capture.interfaceName} is still stopping. Try again in a moment.`
          : `A capture session is already active on ${this.capture.interfaceName} (${this.capture.targetFile}). Stop it first with 'capture stop'.`,
      };
    }

    if (!isToolAvailable("airodump-ng")) {
      return unavailable("airodump-ng");
    }

    const prefix = captureFilePrefix(this.captureDir, bssid);
    const argv = buildCaptureArgs(interfaceName, bssid, channel, prefix);

    let child: ChildProcess;
    try {
      mkdirSync(this.captureDir, { recursive: true });
      // Own process group: a terminal Ctrl+C aimed at an attack must not reach it.
      child = spawnArgv(argv, ["ignore", "ignore", "pipe"], true);
    } catch (err) {
      logger.error({ err, argv }, "could not start capture");
      return {
        status: "failed",
        message: `Failed to start capture: ${errorMessage(err)}`,
      };
    }

    const session: TrackedSession = {
      kind: "capture",
      interfaceName,
      bssid,
      targetFile: prefix,
      startedAt: new Date(),
      child,
      interrupted: false,
    };
    this.capture = session;
    this.lastExit = null;
    this.stderrTail = "";

    child.stderr?.on("data", (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString()).slice(
        -STDERR_TAIL_BYTES,
      );
    });

    child.once("error", (err) => {
      logger.warn({ err }, "capture process error");
      if (this.capture === session) {
        this.capture = null;
        this.lastExit = `Capture failed to start: ${err.message}`;
      }
    });

    child.once("exit", (code, signal) => {
      logger.debug({ code, signal }, "capture process exited");
      if (this.capture === session) {
        this.capture = null;
        this.lastExit = session.interrupted
          ? `Last capture on ${session.interfaceName} was stopped. Output: ${session.targetFile}-01.cap`
          : this.describeCaptureExit(session, code, signal);
      }
    });

    logger.info({ argv, pid: child.pid }, "capture started");

    return {
      status: "started",
      message: `Capture started on ${interfaceName} (BSSID ${bssid}, channel ${channel}). Writing to ${prefix}-01.cap. Use 'capture stop' to end it.`,
      targetFile: prefix,
    };
  }

  /**
   * Stop the background capture. Sends SIGTERM and returns immediately;
   * the slot stays taken until the child has exited.
   */
  stop(): SessionResult {
    const session = this.capture;
    if (!session) {
      return { status: "idle", message: "No active capture session." };
    }

    const file = `${session.targetFile}-01.cap`;
    if (!session.interrupted) {
      session.interrupted = true;
      this.signal(session.child, "SIGTERM");
      this.escalate(session.child);
    }

    return {
      status: "stopped",
      message: `Capture stopped. Output saved to ${file}`,
      targetFile: session.targetFile ?? undefined,
    };
  }

  /**
   * Describe the active capture, or how the last one ended.
   */
  status(): SessionResult {
    const session = this.capture;
    if (!session) {
      return {
        status: "idle",
        message: this.lastExit ?? "No active capture session.",
      };
    }

    if (session.interrupted) {
      return {
        status: "stopped",
        message: `Stopping capture on ${session.interfaceName}. Output: ${session.targetFile}-01.cap`,
        targetFile: session.targetFile ?? undefined,
      };
    }

    const seconds = Math.round((Date.now() - session.startedAt.getTime()) / 1000);
    return {
      status: "started",
      message: `Capturing on ${session.interfaceName} (BSSID ${session.bssid}) for ${seconds}s. Output: ${session.targetFile}-01.cap`,
      targetFile: session.targetFile ?? undefined,
    };
  }

  /**
   * Run a deauthentication attack in the foreground until aireplay-ng
   * exits or the run is interrupted.
   */
  async startAttack(
    interfaceName: string,
    bssid: string,
    clientMac: string,
    count: number,
  ): Promise<SessionResult> {
    if (this.foreground) return this.foregroundBusy(this.foreground);
    if (!isToolAvailable("aireplay-ng")) return unavailable("aireplay-ng");

    const client = resolveClient(clientMac);
    const argv = buildDeauthArgs(interfaceName, bssid, client, count);
    const outcome = await this.runForeground("attack", interfaceName, bssid, argv);

    switch (outcome.kind) {
      case "interrupted":
        return { status: "interrupted", message: "Attack stopped by user." };
      case "error":
        return {
          status: "failed",
          message: `Failed to run aireplay-ng: ${outcome.message}`,
        };
      case "exit": {
        if (outcome.code === 0) {
          const runs = count === 0 ? "continuous run" : `${count} deauth bursts`;
          return {
            status: "completed",
            message: `Deauthentication finished (${runs}) against ${bssid}, client ${client}.`,
          };
        }
        return {
          status: "failed",
          message: `aireplay-ng exited with ${exitLabel(outcome.code, outcome.signal)}.`,
        };
      }
    }
  }

  /**
   * Run airodump-ng in the foreground to survey networks until interrupted.
   */
  async scan(interfaceName: string): Promise<SessionResult> {
    if (this.foreground) return this.foregroundBusy(this.foreground);
    if (!isToolAvailable("airodump-ng")) return unavailable("airodump-ng");

    const outcome = await this.runForeground(
      "scan",
      interfaceName,
      null,
      buildScanArgs(interfaceName),
    );

    switch (outcome.kind) {
      case "interrupted":
        return { status: "interrupted", message: "Scan stopped by user." };
      case "error":
        return {
          status: "failed",
          message: `Failed to run airodump-ng: ${outcome.message}`,
        };
      case "exit":
        return outcome.code === 0
          ? { status: "completed", message: "Scan finished." }
          : {
              status: "failed",
              message: `airodump-ng exited with ${exitLabel(outcome.code, outcome.signal)}.`,
            };
    }
  }

  /**
   * Terminate the foreground run, if any. Its pending call then resolves
   * with an "interrupted" result.
   */
  interruptForeground(): boolean {
    const session = this.foreground;
    if (!session) return false;

    session.interrupted = true;
    this.signal(session.child, "SIGTERM");
    this.escalate(session.child);
    return true;
  }

  /**
   * Stop everything and wait for the children to go away.
   */
  async terminate(): Promise<void> {
    const pending: Promise<void>[] = [];

    if (this.foreground) {
      pending.push(this.waitForExit(this.foreground.child));
      this.interruptForeground();
    }
    if (this.capture) {
      pending.push(this.waitForExit(this.capture.child));
      this.stop();
    }

    await Promise.all(pending);
  }

  private runForeground(
    kind: SessionKind,
    interfaceName: string,
    bssid: string | null,
    argv: Argv,
  ): Promise<ForegroundOutcome> {
    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = spawnArgv(argv, ["ignore", "inherit", "inherit"]);
      } catch (err) {
        resolve({ kind: "error", message: errorMessage(err) });
        return;
      }

      const session: TrackedSession = {
        kind,
        interfaceName,
        bssid,
        targetFile: null,
        startedAt: new Date(),
        child,
        interrupted: false,
      };
      this.foreground = session;
      logger.info({ argv, pid: child.pid }, `${kind} started`);

      let settled = false;
      const finish = (outcome: ForegroundOutcome) => {
        if (settled) return;
        settled = true;
        if (this.foreground === session) this.foreground = null;
        resolve(outcome);
      };

      child.once("error", (err) => {
        finish({ kind: "error", message: err.message });
      });
      child.once("exit", (code, signal) => {
        logger.debug({ code, signal }, `${kind} exited`);
        finish(session.interrupted ? { kind: "interrupted" } : { kind: "exit", code, signal });
      });
    });
  }

  private foregroundBusy(session: Session): SessionResult {
    return {
      status: "already-active",
      message: `${session.kind === "attack" ? "An" : "A"} ${session.kind} is already running on ${session.interfaceName}.`,
    };
  }

  private describeCaptureExit(
    session: Session,
    code: number | null,
    signal: NodeJS.Signals | null,
  ): string {
    const base = `Capture on ${session.interfaceName} ended with ${exitLabel(code, signal)}. Output: ${session.targetFile}-01.cap`;
    const tail = lastLine(this.stderrTail);
    return code !== 0 && tail ? `${base}\n${tail}` : base;
  }

  private signal(child: ChildProcess, signal: NodeJS.Signals): void {
    if (child.exitCode !== null || child.signalCode !== null) return;
    try {
      child.kill(signal);
    } catch (err) {
      logger.warn({ err, pid: child.pid }, `could not send ${signal}`);
    }
  }

  private escalate(child: ChildProcess): void {
    const timer = setTimeout(() => this.signal(child, "SIGKILL"), this.graceMs);
    timer.unref();
    child.once("exit", () => clearTimeout(timer));
  }

  private waitForExit(child: ChildProcess): Promise<void> {
    if (child.exitCode !== null || child.signalCode !== null) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.signal(child, "SIGKILL");
        resolve();
      }, this.graceMs);
      child.once("exit", () => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}

function spawnArgv(
  argv: Argv,
  stdio: ["ignore", "ignore" | "inherit", "pipe" | "inherit"],
  detached = false,
): ChildProcess {
  const [command, ...args] = argv;
  return detached ? spawn(command, args, { stdio, detached }) : spawn(command, args, { stdio });
}

function unavailable(tool: string): SessionResult {
  return {
    status: "unavailable",
    message: `${tool} is not installed. Install the aircrack-ng suite (sudo apt-get install aircrack-ng).`,
  };
}

function exitLabel(code: number | null, signal: NodeJS.Signals | null): string {
  if (signal) return `signal ${signal}`;
  return `code ${code ?? "unknown"}`;
}

function lastLine(text: string): string {
  const lines = text
    .replace(ANSI, "")
    .split(/\r?\n|\r/)
    .map((l) => l.trim())
    .filter(Boolean);
  return lines[lines.length - 1] ?? "";
}
