import { logger } from "./logger.js";
import type { OutputSink } from "./commands/dispatcher.js";
import type { ModeController } from "./mode/controller.js";
import type { SessionController } from "./session/controller.js";

export type ShutdownSignal = "SIGINT" | "SIGTERM";

/**
 * Anything that emits process signals (process itself, or a test emitter).
 */
export interface SignalSource {
  on(event: ShutdownSignal, listener: () => void): unknown;
}

export interface ShutdownDeps {
  sessions: SessionController;
  modes: ModeController;
  output: OutputSink;
  exit?: (code: number) => void;
}

/**
 * Process-wide cleanup: stop sessions, restore managed mode, say goodbye,
 * exit 0. Signal listeners only record the request; the cleanup itself runs
 * on a later turn of the event loop.
 */
export class ShutdownCoordinator {
  private installed = false;
  private pending: Promise<void> | null = null;
  private readonly exit: (code: number) => void;

  constructor(private readonly deps: ShutdownDeps) {
    this.exit = deps.exit ?? ((code) => process.exit(code));
  }

  get shuttingDown(): boolean {
    return this.pending !== null;
  }

  install(source: SignalSource = process): void {
    if (this.installed) return;
    this.installed = true;

    source.on("SIGINT", () => this.onSignal("SIGINT"));
    source.on("SIGTERM", () => this.onSignal("SIGTERM"));
  }

  /**
   * SIGINT during a foreground attack or scan interrupts only that run.
   * Every other signal shuts the process down.
   */
  onSignal(signal: ShutdownSignal): void {
    logger.debug({ signal }, "signal received");

    if (signal === "SIGINT" && !this.shuttingDown && this.deps.sessions.hasForeground()) {
      this.deps.sessions.interruptForeground();
      return;
    }

    setImmediate(() => {
      this.shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        this.exit(0);
      });
    });
  }

  /**
   * Run the cleanup sequence once. Later calls share the first run.
   */
  shutdown(reason: string): Promise<void> {
    this.pending ??= this.run(reason);
    return this.pending;
  }

  private async run(reason: string): Promise<void> {
    logger.info({ reason }, "shutting down");

    try {
      await this.deps.sessions.terminate();
    } catch (err) {
      logger.error({ err }, "could not terminate sessions");
    }

    try {
      for (const result of this.deps.modes.restoreAll()) {
        logger.info({ iface: result.interfaceName, status: result.status }, result.message);
      }
    } catch (err) {
      logger.error({ err }, "could not restore managed mode");
    }

    this.deps.output.show("Interfaces restored. Goodbye!", "Exit");
    this.exit(0);
  }
}
