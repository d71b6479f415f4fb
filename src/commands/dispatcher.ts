import type { Config } from "../config.js";
import type { MacChanger, MacStrategy } from "../mac/changer.js";
import type { ModeController } from "../mode/controller.js";
import type { PlatformAdapter, WirelessInterface } from "../platform/index.js";
import type { SessionController } from "../session/controller.js";
import type { Advisor } from "./advisor.js";
import {
  HELP_TEXT,
  MAC_STRATEGIES,
  parseCommand,
  type Operation,
  type ParsedCommand,
} from "./parser.js";

/**
 * Receives titled result text for display.
 */
export interface OutputSink {
  show(text: string, title: string): void;
}

export interface DispatcherDeps {
  adapter: PlatformAdapter;
  modes: ModeController;
  sessions: SessionController;
  mac: MacChanger;
  output: OutputSink;
  advisor: Advisor;
  confirm: (question: string) => Promise<boolean>;
  config: Pick<Config, "assumeYes" | "deauthCount">;
}

export interface DispatchResult {
  exit: boolean;
  title: string;
  text: string;
}

interface Reply {
  title: string;
  text: string;
}

/** Every command except exit, which ends the loop instead. */
type ExecutableCommand = ParsedCommand & { operation: Exclude<Operation, "exit"> };

type MonitorGate =
  | { ok: true; interfaceName: string; notes: string[] }
  | { ok: false; message: string };

/**
 * Turns one command line into controller calls and exactly one titled
 * message. Holds nothing between lines.
 */
export class CommandDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  /**
   * Handle a line of input. `exit` produces no message of its own; the
   * shutdown sequence says goodbye.
   */
  async handle(line: string, previousOutput?: string): Promise<DispatchResult> {
    if (!line.trim()) return { exit: false, title: "", text: "" };

    const parsed = parseCommand(line, { deauthCount: this.deps.config.deauthCount });
    if (!parsed.ok) {
      return this.reply({
        title: "Invalid command",
        text: `${parsed.error}\nUsage: ${parsed.usage}`,
      });
    }

    const { command } = parsed;
    if (command.operation === "exit") {
      return { exit: true, title: "", text: "" };
    }

    const reply = await this.execute(
      { ...command, operation: command.operation },
      line,
      previousOutput,
    );
    return this.reply(reply);
  }

  private reply(reply: Reply): DispatchResult {
    this.deps.output.show(reply.text, reply.title);
    return { exit: false, ...reply };
  }

  private async execute(
    command: ExecutableCommand,
    line: string,
    previousOutput: string | undefined,
  ): Promise<Reply> {
    const { modes, sessions, mac } = this.deps;
    const title = command.explanation ?? "Result";
    const [first = "", second = "", third = "", fourth = ""] = command.arguments;

    switch (command.operation) {
      case "listInterfaces":
        return { title, text: formatInterfaces(this.deps.adapter.listInterfaces()) };

      case "setMonitorMode":
        return { title, text: modes.enableMonitorMode(first).message };

      case "setManagedMode":
        return { title, text: modes.setManagedMode(first).message };

      case "scanNetworks": {
        const gate = await this.ensureMonitor(first);
        if (!gate.ok) return { title, text: gate.message };
        const result = await sessions.scan(gate.interfaceName);
        return { title, text: [...gate.notes, result.message].join("\n") };
      }

      case "startCapture": {
        // A busy slot is rejected before any mode switch is offered.
        if (sessions.isCapturing()) {
          return { title, text: sessions.startCapture(first, second, third).message };
        }
        const gate = await this.ensureMonitor(first);
        if (!gate.ok) return { title, text: gate.message };
        const result = sessions.startCapture(gate.interfaceName, second, third);
        return { title, text: [...gate.notes, result.message].join("\n") };
      }

      case "stopCapture":
        return { title, text: sessions.stop().message };

      case "captureStatus":
        return { title, text: sessions.status().message };

      case "deauthAttack": {
        const gate = await this.ensureMonitor(first);
        if (!gate.ok) return { title, text: gate.message };
        const result = await sessions.startAttack(
          gate.interfaceName,
          second,
          third,
          Number(fourth),
        );
        return { title, text: [...gate.notes, result.message].join("\n") };
      }

      case "changeMac":
        return { title, text: mac.changeMac(first, toStrategy(second)).message };

      case "showMac":
        return { title, text: mac.showMac(first).message };

      case "database":
        return {
          title: "Database",
          text: "The network database is not available in this build.",
        };

      case "help":
        return { title: "Help", text: HELP_TEXT };

      case "unknown": {
        const advice = this.deps.advisor.advise(line, previousOutput);
        if (advice) return { title: "Suggestion", text: advice };
        const head = line.trim().split(/\s+/)[0] ?? "";
        return {
          title: "Unknown command",
          text: `Unknown command '${head}'. Type 'help' for the list of commands.`,
        };
      }
    }
  }

  /**
   * Make sure an interface is in monitor mode, asking before switching it.
   */
  private async ensureMonitor(name: string): Promise<MonitorGate> {
    const iface = this.deps.adapter.listInterfaces().find((i) => i.name === name);
    if (iface?.mode === "monitor") {
      return { ok: true, interfaceName: name, notes: [] };
    }

    const state = iface ? `mode: ${iface.mode}` : "not found";
    const assent =
      this.deps.config.assumeYes ||
      (await this.deps.confirm(
        `${name} is not in monitor mode (${state}). Enable monitor mode now?`,
      ));

    if (!assent) {
      return {
        ok: false,
        message: `Cancelled: ${name} is not in monitor mode. Run 'interface monitor ${name}' first.`,
      };
    }

    const result = this.deps.modes.enableMonitorMode(name);
    if (result.status === "confirmed" || result.status === "uncertain") {
      return { ok: true, interfaceName: result.interfaceName, notes: [result.message] };
    }
    return { ok: false, message: result.message };
  }
}

export function formatInterfaces(interfaces: WirelessInterface[]): string {
  if (interfaces.length === 0) return "No wireless interfaces found.";

  return interfaces
    .map(
      (i) =>
        `${i.name.padEnd(12)} │ ${i.mode.padEnd(7)} │ ${i.hardwareAddress ?? "unknown"}`,
    )
    .join("\n");
}

function toStrategy(value: string): MacStrategy {
  const named = MAC_STRATEGIES.find((s) => s === value);
  return named ?? { address: value };
}
