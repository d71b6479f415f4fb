#!/usr/bin/env node

import { confirm, input } from "@inquirer/prompts";
import dotenv from "dotenv";
import meow from "meow";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { KeywordAdvisor } from "./commands/advisor.js";
import { CommandDispatcher, type OutputSink } from "./commands/dispatcher.js";
import { loadConfig, type Config } from "./config.js";
import { errorMessage, isAbortError } from "./errors.js";
import { logger, setLogLevel } from "./logger.js";
import { MacChanger } from "./mac/changer.js";
import { ModeController } from "./mode/controller.js";
import { ConsoleOutput } from "./output.js";
import { getAdapter, type PlatformAdapter } from "./platform/index.js";
import { SessionController } from "./session/controller.js";
import { ShutdownCoordinator } from "./shutdown.js";

export interface CliFlags {
  command: string | null;
  captureDir: string | undefined;
  yes: boolean;
  deauthCount: number | undefined;
  restartNetworkManager: boolean;
  verbose: boolean;
}

const helpText = `
  Usage
    $ airhound [command] [options]

  Options
    --capture-dir, -d   Directory for capture files (default ./captures)
    --yes, -y           Switch to monitor mode without asking
    --deauth-count      Deauth count when a command omits it (default 10)
    --no-restart-network-manager
                        Leave NetworkManager stopped after leaving monitor mode
    --verbose           Diagnostic logging on stderr
    --version           Show version number
    --help              Show this help

  Examples
    $ sudo airhound                          Interactive prompt
    $ sudo airhound interface list           List wireless interfaces
    $ sudo airhound interface monitor wlan0  Enable monitor mode
    $ sudo airhound -y                       Never ask before mode switches
`;

/**
 * Parse CLI arguments using meow.
 * Exported for testing compatibility.
 */
export function parseArgs(argv: string[]): CliFlags {
  const cli = meow(helpText, {
    importMeta: import.meta,
    argv: argv.slice(2), // skip node and script path
    flags: {
      captureDir: {
        type: "string",
        shortFlag: "d",
      },
      yes: {
        type: "boolean",
        shortFlag: "y",
        default: false,
      },
      deauthCount: {
        type: "number",
      },
      restartNetworkManager: {
        type: "boolean",
        default: true,
      },
      verbose: {
        type: "boolean",
        default: false,
      },
    },
    autoHelp: false, // Handle manually to avoid auto-exit during tests
    autoVersion: false, // Handle manually to avoid auto-exit during tests
  });

  // Handle --help and --version manually when running as CLI
  if (isMainModule()) {
    if (argv.includes("--help") || argv.includes("-h")) {
      cli.showHelp(0);
    }
    if (argv.includes("--version") || argv.includes("-v")) {
      cli.showVersion();
    }
  }

  return {
    command: cli.input.length > 0 ? cli.input.join(" ") : null,
    captureDir: cli.flags.captureDir,
    yes: cli.flags.yes,
    deauthCount: cli.flags.deauthCount,
    restartNetworkManager: cli.flags.restartNetworkManager,
    verbose: cli.flags.verbose,
  };
}

/**
 * Wired-up components, one of each per process.
 */
export interface App {
  adapter: PlatformAdapter;
  modes: ModeController;
  sessions: SessionController;
  dispatcher: CommandDispatcher;
  coordinator: ShutdownCoordinator;
  output: OutputSink;
}

export interface AppOverrides {
  adapter?: PlatformAdapter;
  output?: OutputSink;
  confirm?: (question: string) => Promise<boolean>;
  exit?: (code: number) => void;
}

export function createApp(config: Config, overrides: AppOverrides = {}): App {
  const adapter = overrides.adapter ?? getAdapter();
  const output = overrides.output ?? new ConsoleOutput();
  const modes = new ModeController(adapter, {
    restartNetworkManager: config.restartNetworkManager,
  });
  const sessions = new SessionController({ captureDir: config.captureDir });

  const dispatcher = new CommandDispatcher({
    adapter,
    modes,
    sessions,
    mac: new MacChanger(adapter),
    output,
    advisor: new KeywordAdvisor(),
    confirm:
      overrides.confirm ??
      ((question) => confirm({ message: question, default: false })),
    config,
  });

  const coordinator = new ShutdownCoordinator({
    sessions,
    modes,
    output,
    ...(overrides.exit ? { exit: overrides.exit } : {}),
  });

  return { adapter, modes, sessions, dispatcher, coordinator, output };
}

/**
 * Interactive command loop. Returns once the shutdown sequence has run.
 */
export async function runLoop(
  app: App,
  prompt: () => Promise<string> = () => input({ message: "airhound>" }),
): Promise<void> {
  let previous: string | undefined;

  while (!app.coordinator.shuttingDown) {
    try {
      const line = await prompt();
      const result = await app.dispatcher.handle(line, previous);
      if (result.exit) {
        await app.coordinator.shutdown("exit");
        return;
      }
      if (result.text) previous = result.text;
    } catch (err) {
      if (isAbortError(err)) {
        // Ctrl+C or ESC at a prompt
        await app.coordinator.shutdown("SIGINT");
        return;
      }
      logger.error({ err }, "command failed");
      app.output.show(`Error: ${errorMessage(err)}`, "Error");
    }
  }
}

async function main() {
  dotenv.config();

  const flags = parseArgs(process.argv);
  const config = loadConfig(flags);
  setLogLevel(config.logLevel);

  const app = createApp(config);
  app.coordinator.install();

  if (flags.command) {
    // One-shot: run the command, stop anything it left running, keep modes.
    await app.dispatcher.handle(flags.command);
    await app.sessions.terminate();
    process.exit(0);
  }

  console.log(
    `\nairhound: type 'help' for commands, 'exit' to quit \x1b[2m(Ctrl+C stops a running attack or scan)\x1b[0m`,
  );
  await runLoop(app);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Only run when executed directly (not when imported for testing)
if (isMainModule()) {
  main().catch((err: unknown) => {
    if (isAbortError(err)) {
      console.log("\nCancelled");
      process.exit(0);
    }
    console.error(err);
    process.exit(1);
  });
}
