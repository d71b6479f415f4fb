import { BROADCAST_SENTINEL } from "../session/commands.js";
import { DEFAULT_DEAUTH_COUNT } from "../config.js";

export type Operation =
  | "listInterfaces"
  | "setMonitorMode"
  | "setManagedMode"
  | "scanNetworks"
  | "startCapture"
  | "stopCapture"
  | "captureStatus"
  | "deauthAttack"
  | "changeMac"
  | "showMac"
  | "database"
  | "help"
  | "exit"
  | "unknown";

/**
 * One line of user input, interpreted. Lives for a single dispatch.
 */
export interface ParsedCommand {
  operation: Operation;
  arguments: string[];
  explanation?: string;
}

export type ParseResult =
  | { ok: true; command: ParsedCommand }
  | { ok: false; error: string; usage: string };

export interface ParseOptions {
  deauthCount?: number;
}

export const MAC_STRATEGIES = ["random", "vendor", "any-vendor", "permanent"] as const;

const EXPLANATIONS: Partial<Record<Operation, string>> = {
  listInterfaces: "Listing wireless interfaces",
  setMonitorMode: "Enabling monitor mode on wireless interface",
  setManagedMode: "Disabling monitor mode on wireless interface",
  scanNetworks: "Capturing wireless packets to survey nearby networks",
  startCapture: "Capturing packets for a specific access point and saving to file",
  stopCapture: "Stopping packet capture",
  captureStatus: "Checking the packet capture session",
  deauthAttack: "Performing deauthentication attack",
  changeMac: "Changing the interface MAC address",
  showMac: "Showing the interface MAC address",
};

export const USAGE = {
  interface: "interface [list] | interface monitor <iface> | interface managed <iface>",
  scan: "scan networks <iface>",
  capture: "capture start <iface> <bssid> <channel> | capture stop | capture status",
  attack: "attack deauth <iface> <bssid> [client|broadcast] [count]",
  macchanger: `macchanger <iface> [${MAC_STRATEGIES.join("|")}|<mac>] | macchanger show <iface>`,
} as const;

export const HELP_TEXT = `Commands
  ${USAGE.interface}
  ${USAGE.scan}
  ${USAGE.capture}
  ${USAGE.attack}
  ${USAGE.macchanger}
  help
  exit | quit

Examples
  interface monitor wlan0
  capture start wlan0mon AA:BB:CC:DD:EE:FF 6
  attack deauth wlan0mon AA:BB:CC:DD:EE:FF broadcast 5
  capture stop

A count of 0 sends deauth packets until interrupted (Ctrl+C).`;

const MAC = /^[0-9a-f]{2}(?::[0-9a-f]{2}){5}$/i;

export function isMacAddress(value: string): boolean {
  return MAC.test(value);
}

/**
 * Parse a whitespace-separated command line.
 * Missing or malformed arguments are reported, never guessed.
 */
export function parseCommand(line: string, options: ParseOptions = {}): ParseResult {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  const [head, ...rest] = tokens;

  if (!head) return ok("unknown", []);

  const sub = rest[0]?.toLowerCase();
  const params = rest.slice(1);

  switch (head.toLowerCase()) {
    case "interface":
    case "interfaces":
      if (sub === undefined || sub === "list") return ok("listInterfaces", []);
      if (sub === "monitor") return positional("setMonitorMode", USAGE.interface, params, ["iface"]);
      if (sub === "managed") return positional("setManagedMode", USAGE.interface, params, ["iface"]);
      return unknownSubcommand("interface", rest[0], USAGE.interface);

    case "scan":
      if (sub === undefined) return missing("networks", USAGE.scan);
      if (sub === "networks") return positional("scanNetworks", USAGE.scan, params, ["iface"]);
      return unknownSubcommand("scan", rest[0], USAGE.scan);

    case "capture":
      if (sub === undefined) return missing("start|stop|status", USAGE.capture);
      if (sub === "stop") return ok("stopCapture", []);
      if (sub === "status") return ok("captureStatus", []);
      if (sub === "start") return parseCaptureStart(params);
      return unknownSubcommand("capture", rest[0], USAGE.capture);

    case "attack":
      if (sub === undefined) return missing("deauth", USAGE.attack);
      if (sub === "deauth") return parseDeauth(params, options);
      return unknownSubcommand("attack", rest[0], USAGE.attack);

    case "macchanger":
      return parseMacchanger(rest);

    case "db":
      return ok("database", rest);

    case "help":
      return ok("help", []);

    case "exit":
    case "quit":
      return ok("exit", []);

    default:
      return ok("unknown", tokens);
  }
}

function parseCaptureStart(params: string[]): ParseResult {
  const result = positional("startCapture", USAGE.capture, params, ["iface", "bssid", "channel"]);
  if (!result.ok) return result;

  const [, bssid = "", channel = ""] = result.command.arguments;
  if (!isMacAddress(bssid)) return invalid("bssid", bssid, USAGE.capture);
  if (!/^\d+$/.test(channel) || Number(channel) < 1 || Number(channel) > 196) {
    return invalid("channel", channel, USAGE.capture);
  }
  return result;
}

function parseDeauth(params: string[], options: ParseOptions): ParseResult {
  const [iface, bssid, client = BROADCAST_SENTINEL, count] = params;
  if (!iface) return missing("iface", USAGE.attack);
  if (!bssid) return missing("bssid", USAGE.attack);
  if (!isMacAddress(bssid)) return invalid("bssid", bssid, USAGE.attack);
  if (client.toLowerCase() !== BROADCAST_SENTINEL && !isMacAddress(client)) {
    return invalid("client", client, USAGE.attack);
  }

  let resolvedCount = options.deauthCount ?? DEFAULT_DEAUTH_COUNT;
  if (count !== undefined) {
    if (!/^\d+$/.test(count)) return invalid("count", count, USAGE.attack);
    resolvedCount = Number(count);
  }

  return ok("deauthAttack", [iface, bssid, client, String(resolvedCount)]);
}

function parseMacchanger(rest: string[]): ParseResult {
  const [first, second] = rest;
  if (!first) return missing("iface", USAGE.macchanger);

  if (first.toLowerCase() === "show") {
    return positional("showMac", USAGE.macchanger, rest.slice(1), ["iface"]);
  }

  const strategy = second ?? "random";
  const known = MAC_STRATEGIES.some((s) => s === strategy.toLowerCase());
  if (!known && !isMacAddress(strategy)) {
    return invalid("strategy", strategy, USAGE.macchanger);
  }

  return ok("changeMac", [first, known ? strategy.toLowerCase() : strategy]);
}

function positional(
  operation: Operation,
  usage: string,
  params: string[],
  names: string[],
): ParseResult {
  for (const [i, name] of names.entries()) {
    if (params[i] === undefined) return missing(name, usage);
  }
  return ok(operation, params.slice(0, names.length));
}

function ok(operation: Operation, args: string[]): ParseResult {
  const explanation = EXPLANATIONS[operation];
  const command: ParsedCommand = explanation
    ? { operation, arguments: args, explanation }
    : { operation, arguments: args };
  return { ok: true, command };
}

function missing(name: string, usage: string): ParseResult {
  return { ok: false, error: `Error: missing parameter ${name}`, usage };
}

function invalid(name: string, value: string, usage: string): ParseResult {
  return { ok: false, error: `Error: invalid parameter ${name}: ${value}`, usage };
}

function unknownSubcommand(command: string, sub: string | undefined, usage: string): ParseResult {
  return { ok: false, error: `Error: unknown ${command} subcommand '${sub ?? ""}'`, usage };
}
