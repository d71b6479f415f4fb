/**
 * Parsers for airmon-ng start/stop output.
 *
 * airmon-ng has reported renames in several formats over the years:
 *
 *   (mac80211 monitor mode vif enabled for [phy0]wlan0 on [phy0]wlan0mon)
 *   (monitor mode enabled on mon0)
 *   (mac80211 station mode vif enabled on [phy0]wlan0)
 *
 * Some versions print only the confirmation phrase, and some print nothing
 * recognisable at all. The parsers never throw; unknown output is "uncertain".
 */

export const MONITOR_SUFFIX = "mon";

export type ModeSwitchOutcome =
  | {
      kind: "confirmed";
      interfaceName: string;
      source: "explicit" | "convention";
    }
  | { kind: "uncertain"; interfaceName: string }
  | { kind: "failed"; reason: string };

const MONITOR_ON =
  /monitor mode (?:vif )?enabled(?: for (?:\[\w+\])?[\w.-]+)? on (?:\[\w+\])?([\w.-]+)/i;
const MONITOR_ALREADY =
  /monitor mode (?:vif )?already enabled for (?:\[\w+\])?([\w.-]+)/i;
const MONITOR_ENABLED = /monitor mode (?:vif )?enabled/i;

const STATION_ON = /station mode (?:vif )?enabled on (?:\[\w+\])?([\w.-]+)/i;
const MONITOR_DISABLED =
  /monitor mode (?:vif )?disabled|\(removed\)|station mode (?:vif )?enabled/i;

const FAILURE =
  /^.*(?:\bERROR\b|does not exist|No such device|Operation not (?:permitted|supported)).*$/im;

/**
 * Interpret the output of `airmon-ng start <name>`.
 */
export function parseMonitorStart(
  output: string,
  name: string,
): ModeSwitchOutcome {
  const explicit = output.match(MONITOR_ON) ?? output.match(MONITOR_ALREADY);
  if (explicit?.[1]) {
    return { kind: "confirmed", interfaceName: explicit[1], source: "explicit" };
  }

  const failure = output.match(FAILURE);
  if (failure) {
    return { kind: "failed", reason: failure[0].trim() };
  }

  if (MONITOR_ENABLED.test(output)) {
    return {
      kind: "confirmed",
      interfaceName: withMonitorSuffix(name),
      source: "convention",
    };
  }

  return { kind: "uncertain", interfaceName: name };
}

/**
 * Interpret the output of `airmon-ng stop <name>`.
 */
export function parseMonitorStop(
  output: string,
  name: string,
): ModeSwitchOutcome {
  const explicit = output.match(STATION_ON);
  if (explicit?.[1]) {
    return { kind: "confirmed", interfaceName: explicit[1], source: "explicit" };
  }

  const failure = output.match(FAILURE);
  if (failure) {
    return { kind: "failed", reason: failure[0].trim() };
  }

  if (MONITOR_DISABLED.test(output)) {
    return {
      kind: "confirmed",
      interfaceName: withoutMonitorSuffix(name),
      source: "convention",
    };
  }

  return { kind: "uncertain", interfaceName: name };
}

export function withMonitorSuffix(name: string): string {
  return name.endsWith(MONITOR_SUFFIX) ? name : `${name}${MONITOR_SUFFIX}`;
}

export function withoutMonitorSuffix(name: string): string {
  return name.endsWith(MONITOR_SUFFIX) && name.length > MONITOR_SUFFIX.length
    ? name.slice(0, -MONITOR_SUFFIX.length)
    : name;
}
