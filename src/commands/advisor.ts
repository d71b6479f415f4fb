/**
 * Keyword-context fallback for input that is not a command.
 */
export interface Advisor {
  advise(text: string, previousOutput?: string): string | null;
}

interface Hint {
  keywords: string[];
  advice: string;
}

const HINTS: Hint[] = [
  {
    keywords: ["handshake", "wpa"],
    advice:
      "To capture a WPA handshake: 'capture start wlan0mon <bssid> <channel>', then 'attack deauth wlan0mon <bssid> broadcast 5' so clients reconnect, then 'capture stop'.",
  },
  {
    keywords: ["crack", "aircrack", "password", "wordlist"],
    advice:
      "Crack a captured handshake offline: aircrack-ng -w <wordlist> <capture>-01.cap",
  },
  {
    keywords: ["deauth", "disconnect", "kick"],
    advice:
      "Deauthenticate clients: 'attack deauth wlan0mon <bssid> [client|broadcast] [count]'. A count of 0 runs until Ctrl+C.",
  },
  {
    keywords: ["scan", "survey", "airodump", "networks"],
    advice: "Survey nearby access points: 'scan networks wlan0mon' (Ctrl+C to stop).",
  },
  {
    keywords: ["monitor", "airmon"],
    advice:
      "Switch an adapter to monitor mode with 'interface monitor wlan0'; return it with 'interface managed wlan0mon'.",
  },
  {
    keywords: ["mac", "spoof", "macchanger"],
    advice: "Randomise a hardware address: 'macchanger wlan0 random'. Show it: 'macchanger show wlan0'.",
  },
  {
    keywords: ["inject", "injection", "aireplay"],
    advice: "Test packet injection support: aireplay-ng --test wlan0mon",
  },
  {
    keywords: ["channel"],
    advice: "Capture on the access point's own channel: the CH column of 'scan networks' shows it.",
  },
  {
    keywords: ["interface", "adapter", "wifi"],
    advice: "List wireless adapters and their modes with 'interface list'.",
  },
];

/**
 * Small keyword table of aircrack-ng usage hints.
 * When the previous result named a monitor interface, examples use it.
 */
export class KeywordAdvisor implements Advisor {
  advise(text: string, previousOutput?: string): string | null {
    const words = new Set(text.toLowerCase().match(/[a-z0-9-]+/g) ?? []);
    const hint = HINTS.find((h) => h.keywords.some((k) => words.has(k)));
    if (!hint) return null;

    const monitor = previousOutput?.match(/\b([a-z][a-z0-9]*\dmon)\b/i)?.[1];
    return monitor ? hint.advice.replaceAll("wlan0mon", monitor) : hint.advice;
  }
}
