import type { OutputSink } from "./commands/dispatcher.js";

/**
 * Prints titled results to stdout.
 */
export class ConsoleOutput implements OutputSink {
  show(text: string, title: string): void {
    console.log(`\n\x1b[1m${title}\x1b[0m \x1b[2m${"─".repeat(Math.max(0, 50 - title.length))}\x1b[0m`);
    console.log(text);
  }
}
