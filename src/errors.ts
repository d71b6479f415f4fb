import { ExitPromptError } from "@inquirer/core";

/**
 * True when a prompt was cancelled (Ctrl+C, ESC or an aborted signal).
 */
export function isAbortError(err: unknown): boolean {
  if (err instanceof ExitPromptError) return true;
  if (!(err instanceof Error)) return false;

  return (
    err.name === "AbortError" ||
    ("code" in err && err.code === "ABORT_ERR") ||
    err.message.toLowerCase().includes("abort")
  );
}

/**
 * Render any caught value as a one-line message.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
