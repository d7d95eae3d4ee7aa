/**
 * ANSI styling for CLI output. Colour is off when NO_COLOR is set or
 * stdout is not a terminal.
 */

export const GREEN = "\x1b[32m";
export const YELLOW = "\x1b[33m";
export const RED = "\x1b[31m";
export const CYAN = "\x1b[36m";
export const BOLD = "\x1b[1m";
export const DIM = "\x1b[2m";
export const RESET = "\x1b[0m";

export function useColour(): boolean {
  if (process.env["NO_COLOR"] !== undefined) return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/**
 * Wrap text in a style when colour is enabled. An empty style leaves the
 * text as it is.
 */
export function paint(style: string, text: string, enabled: boolean): string {
  return enabled && style !== "" ? `${style}${text}${RESET}` : text;
}

/**
 * Colour for an HTTP status; 0 stands for a failed request.
 */
export function statusColour(status: number): string {
  if (status >= 200 && status < 300) return GREEN;
  if (status >= 300 && status < 400) return YELLOW;
  if (status >= 400 || status === 0) return RED;
  return "";
}

/**
 * A dim "Hint:" line pointing at related commands. Empty whenever colour
 * is off, so piped and NO_COLOR output stays clean.
 */
export function formatHint(segments: readonly string[]): string {
  if (!useColour() || segments.length === 0) return "";
  return paint(DIM, `  Hint: ${segments.join(" │ ")}`, true);
}
