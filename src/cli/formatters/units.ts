/**
 * Plain-text helpers shared by the table and detail formatters.
 */

const BYTES_PER_KB = 1024;

export function formatSize(bytes: number | undefined): string {
  if (bytes === undefined) return "-";
  if (bytes < BYTES_PER_KB) return `${bytes}B`;
  const kb = bytes / BYTES_PER_KB;
  if (kb < BYTES_PER_KB) return `${kb.toFixed(1)}KB`;
  const mb = kb / BYTES_PER_KB;
  if (mb < BYTES_PER_KB) return `${mb.toFixed(1)}MB`;
  return `${(mb / BYTES_PER_KB).toFixed(1)}GB`;
}

export function formatDuration(ms: number | undefined): string {
  if (ms === undefined) return "-";
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/** Shorten to `width` characters, ending in "…" when cut. */
export function truncate(text: string, width: number): string {
  if (text.length <= width) return text;
  if (width <= 1) return text.slice(0, width);
  return `${text.slice(0, width - 1)}…`;
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

/** `application/json; charset=utf-8` → `json` */
export function shortContentType(contentType: string | undefined): string | undefined {
  if (!contentType) return undefined;
  const mime = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  const subtype = mime.split("/")[1] ?? mime;
  return subtype.replace(/^.*\+/, "") || undefined;
}
