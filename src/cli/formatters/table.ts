/**
 * Compact one-line-per-session table for `sessions list` and `search`.
 */

import type { Session } from "../../shared/types.js";
import { getSessionDuration } from "../../shared/session.js";
import { formatDuration, formatSize, truncate, padRight, padLeft } from "./units.js";
import { CYAN, DIM, RED, paint, statusColour, useColour } from "./colour.js";

/** Length of abbreviated ids shown in list views. */
export const SHORT_ID_LENGTH = 8;

function colourStatus(session: Session, colour: boolean): string {
  const status = session.response?.statusCode;
  if (status === undefined || status === 0) {
    const failed = session.state === "failed";
    return paint(failed ? RED : "", padLeft(failed ? "ERR" : "...", 6), colour);
  }
  return paint(statusColour(status), padLeft(String(status), 6), colour);
}

/** [C] for responses served from cache. */
function cacheIndicator(session: Session, colour: boolean): string {
  if (!session.response?.fromCache) return "";
  return ` ${paint(CYAN, "[C]", colour)}`;
}

export interface TableOptions {
  /** Maximum URL column width. Defaults to 50. */
  urlWidth?: number;
  /** Wall clock for the duration of unfinished sessions */
  now?: number;
}

export function formatSessionTable(sessions: readonly Session[], total: number, options?: TableOptions): string {
  const urlWidth = options?.urlWidth ?? 50;
  const now = options?.now ?? Date.now();
  const colour = useColour();
  const lines: string[] = [];

  const header =
    `  ${padRight("ID", SHORT_ID_LENGTH)}  ${padRight("Method", 7)}  ${padLeft("Status", 6)}  ` +
    `${padRight("URL", urlWidth)}  ${padLeft("Duration", 9)}  ${padLeft("Size", 8)}`;
  lines.push(paint(DIM, header, colour));

  for (const session of sessions) {
    const id = padRight(session.id.slice(0, SHORT_ID_LENGTH), SHORT_ID_LENGTH);
    const method = padRight(session.request.method, 7);
    const url = padRight(truncate(session.request.url, urlWidth), urlWidth);
    const duration = padLeft(formatDuration(getSessionDuration(session, now)), 9);
    const size = padLeft(formatSize(session.response?.body?.length), 8);

    lines.push(
      `  ${id}  ${method}  ${colourStatus(session, colour)}  ${url}  ${duration}  ${size}${cacheIndicator(session, colour)}`
    );
  }

  lines.push("");
  const showing = sessions.length;
  if (showing < total) {
    lines.push(`  Showing ${showing} of ${total} sessions`);
  } else {
    lines.push(`  Showing ${showing} session${showing === 1 ? "" : "s"}`);
  }

  return lines.join("\n");
}
