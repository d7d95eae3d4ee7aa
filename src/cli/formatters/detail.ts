/**
 * Detail views for a single session and for storage statistics.
 */

import { STATUS_CODES } from "node:http";
import type { Headers, Session } from "../../shared/types.js";
import { isJsonContentType, isTextContentType } from "../../shared/content-type.js";
import { getHeader, requestBodyAsText } from "../../shared/request.js";
import { responseBodyAsText } from "../../shared/response.js";
import { getSessionDuration, metadataValueToString } from "../../shared/session.js";
import type { SessionSummary } from "../../filter/engine.js";
import { formatDuration, formatSize, shortContentType } from "./units.js";
import { RED, BOLD, DIM, paint, statusColour, useColour } from "./colour.js";

const MAX_PREVIEW_LENGTH = 2000;

function heading(text: string, colour: boolean): string {
  return `  ${paint(BOLD, text, colour)}`;
}

/**
 * Mask an authorisation header value, showing only the scheme.
 */
function maskAuthValue(value: string): string {
  const spaceIdx = value.indexOf(" ");
  if (spaceIdx > 0) {
    return value.slice(0, spaceIdx) + " ***";
  }
  return "***";
}

function headerLines(headers: Readonly<Headers>): string[] {
  return Object.entries(headers).map(([name, value]) => {
    const lower = name.toLowerCase();
    const shown = lower === "authorization" || lower === "proxy-authorization" ? maskAuthValue(value) : value;
    return `    ${name}: ${shown}`;
  });
}

function prettyJson(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    // Not valid JSON after all; show it as sent
    return text;
  }
}

function bodyLines(
  label: string,
  body: Buffer | undefined,
  text: string | undefined,
  headers: Readonly<Headers>,
  colour: boolean
): string[] {
  if (!body || body.length === 0) return [];

  const rawType = getHeader(headers, "content-type");
  const contentType = shortContentType(rawType);
  const info = `${formatSize(body.length)}${contentType ? `, ${contentType}` : ""}`;
  const lines = [`${heading(label, colour)} (${info})`];

  // A declared text type is shown even when a few bytes do not decode
  const shown = text ?? (isTextContentType(rawType) ? body.toString("utf-8") : undefined);
  if (shown === undefined) {
    lines.push(`    ${paint(DIM, "(binary)", colour)}`);
    return lines;
  }

  const pretty = isJsonContentType(rawType) ? prettyJson(shown) : shown;
  const preview = pretty.length > MAX_PREVIEW_LENGTH ? pretty.slice(0, MAX_PREVIEW_LENGTH) + "..." : pretty;
  for (const line of preview.split("\n")) {
    lines.push(`    ${line}`);
  }
  return lines;
}

/**
 * Full view of one session: title, timing, metadata, headers and body previews.
 */
export function formatSessionDetail(session: Session, now: number = Date.now()): string {
  const colour = useColour();
  const { request, response } = session;
  const lines: string[] = [];

  // GET https://example.com/path → 200 OK (45ms)
  const arrow = paint(DIM, "→", colour);
  let outcome: string = session.state;
  let outcomeColour = "";
  if (response && response.statusCode > 0) {
    outcome = `${response.statusCode} ${STATUS_CODES[response.statusCode] ?? ""}`.trimEnd();
    outcomeColour = statusColour(response.statusCode);
  } else if (session.state === "failed") {
    outcomeColour = RED;
  }
  const duration = ` (${formatDuration(getSessionDuration(session, now))})`;
  lines.push(`  ${request.method} ${request.url} ${arrow} ${paint(outcomeColour, outcome, colour)}${duration}`);

  lines.push(`  ${paint(DIM, session.id, colour)}`);
  lines.push("");

  lines.push(`  State:    ${session.state}`);
  lines.push(`  Started:  ${new Date(session.startTime).toISOString()}`);
  if (session.endTime !== undefined) {
    lines.push(`  Ended:    ${new Date(session.endTime).toISOString()}`);
  }
  if (session.retryCount > 0) {
    lines.push(`  Retries:  ${session.retryCount}`);
  }
  if (response?.fromCache) {
    lines.push("  Cache:    served from cache");
  }
  if (response?.error) {
    const code = response.error.code !== undefined ? ` (${response.error.code})` : "";
    lines.push(`  Error:    ${response.error.message}${code}`);
  }
  if (session.parentSessionId) {
    lines.push(`  Parent:   ${session.parentSessionId}`);
  }
  if (session.relatedSessionIds.length > 0) {
    lines.push(`  Related:  ${session.relatedSessionIds.join(", ")}`);
  }
  lines.push("");

  const metadata = Object.entries(session.metadata);
  if (metadata.length > 0) {
    lines.push(heading("Metadata", colour));
    for (const [key, value] of metadata) {
      lines.push(`    ${key}: ${metadataValueToString(value)}`);
    }
    lines.push("");
  }

  lines.push(heading("Request Headers", colour));
  lines.push(...headerLines(request.headers));
  lines.push("");

  const requestBody = bodyLines("Request Body", request.body, requestBodyAsText(request), request.headers, colour);
  if (requestBody.length > 0) {
    lines.push(...requestBody, "");
  }

  if (response) {
    lines.push(heading("Response Headers", colour));
    lines.push(...headerLines(response.headers));
    lines.push("");
    lines.push(...bodyLines("Response Body", response.body, responseBodyAsText(response), response.headers, colour));
  }

  return lines.join("\n").trimEnd();
}

export interface StorageStats {
  backend: string;
  location: string;
  count: number;
  bytes: number;
  summary: SessionSummary;
}

function countLines(title: string, counts: Partial<Record<string, number>>, colour: boolean): string[] {
  const entries = Object.entries(counts)
    .filter((entry): entry is [string, number] => entry[1] !== undefined)
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (entries.length === 0) return [];
  return [heading(title, colour), ...entries.map(([key, count]) => `    ${key.padEnd(24)} ${count}`), ""];
}

/**
 * Storage usage plus the breakdowns from FilterEngine.summarize.
 */
export function formatStorageStats(stats: StorageStats): string {
  const colour = useColour();
  const lines: string[] = [
    `  Backend:   ${stats.backend}`,
    `  Location:  ${stats.location}`,
    `  Sessions:  ${stats.count}`,
    `  Size:      ${formatSize(stats.bytes)}`,
    `  Average:   ${formatDuration(stats.summary.averageDurationMs)}`,
    "",
  ];

  lines.push(...countLines("By state", stats.summary.byState, colour));
  lines.push(...countLines("By method", stats.summary.byMethod, colour));
  lines.push(...countLines("By status", stats.summary.byStatusCode, colour));
  lines.push(...countLines("By host", stats.summary.byHost, colour));

  return lines.join("\n").trimEnd();
}
