/**
 * Time and duration expressions for CLI flags.
 *
 * Points in time (`--since`, `--before`):
 *   now, today, yesterday
 *   5s, 10m, 2h, 3d, 1w          (that long before now)
 *   2024-01-01                   (local midnight)
 *   2024-01-01T10:00[:30], 2024-01-01 10:00
 *   2024-01-01T10:00:00Z         (any string Date.parse accepts with a zone)
 *
 * Durations (`--min-duration`, `--max-duration`): 250, 250ms, 2s, 1.5m.
 */

const MS_PER_UNIT: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

const AGO_RE = /^(\d+)([smhdw])$/;
const DURATION_RE = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/;
const LOCAL_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const LOCAL_DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})[t ](\d{2}):(\d{2})(?::(\d{2}))?$/;
const ZONED_RE = /(z|[+-]\d{2}:?\d{2})$/;

const TIME_FORMATS_HELP =
  "Use now, today, yesterday, a relative time (5m, 2h, 3d, 1w), a date (2024-01-01) or a datetime (2024-01-01T10:00).";

function midnight(at: number, dayOffset = 0): number {
  const date = new Date(at);
  date.setHours(0, 0, 0, 0);
  date.setDate(date.getDate() + dayOffset);
  return date.getTime();
}

/**
 * Build a local time, rejecting fields that Date would silently roll over
 * (2024-02-30 is not March 1st).
 */
function localTime(parts: number[], input: string): number {
  const [year = 0, month = 1, day = 1, hours = 0, minutes = 0, seconds = 0] = parts;
  const date = new Date(year, month - 1, day, hours, minutes, seconds);

  const valid =
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day &&
    date.getHours() === hours &&
    date.getMinutes() === minutes;
  if (!valid) {
    throw new Error(`Invalid date: "${input}"`);
  }
  return date.getTime();
}

function numbers(match: RegExpExecArray): number[] {
  return match
    .slice(1)
    .filter((part): part is string => part !== undefined)
    .map((part) => parseInt(part, 10));
}

/**
 * Parse a point in time into epoch ms. `now` is injectable for tests.
 */
export function parseTime(input: string, now: number = Date.now()): number {
  const text = input.trim().toLowerCase();

  switch (text) {
    case "now":
      return now;
    case "today":
      return midnight(now);
    case "yesterday":
      return midnight(now, -1);
  }

  const ago = AGO_RE.exec(text);
  if (ago) {
    const amount = parseInt(ago[1] ?? "0", 10);
    const unit = MS_PER_UNIT[ago[2] ?? ""] ?? 0;
    return Math.max(0, now - amount * unit);
  }

  const date = LOCAL_DATE_RE.exec(text);
  if (date) {
    return localTime(numbers(date), input);
  }

  const datetime = LOCAL_DATETIME_RE.exec(text);
  if (datetime) {
    return localTime(numbers(datetime), input);
  }

  if (ZONED_RE.test(text)) {
    const parsed = Date.parse(input.trim());
    if (!Number.isNaN(parsed)) return parsed;
  }

  throw new Error(`Unrecognised time "${input}". ${TIME_FORMATS_HELP}`);
}

/**
 * Parse a duration into ms. A bare number is milliseconds.
 */
export function parseDuration(input: string): number {
  const match = DURATION_RE.exec(input.trim().toLowerCase());
  if (!match) {
    throw new Error(`Unrecognised duration "${input}". Use e.g. 250, 250ms, 2s or 1.5m.`);
  }
  const amount = parseFloat(match[1] ?? "0");
  const unit = MS_PER_UNIT[match[2] ?? "ms"] ?? 1;
  return Math.round(amount * unit);
}
