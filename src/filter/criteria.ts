/**
 * Composable session filters.
 *
 * A Criteria is an ordered list of conditions, each tagged with the operator
 * that joins it to everything before it. Evaluation runs strictly left to
 * right with no precedence: `a AND b OR c` is `(a && b) || c`. The first
 * condition's operator is ignored, and every condition is evaluated.
 */

import type {
  HttpMethod,
  LogicalOperator,
  MetadataValue,
  Predicate,
  Session,
  StatusCategory,
} from "../shared/types.js";
import { getHeader } from "../shared/request.js";
import { isErrorResponse } from "../shared/response.js";
import {
  getSessionDuration,
  getSessionHost,
  getSessionPath,
  metadataValuesEqual,
} from "../shared/session.js";

export interface Bounds {
  min?: number;
  max?: number;
}

export interface TimeRange {
  from?: number;
  to?: number;
}

export interface PatternOptions {
  /** Treat the pattern as a regular expression */
  regex?: boolean;
  operator?: LogicalOperator;
}

export type FilterCondition =
  | { kind: "url" | "host" | "path"; pattern: string; regex: boolean }
  | { kind: "method"; method: HttpMethod }
  | { kind: "statusCode"; statusCode: number }
  /** Half-open: min inclusive, max exclusive */
  | { kind: "statusCodeRange"; min: number; max: number }
  | { kind: "statusCategory"; category: StatusCategory }
  | { kind: "contentType"; contentType: string }
  | { kind: "hasRequestBody" }
  | { kind: "hasResponseBody" }
  | { kind: "duration"; bounds: Bounds }
  | { kind: "startTime"; range: TimeRange }
  | { kind: "metadata"; key: string; value?: MetadataValue }
  | { kind: "hasError" }
  | { kind: "fromCache" }
  | { kind: "secureDecryption" }
  | { kind: "retryCount"; bounds: Bounds }
  | { kind: "custom"; predicate: Predicate };

export interface CriteriaEntry {
  condition: FilterCondition;
  operator: LogicalOperator;
}

interface CompiledEntry extends CriteriaEntry {
  test: (session: Session) => boolean;
}

export interface CriteriaOptions {
  /** Clock used for the duration of sessions still in flight */
  now?: () => number;
}

type TextMatcher = (text: string) => boolean;

/**
 * Substring match, or regex match when asked. A regex that does not compile
 * degrades to a substring match on the pattern text.
 */
function compileMatcher(pattern: string, regex: boolean): TextMatcher {
  if (regex) {
    try {
      const compiled = new RegExp(pattern);
      return (text) => compiled.test(text);
    } catch {
      return (text) => text.includes(pattern);
    }
  }
  return (text) => text.includes(pattern);
}

function within(value: number, bounds: Bounds): boolean {
  if (bounds.min !== undefined && value < bounds.min) return false;
  if (bounds.max !== undefined && value > bounds.max) return false;
  return true;
}

function hasBytes(body: Buffer | undefined): boolean {
  return body !== undefined && body.length > 0;
}

export class Criteria implements Predicate {
  private entries: CompiledEntry[] = [];
  private readonly now: () => number;

  constructor(options: CriteriaOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  // --- Presets ---

  static successOnly(): Criteria {
    return new Criteria().statusCategory("success");
  }

  static errorsOnly(): Criteria {
    return new Criteria().statusCategory("clientError").statusCategory("serverError", "or");
  }

  static forHost(host: string): Criteria {
    return new Criteria().host(host);
  }

  static slowRequests(thresholdMs = 2000): Criteria {
    return new Criteria().duration({ min: thresholdMs });
  }

  static jsonOnly(): Criteria {
    return new Criteria().contentType("application/json");
  }

  static imagesOnly(): Criteria {
    return new Criteria().contentType("image/");
  }

  // --- Builders ---

  url(pattern: string, options: PatternOptions = {}): this {
    return this.addPattern("url", pattern, options);
  }

  host(pattern: string, options: PatternOptions = {}): this {
    return this.addPattern("host", pattern, options);
  }

  path(pattern: string, options: PatternOptions = {}): this {
    return this.addPattern("path", pattern, options);
  }

  method(method: HttpMethod, operator: LogicalOperator = "and"): this {
    return this.add({ kind: "method", method }, operator, (s) => s.request.method === method);
  }

  statusCode(statusCode: number, operator: LogicalOperator = "and"): this {
    return this.add(
      { kind: "statusCode", statusCode },
      operator,
      (s) => s.response?.statusCode === statusCode
    );
  }

  /**
   * Match status codes in `[min, max)`.
   */
  statusCodeRange(min: number, max: number, operator: LogicalOperator = "and"): this {
    return this.add({ kind: "statusCodeRange", min, max }, operator, (s) => {
      const code = s.response?.statusCode;
      return code !== undefined && code >= min && code < max;
    });
  }

  statusCategory(category: StatusCategory, operator: LogicalOperator = "and"): this {
    return this.add(
      { kind: "statusCategory", category },
      operator,
      (s) => s.response?.statusCategory === category
    );
  }

  /**
   * Case-sensitive substring match against the response Content-Type header.
   */
  contentType(contentType: string, operator: LogicalOperator = "and"): this {
    return this.add({ kind: "contentType", contentType }, operator, (s) => {
      const header = s.response ? getHeader(s.response.headers, "Content-Type") : undefined;
      return header !== undefined && header.includes(contentType);
    });
  }

  hasRequestBody(operator: LogicalOperator = "and"): this {
    return this.add({ kind: "hasRequestBody" }, operator, (s) => hasBytes(s.request.body));
  }

  hasResponseBody(operator: LogicalOperator = "and"): this {
    return this.add({ kind: "hasResponseBody" }, operator, (s) => hasBytes(s.response?.body));
  }

  /** Duration bounds in ms, both inclusive. */
  duration(bounds: Bounds, operator: LogicalOperator = "and"): this {
    return this.add({ kind: "duration", bounds: { ...bounds } }, operator, (s) =>
      within(getSessionDuration(s, this.now()), bounds)
    );
  }

  /** Start time bounds in epoch ms, both inclusive. */
  startTime(range: TimeRange, operator: LogicalOperator = "and"): this {
    return this.add({ kind: "startTime", range: { ...range } }, operator, (s) =>
      within(s.startTime, { min: range.from, max: range.to })
    );
  }

  /**
   * Without a value, match on key presence; with one, on type and value.
   */
  metadata(key: string, value?: MetadataValue, operator: LogicalOperator = "and"): this {
    const condition: FilterCondition =
      value === undefined ? { kind: "metadata", key } : { kind: "metadata", key, value };
    return this.add(condition, operator, (s) => {
      const actual = s.metadata[key];
      if (actual === undefined) return false;
      return value === undefined || metadataValuesEqual(actual, value);
    });
  }

  hasError(operator: LogicalOperator = "and"): this {
    return this.add(
      { kind: "hasError" },
      operator,
      (s) => s.response !== undefined && isErrorResponse(s.response)
    );
  }

  fromCache(operator: LogicalOperator = "and"): this {
    return this.add({ kind: "fromCache" }, operator, (s) => s.response?.fromCache === true);
  }

  secureDecryption(operator: LogicalOperator = "and"): this {
    return this.add({ kind: "secureDecryption" }, operator, (s) => s.usedSecureDecryption);
  }

  retryCount(bounds: Bounds, operator: LogicalOperator = "and"): this {
    return this.add({ kind: "retryCount", bounds: { ...bounds } }, operator, (s) =>
      within(s.retryCount, bounds)
    );
  }

  /**
   * Plug in any other predicate as a condition.
   */
  where(predicate: Predicate, operator: LogicalOperator = "and"): this {
    return this.add({ kind: "custom", predicate }, operator, (s) => predicate.matches(s));
  }

  clear(): this {
    this.entries = [];
    return this;
  }

  get hasConditions(): boolean {
    return this.entries.length > 0;
  }

  get conditionCount(): number {
    return this.entries.length;
  }

  get conditions(): readonly CriteriaEntry[] {
    return this.entries.map(({ condition, operator }) => ({ condition, operator }));
  }

  matches(session: Session): boolean {
    const [first, ...rest] = this.entries;
    if (first === undefined) return true;

    let result = first.test(session);
    for (const entry of rest) {
      const value = entry.test(session);
      result = entry.operator === "and" ? result && value : result || value;
    }
    return result;
  }

  private addPattern(kind: "url" | "host" | "path", pattern: string, options: PatternOptions): this {
    const regex = options.regex ?? false;
    const match = compileMatcher(pattern, regex);
    const extract =
      kind === "url"
        ? (s: Session) => s.request.url
        : kind === "host"
          ? getSessionHost
          : getSessionPath;

    return this.add({ kind, pattern, regex }, options.operator ?? "and", (s) => {
      const text = extract(s);
      return text !== undefined && match(text);
    });
  }

  private add(condition: FilterCondition, operator: LogicalOperator, test: (session: Session) => boolean): this {
    this.entries.push({ condition, operator, test });
    return this;
  }
}
