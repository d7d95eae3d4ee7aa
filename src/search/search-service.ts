import type { Predicate, Session } from "../shared/types.js";
import type { Logger } from "../shared/logger.js";
import { SearchTimeoutError } from "../shared/errors.js";
import { SerialQueue } from "../shared/serial-queue.js";
import { getRequestHost, getRequestPath, requestBodyAsText } from "../shared/request.js";
import { responseBodyAsText } from "../shared/response.js";
import { getSessionDuration } from "../shared/session.js";
import { Criteria } from "../filter/criteria.js";
import type { SessionStorage } from "../storage/storage.js";
import { SEARCH_FIELDS, extractFieldText, headerPairs, type SearchField } from "./fields.js";
import { TextMatcher, type TextRange } from "./text-matcher.js";
import { isWithin, type DateRange } from "./date-range.js";

export const SORT_OPTIONS = ["relevance", "timestamp", "duration", "statusCode"] as const;
export type SortOption = (typeof SORT_OPTIONS)[number];

export function isSortOption(value: string): value is SortOption {
  return SORT_OPTIONS.some((option) => option === value);
}

export interface SearchQuery {
  /** Empty text matches every session */
  text: string;
  /** All must match */
  filters?: readonly Predicate[];
  dateRange?: DateRange;
  /** Defaults to relevance */
  sortBy?: SortOption;
  /** Defaults to false: highest first */
  ascending?: boolean;
  offset?: number;
  limit?: number;
}

export interface SearchConfig {
  caseSensitive: boolean;
  useRegex: boolean;
  searchFields: readonly SearchField[];
  maxResults: number;
  enableHighlights: boolean;
  timeoutMs: number;
}

export const DEFAULT_SEARCH_CONFIG: Readonly<SearchConfig> = {
  caseSensitive: false,
  useRegex: false,
  searchFields: SEARCH_FIELDS,
  maxResults: 1000,
  enableHighlights: true,
  timeoutMs: 10_000,
};

export interface SearchHighlight {
  field: SearchField;
  range: TextRange;
  matchedText: string;
}

export interface SearchResult {
  /** Sorted, truncated to maxResults, then paged */
  sessions: Session[];
  totalCount: number;
  /** Matches before truncation and paging */
  matchCount: number;
  /** matchCount / totalCount, 0 when nothing was searched */
  matchRatio: number;
  query: SearchQuery;
  /** Keyed by session id; sessions without occurrences are absent */
  highlights: Record<string, SearchHighlight[]>;
  searchTimeMs: number;
}

export interface SearchServiceOptions {
  config?: Partial<SearchConfig>;
  logger?: Logger;
  /** Monotonic clock in ms, for timing and the timeout */
  clock?: () => number;
  /** Wall clock in epoch ms, for the duration of unfinished sessions */
  now?: () => number;
}

const RELEVANCE = {
  url: 10,
  host: 8,
  path: 6,
  requestHeader: 3,
  responseHeader: 2,
  body: 1,
} as const;

interface Scored {
  session: Session;
  score: number;
}

/**
 * Full-text search over sessions. Each instance runs one search at a time.
 */
export class SearchService {
  readonly config: Readonly<SearchConfig>;
  private readonly queue = new SerialQueue();
  private readonly logger: Logger | undefined;
  private readonly clock: () => number;
  private readonly now: () => number;

  constructor(options: SearchServiceOptions = {}) {
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...options.config };
    this.logger = options.logger;
    this.clock = options.clock ?? (() => performance.now());
    this.now = options.now ?? Date.now;
  }

  search(query: SearchQuery, sessions: readonly Session[]): Promise<SearchResult> {
    return this.queue.run(() => this.run(query, sessions));
  }

  async searchStorage(query: SearchQuery, storage: SessionStorage): Promise<SearchResult> {
    return this.search(query, await storage.loadAll());
  }

  /** Search all fields and return only the matching sessions. */
  async simpleSearch(text: string, sessions: readonly Session[]): Promise<Session[]> {
    return (await this.search({ text }, sessions)).sessions;
  }

  searchByHost(host: string, sessions: readonly Session[]): Promise<SearchResult> {
    return this.derive({ searchFields: ["host", "url"] }).search({ text: host }, sessions);
  }

  searchByStatusCode(statusCode: number, sessions: readonly Session[]): Promise<SearchResult> {
    return this.search({ text: "", filters: [new Criteria().statusCode(statusCode)] }, sessions);
  }

  regexSearch(pattern: string, sessions: readonly Session[]): Promise<SearchResult> {
    return this.derive({ useRegex: true }).search({ text: pattern }, sessions);
  }

  /** A service sharing this one's logger and clocks with some config replaced. */
  private derive(overrides: Partial<SearchConfig>): SearchService {
    return new SearchService({
      config: { ...this.config, ...overrides },
      clock: this.clock,
      now: this.now,
      ...(this.logger && { logger: this.logger }),
    });
  }

  private run(query: SearchQuery, sessions: readonly Session[]): SearchResult {
    const started = this.clock();
    const matcher = query.text.length > 0 ? new TextMatcher(query.text, this.config) : undefined;

    const matched: Scored[] = [];
    for (const [scanned, session] of sessions.entries()) {
      if (this.clock() - started > this.config.timeoutMs) {
        this.logger?.warn("Search timed out", { timeoutMs: this.config.timeoutMs, scanned });
        throw new SearchTimeoutError(this.config.timeoutMs);
      }
      if (this.matches(session, query, matcher)) {
        matched.push({ session, score: matcher ? this.relevance(session, matcher) : 0 });
      }
    }

    const sorted = this.sort(matched, query).map((entry) => entry.session);
    const highlights = matcher && this.config.enableHighlights ? this.highlight(sorted, matcher) : {};

    const offset = Math.max(0, query.offset ?? 0);
    const capped = sorted.slice(0, Math.max(0, this.config.maxResults));
    const page = capped.slice(offset, query.limit !== undefined ? offset + Math.max(0, query.limit) : undefined);

    const searchTimeMs = this.clock() - started;
    this.logger?.debug("Search finished", {
      text: query.text,
      total: sessions.length,
      matched: sorted.length,
      searchTimeMs,
    });

    return {
      sessions: page,
      totalCount: sessions.length,
      matchCount: sorted.length,
      matchRatio: sessions.length > 0 ? sorted.length / sessions.length : 0,
      query,
      highlights,
      searchTimeMs,
    };
  }

  private matches(session: Session, query: SearchQuery, matcher: TextMatcher | undefined): boolean {
    if (matcher && !this.config.searchFields.some((field) => matcher.test(extractFieldText(session, field)))) {
      return false;
    }
    if (query.filters && !query.filters.every((filter) => filter.matches(session))) {
      return false;
    }
    if (query.dateRange && !isWithin(query.dateRange, session.startTime)) {
      return false;
    }
    return true;
  }

  /**
   * Additive score over URL parts, header pairs and bodies, whatever fields
   * are configured.
   */
  private relevance(session: Session, matcher: TextMatcher): number {
    const { request, response } = session;
    let score = 0;

    if (matcher.test(request.url)) score += RELEVANCE.url;
    if (matcher.test(getRequestHost(request) ?? "")) score += RELEVANCE.host;
    if (matcher.test(getRequestPath(request) ?? "")) score += RELEVANCE.path;

    for (const pair of headerPairs(request.headers)) {
      if (matcher.test(pair)) score += RELEVANCE.requestHeader;
    }
    if (response) {
      for (const pair of headerPairs(response.headers)) {
        if (matcher.test(pair)) score += RELEVANCE.responseHeader;
      }
    }

    if (matcher.test(requestBodyAsText(request) ?? "")) score += RELEVANCE.body;
    if (response && matcher.test(responseBodyAsText(response) ?? "")) score += RELEVANCE.body;

    return score;
  }

  /** Stable: equal keys keep their input order in either direction. */
  private sort(entries: Scored[], query: SearchQuery): Scored[] {
    const direction = query.ascending ? 1 : -1;
    const now = this.now();

    const key = (entry: Scored): number => {
      switch (query.sortBy ?? "relevance") {
        case "relevance":
          return entry.score;
        case "timestamp":
          return entry.session.startTime;
        case "duration":
          return getSessionDuration(entry.session, now);
        case "statusCode":
          return entry.session.response?.statusCode ?? 0;
      }
    };

    return [...entries].sort((a, b) => direction * (key(a) - key(b)));
  }

  private highlight(sessions: readonly Session[], matcher: TextMatcher): Record<string, SearchHighlight[]> {
    const highlights: Record<string, SearchHighlight[]> = {};

    for (const session of sessions) {
      const found: SearchHighlight[] = [];
      for (const field of this.config.searchFields) {
        const text = extractFieldText(session, field);
        for (const range of matcher.findAll(text)) {
          found.push({ field, range, matchedText: text.slice(range.start, range.start + range.length) });
        }
      }
      if (found.length > 0) {
        highlights[session.id] = found;
      }
    }

    return highlights;
  }
}
