import type { LogicalOperator, Predicate, Session, SessionState } from "../shared/types.js";
import type { Logger } from "../shared/logger.js";
import { getSessionHost } from "../shared/session.js";
import { Criteria } from "./criteria.js";

export interface FilterStats {
  totalSessions: number;
  filteredSessions: number;
  processingTimeMs: number;
  /** filtered / total, 0 for an empty input */
  filteringRatio: number;
}

export interface SessionSummary {
  total: number;
  byState: Partial<Record<SessionState, number>>;
  byMethod: Record<string, number>;
  byStatusCode: Record<string, number>;
  byHost: Record<string, number>;
  /** Mean of end - start over sessions that have an end time */
  averageDurationMs: number;
}

export interface FilterEngineOptions {
  /** Record stats for every filter call in `lastStats` */
  trackPerformance?: boolean;
  logger?: Logger;
  /** Monotonic clock in ms */
  clock?: () => number;
}

function makeStats(total: number, filtered: number, processingTimeMs: number): FilterStats {
  return {
    totalSessions: total,
    filteredSessions: filtered,
    processingTimeMs,
    filteringRatio: total > 0 ? filtered / total : 0,
  };
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Applies predicates to session lists. Inputs are never mutated.
 */
export class FilterEngine {
  trackPerformance: boolean;
  private stats: FilterStats | undefined;
  private active: Predicate | undefined;
  private readonly logger: Logger | undefined;
  private readonly clock: () => number;

  constructor(options: FilterEngineOptions = {}) {
    this.trackPerformance = options.trackPerformance ?? false;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => performance.now());
  }

  /** Stats of the most recent filter call, when tracking is on. */
  get lastStats(): FilterStats | undefined {
    return this.stats;
  }

  /** The predicate most recently passed to `filter`. */
  get activeFilter(): Predicate | undefined {
    return this.active;
  }

  filter(sessions: readonly Session[], predicate: Predicate): Session[] {
    this.active = predicate;
    return this.run(sessions, (session) => predicate.matches(session));
  }

  /**
   * Combine several predicates: "and" needs all of them, "or" any. An empty
   * list returns the input unfiltered.
   */
  filterWith(
    sessions: readonly Session[],
    predicates: readonly Predicate[],
    operator: LogicalOperator
  ): Session[] {
    if (predicates.length === 0) {
      return [...sessions];
    }
    return this.run(sessions, (session) =>
      operator === "and"
        ? predicates.every((p) => p.matches(session))
        : predicates.some((p) => p.matches(session))
    );
  }

  /**
   * Filter once per named group. A session may land in several groups.
   */
  categorize(
    sessions: readonly Session[],
    groups: Readonly<Record<string, Predicate>>
  ): Record<string, Session[]> {
    const result: Record<string, Session[]> = {};
    for (const [name, predicate] of Object.entries(groups)) {
      result[name] = this.filter(sessions, predicate);
    }
    return result;
  }

  filterAndSort(sessions: readonly Session[], predicate: Predicate, ascending = true): Session[] {
    const direction = ascending ? 1 : -1;
    return this.filter(sessions, predicate).sort((a, b) => (a.startTime - b.startTime) * direction);
  }

  /**
   * Zero-based page of the filtered sessions. Pages past the end are empty.
   */
  paginate(sessions: readonly Session[], predicate: Predicate, page: number, pageSize: number): Session[] {
    if (page < 0 || pageSize <= 0) return [];
    const start = page * pageSize;
    return this.filter(sessions, predicate).slice(start, start + pageSize);
  }

  /**
   * Filter and report counts and timing, whether or not tracking is on.
   */
  getStatistics(sessions: readonly Session[], predicate: Predicate): FilterStats {
    const started = this.clock();
    const filtered = this.filter(sessions, predicate);
    return makeStats(sessions.length, filtered.length, this.clock() - started);
  }

  clearActiveFilter(): void {
    this.active = undefined;
  }

  resetStatistics(): void {
    this.stats = undefined;
  }

  successOnly(sessions: readonly Session[]): Session[] {
    return this.filter(sessions, Criteria.successOnly());
  }

  errorsOnly(sessions: readonly Session[]): Session[] {
    return this.filter(sessions, Criteria.errorsOnly());
  }

  byHost(sessions: readonly Session[], host: string): Session[] {
    return this.filter(sessions, Criteria.forHost(host));
  }

  slowRequests(sessions: readonly Session[], thresholdMs = 2000): Session[] {
    return this.filter(sessions, Criteria.slowRequests(thresholdMs));
  }

  summarize(sessions: readonly Session[]): SessionSummary {
    const summary: SessionSummary = {
      total: sessions.length,
      byState: {},
      byMethod: {},
      byStatusCode: {},
      byHost: {},
      averageDurationMs: 0,
    };

    let finished = 0;
    let totalDuration = 0;

    for (const session of sessions) {
      summary.byState[session.state] = (summary.byState[session.state] ?? 0) + 1;
      increment(summary.byMethod, session.request.method);

      if (session.response) {
        increment(summary.byStatusCode, String(session.response.statusCode));
      }

      const host = getSessionHost(session);
      if (host !== undefined) {
        increment(summary.byHost, host);
      }

      if (session.endTime !== undefined) {
        finished++;
        totalDuration += session.endTime - session.startTime;
      }
    }

    summary.averageDurationMs = finished > 0 ? totalDuration / finished : 0;
    return summary;
  }

  private run(sessions: readonly Session[], test: (session: Session) => boolean): Session[] {
    const started = this.clock();
    const filtered = sessions.filter(test);

    if (this.trackPerformance) {
      this.stats = makeStats(sessions.length, filtered.length, this.clock() - started);
      this.logger?.trace("Filtered sessions", { ...this.stats });
    }

    return filtered;
  }
}
