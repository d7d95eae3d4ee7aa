import { describe, it, expect } from "vitest";
import { FilterEngine } from "./engine.js";
import { Criteria } from "./criteria.js";
import { makeSession, ids } from "../../tests/helpers/sessions.js";

const sessions = [
  makeSession({ id: "1", url: "https://api.x.com/a", status: 200, startTime: 3000, durationMs: 50 }),
  makeSession({ id: "2", url: "https://api.x.com/b", method: "POST", status: 404, startTime: 1000, durationMs: 150 }),
  makeSession({ id: "3", url: "https://cdn.y.com/c", status: 200, startTime: 2000, durationMs: 2500 }),
  makeSession({ id: "4", url: "https://cdn.y.com/d", startTime: 4000, state: "sending" }),
];

describe("FilterEngine", () => {
  it("filters with a single predicate and remembers it", () => {
    const engine = new FilterEngine();
    const criteria = Criteria.forHost("api.x.com");
    expect(ids(engine.filter(sessions, criteria))).toEqual(["1", "2"]);
    expect(engine.activeFilter).toBe(criteria);

    engine.clearActiveFilter();
    expect(engine.activeFilter).toBeUndefined();
  });

  it("combines predicate lists with and/or", () => {
    const engine = new FilterEngine();
    const apiHost = Criteria.forHost("api.x.com");
    const ok = Criteria.successOnly();

    expect(ids(engine.filterWith(sessions, [apiHost, ok], "and"))).toEqual(["1"]);
    expect(ids(engine.filterWith(sessions, [apiHost, ok], "or"))).toEqual(["1", "2", "3"]);
  });

  it("returns the input for an empty predicate list", () => {
    const engine = new FilterEngine();
    const result = engine.filterWith(sessions, [], "and");
    expect(ids(result)).toEqual(["1", "2", "3", "4"]);
    expect(result).not.toBe(sessions);
  });

  it("categorizes into named groups", () => {
    const engine = new FilterEngine();
    const groups = engine.categorize(sessions, {
      errors: Criteria.errorsOnly(),
      cdn: Criteria.forHost("cdn"),
    });
    expect(ids(groups["errors"] ?? [])).toEqual(["2"]);
    expect(ids(groups["cdn"] ?? [])).toEqual(["3", "4"]);
  });

  it("sorts filtered sessions by start time", () => {
    const engine = new FilterEngine();
    expect(ids(engine.filterAndSort(sessions, new Criteria()))).toEqual(["2", "3", "1", "4"]);
    expect(ids(engine.filterAndSort(sessions, new Criteria(), false))).toEqual(["4", "1", "3", "2"]);
  });

  it("paginates from page zero", () => {
    const engine = new FilterEngine();
    const all = new Criteria();
    expect(ids(engine.paginate(sessions, all, 0, 3))).toEqual(["1", "2", "3"]);
    expect(ids(engine.paginate(sessions, all, 1, 3))).toEqual(["4"]);
    expect(engine.paginate(sessions, all, 2, 3)).toEqual([]);
  });

  it("reports statistics", () => {
    let tick = 0;
    const engine = new FilterEngine({ clock: () => (tick += 5) });
    expect(engine.getStatistics(sessions, Criteria.successOnly())).toEqual({
      totalSessions: 4,
      filteredSessions: 2,
      processingTimeMs: 10,
      filteringRatio: 0.5,
    });
  });

  it("gives a zero ratio for empty input", () => {
    const engine = new FilterEngine();
    expect(engine.getStatistics([], new Criteria()).filteringRatio).toBe(0);
  });

  it("tracks the last filter call when enabled", () => {
    const engine = new FilterEngine({ clock: () => 0 });
    engine.filter(sessions, new Criteria());
    expect(engine.lastStats).toBeUndefined();

    engine.trackPerformance = true;
    engine.filter(sessions, Criteria.errorsOnly());
    expect(engine.lastStats).toMatchObject({ totalSessions: 4, filteredSessions: 1 });

    engine.resetStatistics();
    expect(engine.lastStats).toBeUndefined();
  });

  it("offers preset shortcuts", () => {
    const engine = new FilterEngine();
    expect(ids(engine.successOnly(sessions))).toEqual(["1", "3"]);
    expect(ids(engine.errorsOnly(sessions))).toEqual(["2"]);
    expect(ids(engine.byHost(sessions, "cdn.y.com"))).toEqual(["3", "4"]);
    expect(ids(engine.slowRequests(sessions.slice(0, 3)))).toEqual(["3"]);
  });

  it("summarizes a session list", () => {
    const engine = new FilterEngine();
    expect(engine.summarize(sessions)).toEqual({
      total: 4,
      byState: { completed: 3, sending: 1 },
      byMethod: { GET: 3, POST: 1 },
      byStatusCode: { "200": 2, "404": 1 },
      byHost: { "api.x.com": 2, "cdn.y.com": 2 },
      averageDurationMs: 900,
    });
  });
});
