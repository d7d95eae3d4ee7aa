import { describe, it, expect } from "vitest";
import { makeSession } from "../../../tests/helpers/sessions.js";
import { buildSearchRequest, type SearchFlags } from "./search.js";

const SETTINGS = { maxSearchResults: 200, searchTimeoutMs: 5000 };

function flags(overrides: Partial<SearchFlags> = {}): SearchFlags {
  return { field: [], sort: "relevance", limit: "50", offset: "0", ...overrides };
}

describe("buildSearchRequest", () => {
  it("should map defaults onto the service config and query", () => {
    const request = buildSearchRequest("users", flags(), SETTINGS);

    expect(request.config).toEqual({
      useRegex: false,
      caseSensitive: false,
      maxResults: 200,
      timeoutMs: 5000,
    });
    expect(request.query).toEqual({
      text: "users",
      sortBy: "relevance",
      ascending: false,
      offset: 0,
      limit: 50,
    });
  });

  it("should turn --regex into regex mode rather than a URL filter", () => {
    const request = buildSearchRequest("v\\d+", flags({ regex: true, caseSensitive: true }), SETTINGS);

    expect(request.config.useRegex).toBe(true);
    expect(request.config.caseSensitive).toBe(true);
    expect(request.query.filters).toBeUndefined();
  });

  it("should read /pattern/flags as a regex", () => {
    const insensitive = buildSearchRequest("/users\\/\\d+/i", flags(), SETTINGS);
    expect(insensitive.config.useRegex).toBe(true);
    expect(insensitive.config.caseSensitive).toBe(false);
    expect(insensitive.query.text).toBe("users\\/\\d+");

    const sensitive = buildSearchRequest("/Users/", flags(), SETTINGS);
    expect(sensitive.config.caseSensitive).toBe(true);
    expect(sensitive.query.text).toBe("Users");
  });

  it("should take the text as written when --regex is given", () => {
    const request = buildSearchRequest("/a/", flags({ regex: true }), SETTINGS);

    expect(request.config.useRegex).toBe(true);
    expect(request.config.caseSensitive).toBe(false);
    expect(request.query.text).toBe("/a/");
  });

  it("should collect fields without duplicates", () => {
    const request = buildSearchRequest("x", flags({ field: ["host", "url", "host"] }), SETTINGS);

    expect(request.config.searchFields).toEqual(["host", "url"]);
  });

  it("should reject unknown fields and sort orders", () => {
    expect(() => buildSearchRequest("x", flags({ field: ["cookies"] }), SETTINGS)).toThrow(
      'Invalid --field: "cookies"'
    );
    expect(() => buildSearchRequest("x", flags({ sort: "size" }), SETTINGS)).toThrow('Invalid --sort: "size"');
  });

  it("should pass filter flags as one criteria", () => {
    const request = buildSearchRequest("x", flags({ method: "post", status: "2xx" }), SETTINGS);

    const [criteria, ...others] = request.query.filters ?? [];
    expect(others).toHaveLength(0);
    expect(criteria?.matches(makeSession({ method: "POST", status: 201 }))).toBe(true);
    expect(criteria?.matches(makeSession({ method: "GET", status: 201 }))).toBe(false);
  });

  it("should parse paging and direction", () => {
    const request = buildSearchRequest("x", flags({ sort: "timestamp", asc: true, limit: "10", offset: "20" }), SETTINGS);

    expect(request.query.sortBy).toBe("timestamp");
    expect(request.query.ascending).toBe(true);
    expect(request.query.limit).toBe(10);
    expect(request.query.offset).toBe(20);
  });

  it("should reject negative paging", () => {
    expect(() => buildSearchRequest("x", flags({ limit: "-1" }), SETTINGS)).toThrow('Invalid --limit value: "-1"');
  });
});
