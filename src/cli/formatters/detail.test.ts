import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { FilterEngine } from "../../filter/engine.js";
import { makeSession } from "../../../tests/helpers/sessions.js";
import { formatSessionDetail, formatStorageStats } from "./detail.js";

const ID = "a1b2c3d4-e5f6-4890-abcd-ef1234567890";

beforeEach(() => {
  vi.stubEnv("NO_COLOR", "1");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("formatSessionDetail", () => {
  const session = makeSession({
    id: ID,
    status: 200,
    durationMs: 45,
    requestHeaders: { Accept: "application/json", Authorization: "Bearer test-secret" },
    responseHeaders: { "content-type": "application/json" },
    responseBody: '{"users":[]}',
  });

  it("should start with method, URL, status and duration", () => {
    const lines = formatSessionDetail(session).split("\n");

    expect(lines[0]).toBe("  GET https://api.example.com/v1/items → 200 OK (45ms)");
    expect(lines[1]).toBe(`  ${ID}`);
  });

  it("should show state and timestamps", () => {
    const lines = formatSessionDetail(session).split("\n");

    expect(lines).toContain("  State:    completed");
    expect(lines).toContain("  Started:  2023-11-14T22:13:20.000Z");
    expect(lines).toContain("  Ended:    2023-11-14T22:13:20.045Z");
  });

  it("should mask authorisation headers", () => {
    const lines = formatSessionDetail(session).split("\n");

    expect(lines).toContain("    Accept: application/json");
    expect(lines).toContain("    Authorization: Bearer ***");
    expect(lines.join("\n")).not.toContain("test-secret");
  });

  it("should preview a text response body with its size and type", () => {
    const lines = formatSessionDetail(session).split("\n");

    expect(lines).toContain("  Response Body (12B, json)");
    const start = lines.indexOf("  Response Body (12B, json)");
    expect(lines.slice(start + 1, start + 4)).toEqual(["    {", '      "users": []', "    }"]);
  });

  it("should print JSON that does not parse as sent", () => {
    const broken = makeSession({
      status: 200,
      responseHeaders: { "content-type": "application/problem+json" },
      responseBody: '{"title":',
    });

    const lines = formatSessionDetail(broken).split("\n");

    expect(lines).toContain("  Response Body (9B, json)");
    expect(lines).toContain('    {"title":');
  });

  it("should show a declared text body even when some bytes do not decode", () => {
    const text = makeSession({ status: 200, responseHeaders: { "content-type": "text/plain; charset=utf-8" } });
    const withBody = {
      ...text,
      response: text.response && { ...text.response, body: Buffer.from([0x68, 0x69, 0xff]) },
    };

    const lines = formatSessionDetail(withBody).split("\n");

    expect(lines).toContain("  Response Body (3B, plain)");
    expect(lines).toContain("    hi\uFFFD");
  });

  it("should mark binary bodies instead of printing them", () => {
    const binary = makeSession({
      status: 200,
      responseHeaders: { "content-type": "application/octet-stream" },
    });
    const withBody = {
      ...binary,
      response: binary.response && { ...binary.response, body: Buffer.from([0xff, 0xfe, 0xfd]) },
    };

    const lines = formatSessionDetail(withBody).split("\n");

    expect(lines).toContain("  Response Body (3B, octet-stream)");
    expect(lines).toContain("    (binary)");
  });

  it("should show the error of a failed session", () => {
    const failed = makeSession({ status: 0, state: "failed", error: "connect ECONNREFUSED" });
    const lines = formatSessionDetail(failed).split("\n");

    expect(lines[0]).toBe("  GET https://api.example.com/v1/items → failed (100ms)");
    expect(lines).toContain("  Error:    connect ECONNREFUSED");
  });

  it("should list metadata and retries", () => {
    const tagged = makeSession({
      status: 204,
      retryCount: 2,
      metadata: { source: { type: "string", value: "import" } },
    });
    const lines = formatSessionDetail(tagged).split("\n");

    expect(lines[0]).toBe("  GET https://api.example.com/v1/items → 204 No Content (100ms)");
    expect(lines).toContain("  Retries:  2");
    expect(lines).toContain("  Metadata");
    expect(lines).toContain("    source: import");
  });

  it("should measure an unfinished session against now", () => {
    const pending = makeSession({ state: "sending" });
    const lines = formatSessionDetail(pending, 1_700_000_000_250).split("\n");

    expect(lines[0]).toBe("  GET https://api.example.com/v1/items → sending (250ms)");
    expect(lines.some((line) => line.startsWith("  Ended:"))).toBe(false);
  });
});

describe("formatStorageStats", () => {
  it("should show usage and breakdowns", () => {
    const sessions = [
      makeSession({ status: 200 }),
      makeSession({ status: 404, method: "POST" }),
    ];
    const summary = new FilterEngine().summarize(sessions);

    const lines = formatStorageStats({
      backend: "sqlite",
      location: "/tmp/sessions.db",
      count: 2,
      bytes: 8192,
      summary,
    }).split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "  Backend:   sqlite",
      "  Location:  /tmp/sessions.db",
      "  Sessions:  2",
      "  Size:      8.0KB",
      "  Average:   100ms",
    ]);
    expect(lines).toContain(`    ${"completed".padEnd(24)} 2`);
    expect(lines).toContain(`    ${"api.example.com".padEnd(24)} 2`);

    const methods = lines.indexOf("  By method");
    expect(lines.slice(methods + 1, methods + 3)).toEqual([
      `    ${"GET".padEnd(24)} 1`,
      `    ${"POST".padEnd(24)} 1`,
    ]);
  });
});
