import { describe, it, expect } from "vitest";
import {
  decodeSession,
  decodeSessions,
  encodeSession,
  encodeSessions,
  formatFromPath,
} from "./serialization.js";
import { setMetadata } from "./session.js";
import { StorageError } from "./errors.js";
import { makeSession } from "../../tests/helpers/sessions.js";

const rich = setMetadata(
  makeSession({
    url: "https://api.example.com/upload?x=1",
    method: "POST",
    requestHeaders: { "Content-Type": "application/json" },
    requestBody: '{"name":"test"}',
    status: 201,
    responseHeaders: { "Content-Type": "application/json; charset=utf-8" },
    responseBody: '{"id":7}',
    durationMs: 35,
    retryCount: 1,
  }),
  "seenAt",
  { type: "date", value: 1_700_000_000_500 }
);

describe("JSON encoding", () => {
  it("restores every field", () => {
    const decoded = decodeSession(encodeSession(rich));
    expect(decoded).toEqual(rich);
    expect(decoded.request.body?.toString()).toBe('{"name":"test"}');
    expect(decoded.response?.charset).toBe("utf-8");
  });

  it("writes ISO dates, base64 bodies and sorted keys", () => {
    const doc: unknown = JSON.parse(encodeSession(rich));
    expect(doc).toMatchObject({
      startTime: "2023-11-14T22:13:20.000Z",
      request: { body: Buffer.from('{"name":"test"}').toString("base64") },
      metadata: { seenAt: { type: "date", value: "2023-11-14T22:13:20.500Z" } },
    });
    const keys = Object.keys(doc ?? {});
    expect(keys).toEqual([...keys].sort());
  });

  it("omits absent optional fields", () => {
    const doc: unknown = JSON.parse(encodeSession(makeSession({ id: "a" })));
    expect(doc).not.toHaveProperty("response");
    expect(doc).not.toHaveProperty("endTime");
  });
});

describe("plist encoding", () => {
  it("restores every field", () => {
    const text = encodeSession(rich, "plist");
    expect(text).toContain("<plist");
    expect(decodeSession(text, "plist")).toEqual(rich);
  });

  it("handles lists of sessions", () => {
    const sessions = [rich, makeSession({ status: 404, url: "https://cdn.example.net/a.png" })];
    const decoded = decodeSessions(encodeSessions(sessions, "plist"), "plist");
    expect(decoded.map((s) => s.id)).toEqual(sessions.map((s) => s.id));
  });
});

describe("decoding failures", () => {
  it("reports unparseable text as decode-failed", () => {
    expect(() => decodeSession("{not json")).toThrow(StorageError);
    try {
      decodeSession("{not json");
    } catch (err) {
      expect(err).toMatchObject({ code: "decode-failed" });
    }
  });

  it("reports schema violations as corrupted-data with the offending path", () => {
    const doc = JSON.parse(encodeSession(rich));
    doc.request.method = "BREW";
    expect(() => decodeSession(JSON.stringify(doc))).toThrow(/request\.method/);
    try {
      decodeSession(JSON.stringify(doc));
    } catch (err) {
      expect(err).toMatchObject({ code: "corrupted-data" });
    }
  });

  it("fills defaults for fields older records lack", () => {
    const doc = JSON.parse(encodeSession(makeSession({ id: "legacy" })));
    delete doc.metadata;
    delete doc.relatedSessionIds;
    delete doc.retryCount;
    const decoded = decodeSession(JSON.stringify(doc));
    expect(decoded.metadata).toEqual({});
    expect(decoded.relatedSessionIds).toEqual([]);
    expect(decoded.retryCount).toBe(0);
  });
});

describe("encoding failures", () => {
  it("reports invalid dates as encode-failed", () => {
    const session = makeSession({ metadata: { seen: { type: "date", value: NaN } } });

    expect(() => encodeSession(session)).toThrow(StorageError);
    expect(() => encodeSessions([session], "plist")).toThrow(/^Failed to encode sessions: /);
    try {
      encodeSession(session);
    } catch (err) {
      expect(err).toMatchObject({ code: "encode-failed" });
    }
  });
});

describe("formatFromPath", () => {
  it("maps known extensions", () => {
    expect(formatFromPath("/tmp/out.json")).toBe("json");
    expect(formatFromPath("backup.PLIST")).toBe("plist");
    expect(formatFromPath("notes.txt")).toBeUndefined();
  });
});
