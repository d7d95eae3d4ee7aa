import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import Database from "better-sqlite3";
import { SqliteSessionStorage } from "./sqlite-storage.js";
import { Criteria } from "../filter/criteria.js";
import { makeSession, ids } from "../../tests/helpers/sessions.js";

describe("SqliteSessionStorage", () => {
  let tempDir: string;
  let dbPath: string;
  let now: number;
  let storage: SqliteSessionStorage;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "netrecall-sqlite-storage-"));
    dbPath = path.join(tempDir, "nested", "sessions.db");
    now = 1000;
    storage = new SqliteSessionStorage({ databaseFile: dbPath, clock: () => now, autoCleanup: false });
  });

  afterEach(async () => {
    await storage.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("stores the schema version on a fresh database", () => {
    const db = new Database(dbPath, { readonly: true });
    try {
      expect(db.pragma("user_version", { simple: true })).toBe(1);
    } finally {
      db.close();
    }
  });

  it("creates the retention index through its migration", () => {
    const db = new Database(dbPath, { readonly: true });
    try {
      const indexes = db
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'sessions' AND name LIKE 'idx_%' ORDER BY name"
        )
        .all()
        .map((row) => row.name);
      expect(indexes).toEqual(["idx_sessions_start_time", "idx_sessions_updated_at"]);
    } finally {
      db.close();
    }
  });

  it("migrates a database written before the retention index", async () => {
    await storage.close();
    const legacyPath = path.join(tempDir, "legacy.db");
    const legacy = new Database(legacyPath);
    legacy.exec(
      "CREATE TABLE sessions (id TEXT PRIMARY KEY, start_time INTEGER NOT NULL, updated_at INTEGER NOT NULL, data TEXT NOT NULL)"
    );
    legacy.close();

    storage = new SqliteSessionStorage({ databaseFile: legacyPath, clock: () => now, autoCleanup: false });

    const db = new Database(legacyPath, { readonly: true });
    try {
      expect(db.pragma("user_version", { simple: true })).toBe(1);
      const index = db
        .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'index' AND name = ?")
        .get("idx_sessions_updated_at");
      expect(index?.name).toBe("idx_sessions_updated_at");
    } finally {
      db.close();
    }
  });

  it("round-trips a session", async () => {
    const session = makeSession({
      id: "a",
      method: "POST",
      requestBody: '{"q":1}',
      status: 201,
      responseHeaders: { "Content-Type": "application/json" },
      responseBody: '{"id":7}',
      metadata: { attempt: { type: "int", value: 2 } },
    });
    await storage.save(session);
    expect(await storage.load("a")).toEqual(session);
  });

  it("replaces a session saved twice", async () => {
    await storage.save(makeSession({ id: "a", status: 200 }));
    await storage.save(makeSession({ id: "a", status: 404 }));

    expect(await storage.count()).toBe(1);
    expect((await storage.load("a"))?.response?.statusCode).toBe(404);
  });

  it("returns undefined for an unknown id and ignores deleting one", async () => {
    expect(await storage.load("missing")).toBeUndefined();
    await expect(storage.delete("missing")).resolves.toBeUndefined();
  });

  it("lists sessions newest first", async () => {
    await storage.saveAll([
      makeSession({ id: "old", startTime: 1000 }),
      makeSession({ id: "new", startTime: 3000 }),
      makeSession({ id: "mid", startTime: 2000 }),
    ]);
    expect(ids(await storage.loadAll())).toEqual(["new", "mid", "old"]);
  });

  it("keeps sessions after reopening", async () => {
    await storage.save(makeSession({ id: "kept" }));
    await storage.close();

    storage = new SqliteSessionStorage({ databaseFile: dbPath, clock: () => now, autoCleanup: false });
    expect(ids(await storage.loadAll())).toEqual(["kept"]);
  });

  it("skips rows that cannot be decoded", async () => {
    await storage.save(makeSession({ id: "good" }));

    const db = new Database(dbPath);
    try {
      db.prepare("INSERT INTO sessions (id, start_time, updated_at, data) VALUES (?, ?, ?, ?)").run(
        "bad",
        0,
        0,
        "{not json"
      );
    } finally {
      db.close();
    }

    expect(ids(await storage.loadAll())).toEqual(["good"]);
    await expect(storage.load("bad")).rejects.toMatchObject({ code: "decode-failed" });
  });

  it("expires sessions by the time they were last written", async () => {
    await storage.close();
    storage = new SqliteSessionStorage({
      databaseFile: dbPath,
      clock: () => now,
      retentionPeriodMs: 2000,
      autoCleanup: false,
    });

    await storage.save(makeSession({ id: "stale" }));
    now = 5000;
    await storage.save(makeSession({ id: "fresh" }));
    now = 6000;

    expect(await storage.cleanup()).toBe(1);
    expect(ids(await storage.loadAll())).toEqual(["fresh"]);
  });

  it("evicts the least recently written sessions beyond the limit", async () => {
    await storage.close();
    storage = new SqliteSessionStorage({ databaseFile: dbPath, clock: () => now, maxSessions: 2 });

    now = 1;
    await storage.save(makeSession({ id: "a" }));
    now = 2;
    await storage.save(makeSession({ id: "b" }));
    now = 3;
    await storage.save(makeSession({ id: "c" }));

    expect(await storage.load("a")).toBeUndefined();
    expect(await storage.count()).toBe(2);
  });

  it("deletes matching sessions and reports how many", async () => {
    await storage.saveAll([
      makeSession({ id: "a", url: "https://api.example.com/a" }),
      makeSession({ id: "b", url: "https://cdn.example.com/b" }),
      makeSession({ id: "c", url: "https://api.example.com/c" }),
    ]);

    expect(await storage.deleteMatching(Criteria.forHost("api.example.com"))).toBe(2);
    expect(ids(await storage.loadAll())).toEqual(["b"]);

    await storage.deleteAll();
    expect(await storage.count()).toBe(0);
  });

  it("measures the database in whole pages", async () => {
    await storage.save(makeSession({ id: "a" }));
    const size = await storage.storageSize();
    expect(size).toBeGreaterThan(0);
    expect(size % 512).toBe(0);
  });
});
