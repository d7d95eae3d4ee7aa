import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";
import type { Predicate, Session } from "../shared/types.js";
import { getErrorMessage, toStorageError } from "../shared/errors.js";
import { decodeSession, encodeSession } from "../shared/serialization.js";
import { QueuedSessionStorage, type StorageOptions } from "./storage.js";
import { DEFAULT_FILE_MAX_SESSIONS, DEFAULT_FILE_RETENTION_MS } from "./file-storage.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sessions (
    id TEXT PRIMARY KEY,
    start_time INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    data TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sessions_start_time ON sessions(start_time DESC);
`;

interface Migration {
  version: number;
  description: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: "Add index on updated_at for retention sweeps",
    sql: `CREATE INDEX IF NOT EXISTS idx_sessions_updated_at ON sessions(updated_at);`,
  },
];

interface DataRow {
  id: string;
  data: string;
}

interface CountRow {
  count: number;
}

export interface SqliteStorageOptions extends StorageOptions {
  databaseFile: string;
}

function readPragmaNumber(db: Database.Database, name: string): number {
  const value: unknown = db.pragma(name, { simple: true });
  return typeof value === "number" ? value : 0;
}

/**
 * Sessions as JSON documents in one SQLite table. Retention goes by the
 * time a row was last written.
 */
export class SqliteSessionStorage extends QueuedSessionStorage {
  private readonly db: Database.Database;
  private readonly maxSessions: number;
  private readonly retentionPeriodMs: number;

  private readonly upsertStmt: Database.Statement<[string, number, number, string]>;
  private readonly selectStmt: Database.Statement<[string], DataRow>;
  private readonly selectAllStmt: Database.Statement<[], DataRow>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly countStmt: Database.Statement<[], CountRow>;

  constructor(options: SqliteStorageOptions) {
    super(options, { autoCleanup: true });
    this.maxSessions = options.maxSessions ?? DEFAULT_FILE_MAX_SESSIONS;
    this.retentionPeriodMs = options.retentionPeriodMs ?? DEFAULT_FILE_RETENTION_MS;

    try {
      fs.mkdirSync(path.dirname(options.databaseFile), { recursive: true });
      this.db = new Database(options.databaseFile);
      this.db.pragma("journal_mode = WAL");
      this.db.exec(SCHEMA);
      this.migrate();

      this.upsertStmt = this.db.prepare<[string, number, number, string]>(`
        INSERT INTO sessions (id, start_time, updated_at, data) VALUES (?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          start_time = excluded.start_time,
          updated_at = excluded.updated_at,
          data = excluded.data
      `);
      this.selectStmt = this.db.prepare<[string], DataRow>("SELECT id, data FROM sessions WHERE id = ?");
      this.selectAllStmt = this.db.prepare<[], DataRow>("SELECT id, data FROM sessions ORDER BY start_time DESC");
      this.deleteStmt = this.db.prepare<[string]>("DELETE FROM sessions WHERE id = ?");
      this.countStmt = this.db.prepare<[], CountRow>("SELECT COUNT(*) AS count FROM sessions");
    } catch (err) {
      throw toStorageError(err, `Cannot open session database ${options.databaseFile}`);
    }
  }

  /**
   * Run the migrations newer than user_version, in order, in one transaction.
   */
  private migrate(): void {
    const current = readPragmaNumber(this.db, "user_version");
    const pending = MIGRATIONS.filter((m) => m.version > current);
    if (pending.length === 0) return;

    this.db.transaction(() => {
      for (const migration of pending) {
        this.db.exec(migration.sql);
        this.db.pragma(`user_version = ${migration.version}`);
      }
    })();
  }

  protected async write(session: Session): Promise<void> {
    const data = encodeSession(session, "json");
    this.run(`save session ${session.id}`, () =>
      this.upsertStmt.run(session.id, session.startTime, this.clock(), data)
    );
  }

  protected async read(id: string): Promise<Session | undefined> {
    const row = this.run(`load session ${id}`, () => this.selectStmt.get(id));
    return row ? decodeSession(row.data, "json") : undefined;
  }

  protected async readAll(): Promise<Session[]> {
    const rows = this.run("load sessions", () => this.selectAllStmt.all());
    const sessions: Session[] = [];

    for (const row of rows) {
      try {
        sessions.push(decodeSession(row.data, "json"));
      } catch (err) {
        this.logger?.warn("Skipping unreadable session row", { id: row.id, error: getErrorMessage(err) });
      }
    }

    return sessions;
  }

  protected async remove(id: string): Promise<void> {
    this.run(`delete session ${id}`, () => this.deleteStmt.run(id));
  }

  protected async removeAll(): Promise<void> {
    this.run("delete sessions", () => this.db.exec("DELETE FROM sessions"));
  }

  /**
   * Deletes all matches in one transaction.
   */
  protected override async removeMatching(predicate: Predicate): Promise<number> {
    const matches = (await this.readAll()).filter((s) => predicate.matches(s));
    this.run("delete sessions", () =>
      this.db.transaction((ids: readonly string[]) => {
        for (const id of ids) this.deleteStmt.run(id);
      })(matches.map((s) => s.id))
    );
    return matches.length;
  }

  protected async size(): Promise<number> {
    return this.run("count sessions", () => this.countStmt.get()?.count ?? 0);
  }

  protected async bytes(): Promise<number> {
    return this.run(
      "measure database",
      () => readPragmaNumber(this.db, "page_count") * readPragmaNumber(this.db, "page_size")
    );
  }

  protected async sweep(): Promise<number> {
    const cutoff = this.clock() - this.retentionPeriodMs;

    return this.run("apply retention", () => {
      const expired = this.db.prepare<[number]>("DELETE FROM sessions WHERE updated_at < ?").run(cutoff).changes;

      const count = this.countStmt.get()?.count ?? 0;
      const excess = count - this.maxSessions;
      if (excess <= 0) return expired;

      const evicted = this.db
        .prepare<[number]>(
          `DELETE FROM sessions WHERE id IN (
            SELECT id FROM sessions ORDER BY updated_at ASC LIMIT ?
          )`
        )
        .run(excess).changes;

      return expired + evicted;
    });
  }

  protected override async dispose(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private run<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw toStorageError(err, `Failed to ${action}`);
    }
  }
}
