import type { Session } from "../shared/types.js";
import { CapacityError, getErrorMessage } from "../shared/errors.js";
import { encodeSession } from "../shared/serialization.js";
import {
  QueuedSessionStorage,
  byStartTimeDescending,
  type SessionStorage,
  type StorageOptions,
} from "./storage.js";

export const DEFAULT_MEMORY_MAX_SESSIONS = 1000;
export const DEFAULT_MEMORY_RETENTION_MS = 60 * 60 * 1000;
export const DEFAULT_MAX_MEMORY_USAGE = 100 * 1024 * 1024;

export interface MemoryStorageOptions extends StorageOptions {
  /** Reported in statistics only; never enforced */
  maxMemoryUsage?: number;
}

export interface MemoryStatistics {
  sessionCount: number;
  /** Size of the sessions encoded as JSON */
  estimatedBytes: number;
  maxSessions: number;
  maxMemoryUsage: number;
  memoryUsageRatio: number;
  sessionCountRatio: number;
}

export interface ImportOptions {
  /** Delete everything held before importing */
  replaceExisting?: boolean;
}

/**
 * Volatile storage. Retention is by last access: saving or loading a
 * session refreshes it.
 */
export class MemorySessionStorage extends QueuedSessionStorage {
  private readonly sessions = new Map<string, Session>();
  /** Ids in first-insertion order */
  private order: string[] = [];
  private readonly accessedAt = new Map<string, number>();
  private readonly maxSessions: number;
  private readonly retentionPeriodMs: number;
  private readonly maxMemoryUsage: number;

  constructor(options: MemoryStorageOptions = {}) {
    super(options, { autoCleanup: true });
    this.maxSessions = options.maxSessions ?? DEFAULT_MEMORY_MAX_SESSIONS;
    this.retentionPeriodMs = options.retentionPeriodMs ?? DEFAULT_MEMORY_RETENTION_MS;
    this.maxMemoryUsage = options.maxMemoryUsage ?? DEFAULT_MAX_MEMORY_USAGE;
  }

  statistics(): Promise<MemoryStatistics> {
    return this.queue.run(async () => {
      const estimatedBytes = await this.bytes();
      return {
        sessionCount: this.sessions.size,
        estimatedBytes,
        maxSessions: this.maxSessions,
        maxMemoryUsage: this.maxMemoryUsage,
        memoryUsageRatio: this.maxMemoryUsage > 0 ? estimatedBytes / this.maxMemoryUsage : 0,
        sessionCountRatio: this.maxSessions > 0 ? this.sessions.size / this.maxSessions : 0,
      };
    });
  }

  /**
   * The `limit` most recently saved or loaded sessions, most recent first.
   */
  recentlyAccessed(limit: number): Promise<Session[]> {
    return this.queue.run(async () => {
      const recent = [...this.accessedAt.entries()].sort((a, b) => b[1] - a[1]).slice(0, Math.max(0, limit));
      const result: Session[] = [];
      for (const [id] of recent) {
        const session = this.sessions.get(id);
        if (session) result.push(session);
      }
      return result;
    });
  }

  /**
   * Copy every held session into another storage. Returns the count copied.
   */
  async exportTo(target: SessionStorage): Promise<number> {
    const sessions = await this.loadAll();
    await target.saveAll(sessions);
    return sessions.length;
  }

  /**
   * Copy every session of another storage into this one. Returns the count
   * imported.
   */
  async importFrom(source: SessionStorage, options: ImportOptions = {}): Promise<number> {
    const sessions = await source.loadAll();
    if (options.replaceExisting) {
      await this.deleteAll();
    }
    await this.saveAll(sessions);
    return sessions.length;
  }

  /**
   * Rejects a new id once `maxSessions` are held. Replacing an existing id
   * always succeeds.
   */
  protected async write(session: Session): Promise<void> {
    const isNew = !this.sessions.has(session.id);
    if (isNew && this.sessions.size >= this.maxSessions) {
      throw new CapacityError(this.maxSessions);
    }

    this.sessions.set(session.id, session);
    this.accessedAt.set(session.id, this.clock());
    if (isNew) {
      this.order.push(session.id);
    }
  }

  protected async read(id: string): Promise<Session | undefined> {
    const session = this.sessions.get(id);
    if (session) {
      this.accessedAt.set(id, this.clock());
    }
    return session;
  }

  protected async readAll(): Promise<Session[]> {
    return [...this.sessions.values()].sort(byStartTimeDescending);
  }

  protected async remove(id: string): Promise<void> {
    this.forget([id]);
  }

  protected async removeAll(): Promise<void> {
    this.sessions.clear();
    this.accessedAt.clear();
    this.order = [];
  }

  protected async size(): Promise<number> {
    return this.sessions.size;
  }

  protected async bytes(): Promise<number> {
    let total = 0;
    for (const session of this.sessions.values()) {
      try {
        total += Buffer.byteLength(encodeSession(session), "utf-8");
      } catch (err) {
        this.logger?.warn("Skipping session that cannot be encoded", {
          id: session.id,
          error: getErrorMessage(err),
        });
      }
    }
    return total;
  }

  /**
   * Drop sessions not accessed within the retention period, then the
   * earliest inserted beyond `maxSessions`.
   */
  protected async sweep(): Promise<number> {
    const before = this.sessions.size;
    const cutoff = this.clock() - this.retentionPeriodMs;

    const expired = [...this.accessedAt.entries()].filter(([, at]) => at < cutoff).map(([id]) => id);
    this.forget(expired);

    const excess = this.order.length - this.maxSessions;
    if (excess > 0) {
      this.forget(this.order.slice(0, excess));
    }

    return before - this.sessions.size;
  }

  private forget(ids: readonly string[]): void {
    if (ids.length === 0) return;

    const gone = new Set(ids);
    for (const id of gone) {
      this.sessions.delete(id);
      this.accessedAt.delete(id);
    }
    this.order = this.order.filter((id) => !gone.has(id));
  }
}
