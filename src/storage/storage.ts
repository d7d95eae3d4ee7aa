import type { Predicate, Session } from "../shared/types.js";
import type { Logger } from "../shared/logger.js";
import { SerialQueue } from "../shared/serial-queue.js";

/**
 * Persistence contract shared by every backend.
 *
 * Each call is atomic on its own; nothing is atomic across calls. `saveAll`
 * is not all-or-nothing: sessions written before a failure stay written.
 */
export interface SessionStorage {
  /** Insert, or replace the session with the same id. */
  save(session: Session): Promise<void>;
  saveAll(sessions: readonly Session[]): Promise<void>;
  load(id: string): Promise<Session | undefined>;
  /** Every readable session, newest start time first. */
  loadAll(): Promise<Session[]>;
  loadMatching(predicate: Predicate): Promise<Session[]>;
  /** Deleting an unknown id is not an error. */
  delete(id: string): Promise<void>;
  deleteAll(): Promise<void>;
  /** Returns how many sessions were removed. */
  deleteMatching(predicate: Predicate): Promise<number>;
  count(): Promise<number>;
  /** Bytes used by the stored sessions. */
  storageSize(): Promise<number>;
  /** Wait for queued work, then release resources. */
  close(): Promise<void>;
}

export interface RetentionOptions {
  maxSessions?: number;
  /** Run cleanup after every successful save */
  autoCleanup?: boolean;
  retentionPeriodMs?: number;
}

export interface StorageOptions extends RetentionOptions {
  logger?: Logger;
  /** Wall clock in epoch ms, used for retention */
  clock?: () => number;
}

export function byStartTimeDescending(a: Session, b: Session): number {
  return b.startTime - a.startTime;
}

/**
 * Runs every public operation on a single serial queue. Subclasses supply
 * the unqueued primitives; those must never call the public methods, which
 * would wait on the queue they are running in.
 */
export abstract class QueuedSessionStorage implements SessionStorage {
  protected readonly queue = new SerialQueue();
  protected readonly logger: Logger | undefined;
  protected readonly clock: () => number;
  protected readonly autoCleanup: boolean;

  constructor(options: StorageOptions, defaults: { autoCleanup: boolean }) {
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.autoCleanup = options.autoCleanup ?? defaults.autoCleanup;
  }

  protected abstract write(session: Session): Promise<void>;
  protected abstract read(id: string): Promise<Session | undefined>;
  protected abstract readAll(): Promise<Session[]>;
  protected abstract remove(id: string): Promise<void>;
  protected abstract removeAll(): Promise<void>;
  protected abstract size(): Promise<number>;
  protected abstract bytes(): Promise<number>;
  /** Apply retention; returns how many sessions were removed. */
  protected abstract sweep(): Promise<number>;

  protected async dispose(): Promise<void> {}

  save(session: Session): Promise<void> {
    return this.queue.run(async () => {
      await this.write(session);
      await this.afterSave();
    });
  }

  saveAll(sessions: readonly Session[]): Promise<void> {
    return this.queue.run(async () => {
      for (const session of sessions) {
        await this.write(session);
      }
      await this.afterSave();
    });
  }

  load(id: string): Promise<Session | undefined> {
    return this.queue.run(() => this.read(id));
  }

  loadAll(): Promise<Session[]> {
    return this.queue.run(() => this.readAll());
  }

  loadMatching(predicate: Predicate): Promise<Session[]> {
    return this.queue.run(async () => (await this.readAll()).filter((s) => predicate.matches(s)));
  }

  delete(id: string): Promise<void> {
    return this.queue.run(() => this.remove(id));
  }

  deleteAll(): Promise<void> {
    return this.queue.run(() => this.removeAll());
  }

  deleteMatching(predicate: Predicate): Promise<number> {
    return this.queue.run(() => this.removeMatching(predicate));
  }

  count(): Promise<number> {
    return this.queue.run(() => this.size());
  }

  storageSize(): Promise<number> {
    return this.queue.run(() => this.bytes());
  }

  /**
   * Apply retention now, whether or not automatic cleanup is on.
   */
  cleanup(): Promise<number> {
    return this.queue.run(() => this.sweep());
  }

  async close(): Promise<void> {
    await this.queue.drain();
    await this.dispose();
  }

  /**
   * Find and delete matches inside one queued task, so no save can land
   * between the scan and the deletes.
   */
  protected async removeMatching(predicate: Predicate): Promise<number> {
    const matches = (await this.readAll()).filter((s) => predicate.matches(s));
    for (const session of matches) {
      await this.remove(session.id);
    }
    return matches.length;
  }

  private async afterSave(): Promise<void> {
    if (!this.autoCleanup) return;

    const removed = await this.sweep();
    if (removed > 0) {
      this.logger?.debug("Retention removed sessions", { removed });
    }
  }
}
