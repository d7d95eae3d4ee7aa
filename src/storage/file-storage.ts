import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { validate as isUuid } from "uuid";
import type { Session } from "../shared/types.js";
import { StorageError, getErrorMessage, toStorageError } from "../shared/errors.js";
import {
  decodeSession,
  decodeSessions,
  encodeSession,
  encodeSessions,
  formatFromPath,
  type SessionFormat,
} from "../shared/serialization.js";
import { QueuedSessionStorage, byStartTimeDescending, type StorageOptions } from "./storage.js";

export const DEFAULT_FILE_MAX_SESSIONS = 10_000;
export const DEFAULT_FILE_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

export interface FileStorageOptions extends StorageOptions {
  /** Created if missing */
  directory: string;
  format?: SessionFormat;
}

interface SessionFile {
  filePath: string;
  mtimeMs: number;
  size: number;
}

/**
 * One `<uuid>.<format>` file per session in a single directory.
 */
export class FileSessionStorage extends QueuedSessionStorage {
  readonly directory: string;
  readonly format: SessionFormat;
  private readonly maxSessions: number;
  private readonly retentionPeriodMs: number;

  constructor(options: FileStorageOptions) {
    super(options, { autoCleanup: true });
    this.directory = options.directory;
    this.format = options.format ?? "json";
    this.maxSessions = options.maxSessions ?? DEFAULT_FILE_MAX_SESSIONS;
    this.retentionPeriodMs = options.retentionPeriodMs ?? DEFAULT_FILE_RETENTION_MS;

    try {
      fs.mkdirSync(this.directory, { recursive: true });
    } catch (err) {
      throw toStorageError(err, `Cannot create session directory ${this.directory}`, "permission-denied");
    }
  }

  /**
   * Write sessions to one array document. The format defaults to the file
   * extension, then JSON.
   */
  exportSessions(sessions: readonly Session[], filePath: string, format?: SessionFormat): Promise<void> {
    return this.queue.run(async () => {
      const written = await writeSessionsFile(sessions, filePath, format);
      this.logger?.info("Exported sessions", { count: sessions.length, filePath, format: written });
    });
  }

  /**
   * Read an array document written by exportSessions. Nothing is saved.
   */
  importSessions(filePath: string, format?: SessionFormat): Promise<Session[]> {
    return this.queue.run(() => readSessionsFile(filePath, format));
  }

  protected async write(session: Session): Promise<void> {
    const filePath = this.pathFor(session.id);
    const text = encodeSession(session, this.format);
    try {
      await fsp.writeFile(filePath, text, "utf-8");
    } catch (err) {
      throw toStorageError(err, `Failed to write session ${session.id}`, "permission-denied");
    }
    this.logger?.trace("Saved session", { id: session.id });
  }

  protected async read(id: string): Promise<Session | undefined> {
    const filePath = this.pathFor(id);
    let text: string;
    try {
      text = await fsp.readFile(filePath, "utf-8");
    } catch (err) {
      const mapped = toStorageError(err, `Failed to read session ${id}`);
      if (mapped.code === "not-found") return undefined;
      throw mapped;
    }
    return decodeSession(text, this.format);
  }

  protected async readAll(): Promise<Session[]> {
    const files = await this.listFiles();
    const sessions: Session[] = [];

    for (const file of files) {
      try {
        sessions.push(decodeSession(await fsp.readFile(file.filePath, "utf-8"), this.format));
      } catch (err) {
        this.logger?.warn("Skipping unreadable session file", {
          file: file.filePath,
          error: getErrorMessage(err),
        });
      }
    }

    return sessions.sort(byStartTimeDescending);
  }

  protected async remove(id: string): Promise<void> {
    await this.unlink(this.pathFor(id));
  }

  protected async removeAll(): Promise<void> {
    for (const file of await this.listFiles()) {
      await this.unlink(file.filePath);
    }
  }

  protected async size(): Promise<number> {
    return (await this.listFiles()).length;
  }

  protected async bytes(): Promise<number> {
    return (await this.listFiles()).reduce((total, file) => total + file.size, 0);
  }

  /**
   * Delete files modified longer ago than the retention period, then the
   * oldest-modified files beyond `maxSessions`.
   */
  protected async sweep(): Promise<number> {
    const cutoff = this.clock() - this.retentionPeriodMs;
    let removed = 0;
    const kept: SessionFile[] = [];

    for (const file of await this.listFiles()) {
      if (file.mtimeMs < cutoff) {
        await this.unlink(file.filePath);
        removed++;
      } else {
        kept.push(file);
      }
    }

    const excess = kept.length - this.maxSessions;
    if (excess > 0) {
      kept.sort((a, b) => a.mtimeMs - b.mtimeMs);
      for (const file of kept.slice(0, excess)) {
        await this.unlink(file.filePath);
        removed++;
      }
    }

    return removed;
  }

  /**
   * Only UUIDs become file names, so an id can never point outside the
   * directory.
   */
  private pathFor(id: string): string {
    if (!isUuid(id)) {
      throw new StorageError("invalid-format", `Session id "${id}" is not a UUID`);
    }
    return path.join(this.directory, `${id.toLowerCase()}.${this.format}`);
  }

  private async listFiles(): Promise<SessionFile[]> {
    let names: string[];
    try {
      names = await fsp.readdir(this.directory);
    } catch (err) {
      throw toStorageError(err, `Failed to list ${this.directory}`, "permission-denied");
    }

    const suffix = `.${this.format}`;
    const files: SessionFile[] = [];

    for (const name of names) {
      if (!name.endsWith(suffix) || name.startsWith(".")) continue;

      const filePath = path.join(this.directory, name);
      try {
        const stats = await fsp.stat(filePath);
        if (stats.isFile()) {
          files.push({ filePath, mtimeMs: stats.mtimeMs, size: stats.size });
        }
      } catch (err) {
        // Removed between readdir and stat
        if (toStorageError(err, filePath).code !== "not-found") {
          throw toStorageError(err, `Failed to stat ${filePath}`, "permission-denied");
        }
      }
    }

    return files;
  }

  private async unlink(filePath: string): Promise<void> {
    try {
      await fsp.rm(filePath, { force: true });
    } catch (err) {
      throw toStorageError(err, `Failed to delete ${filePath}`, "permission-denied");
    }
  }
}

/**
 * Write sessions to one array document; returns the format used.
 */
export async function writeSessionsFile(
  sessions: readonly Session[],
  filePath: string,
  format?: SessionFormat
): Promise<SessionFormat> {
  const resolved = format ?? formatFromPath(filePath) ?? "json";
  const text = encodeSessions(sessions, resolved);
  try {
    await fsp.writeFile(filePath, text, "utf-8");
  } catch (err) {
    throw toStorageError(err, `Failed to write ${filePath}`, "permission-denied");
  }
  return resolved;
}

export async function readSessionsFile(filePath: string, format?: SessionFormat): Promise<Session[]> {
  const resolved = format ?? formatFromPath(filePath) ?? "json";
  let text: string;
  try {
    text = await fsp.readFile(filePath, "utf-8");
  } catch (err) {
    throw toStorageError(err, `Failed to read ${filePath}`, "permission-denied");
  }
  return decodeSessions(text, resolved);
}
