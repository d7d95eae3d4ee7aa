import * as fs from "node:fs";
import * as path from "node:path";
import { getNetrecallPaths } from "./project.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type Component = "storage" | "search" | "filter" | "cli";

type LogData = Record<string, unknown>;

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: Component;
  msg: string;
  data?: LogData;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const DEFAULT_MAX_LOG_SIZE = 10 * 1024 * 1024;

/** Buffered lines are written after this delay */
const FLUSH_DELAY_MS = 100;

export interface LoggerOptions {
  maxLogSize?: number;
}

/**
 * JSON-lines file logger. Lines are buffered and appended in batches;
 * the file is rotated to `<file>.1` once it reaches `maxLogSize`.
 *
 * Logging never throws. After the first failed write the logger stops
 * touching the file and drops further output.
 */
export class Logger {
  private stream: fs.WriteStream | null = null;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private dirEnsured = false;
  private broken = false;
  private readonly maxLogSize: number;

  constructor(
    private readonly component: Component,
    private readonly logFile: string,
    private readonly level: LogLevel = "warn",
    options?: LoggerOptions
  ) {
    this.maxLogSize = options?.maxLogSize ?? DEFAULT_MAX_LOG_SIZE;
  }

  /**
   * Logger for another component writing to the same file at the same level.
   */
  forComponent(component: Component): Logger {
    return new Logger(component, this.logFile, this.level, { maxLogSize: this.maxLogSize });
  }

  error(msg: string, data?: LogData): void {
    this.log("error", msg, data);
  }

  warn(msg: string, data?: LogData): void {
    this.log("warn", msg, data);
  }

  info(msg: string, data?: LogData): void {
    this.log("info", msg, data);
  }

  debug(msg: string, data?: LogData): void {
    this.log("debug", msg, data);
  }

  trace(msg: string, data?: LogData): void {
    this.log("trace", msg, data);
  }

  isEnabled(level: LogLevel): boolean {
    return level !== "silent" && LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.level];
  }

  /**
   * Write out whatever is buffered and close the stream. The final lines are
   * appended synchronously so nothing is lost at exit.
   */
  close(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.stream) {
      this.stream.end();
      this.stream = null;
    }

    const lines = this.buffer;
    this.buffer = [];
    for (const line of lines) {
      if (this.broken) break;
      this.attempt(() => {
        this.ensureDir();
        this.rotateIfNeeded();
        fs.appendFileSync(this.logFile, line, "utf-8");
      });
    }
  }

  private log(level: LogLevel, msg: string, data?: LogData): void {
    if (this.broken || !this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.component,
      msg,
      ...(data !== undefined && { data }),
    };

    this.buffer.push(JSON.stringify(entry) + "\n");
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer !== null) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush();
    }, FLUSH_DELAY_MS);
    // Pending log output never keeps the process alive
    this.flushTimer.unref();
  }

  private flush(): void {
    if (this.buffer.length === 0) {
      return;
    }

    const data = this.buffer.join("");
    this.buffer = [];

    this.attempt(() => {
      this.rotateIfNeeded();
      this.ensureStream().write(data);
    });
  }

  /**
   * Run a filesystem step; a failure marks the logger broken.
   */
  private attempt(step: () => void): void {
    try {
      step();
    } catch {
      this.markBroken();
    }
  }

  private markBroken(): void {
    this.broken = true;
    this.buffer = [];
    if (this.stream) {
      this.stream.destroy();
      this.stream = null;
    }
  }

  private ensureDir(): void {
    if (this.dirEnsured) {
      return;
    }
    fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    this.dirEnsured = true;
  }

  private ensureStream(): fs.WriteStream {
    if (this.stream) {
      return this.stream;
    }

    this.ensureDir();
    const stream = fs.createWriteStream(this.logFile, { flags: "a" });
    stream.on("error", () => this.markBroken());
    this.stream = stream;
    return stream;
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.logFile)) {
      return;
    }
    if (fs.statSync(this.logFile).size < this.maxLogSize) {
      return;
    }

    if (this.stream) {
      this.stream.end();
      this.stream = null;
    }

    const rotatedPath = this.logFile + ".1";
    fs.rmSync(rotatedPath, { force: true });
    fs.renameSync(this.logFile, rotatedPath);
  }
}

/**
 * Create a logger writing to the project's `.netrecall/netrecall.log`.
 */
export function createLogger(
  component: Component,
  projectRoot: string,
  level: LogLevel = "warn",
  options?: LoggerOptions
): Logger {
  return new Logger(component, getNetrecallPaths(projectRoot).logFile, level, options);
}

/**
 * Map a `-v` count to a level: 0 warn, 1 info, 2 debug, 3+ trace.
 */
export function parseVerbosity(verboseCount: number): LogLevel {
  if (verboseCount <= 0) return "warn";
  if (verboseCount === 1) return "info";
  if (verboseCount === 2) return "debug";
  return "trace";
}
