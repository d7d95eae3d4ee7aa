import * as fs from "node:fs";
import { createLogger, type LogLevel } from "./logger.js";
import { getNetrecallPaths } from "./project.js";
import { SESSION_FORMATS, type SessionFormat } from "./serialization.js";

export const STORAGE_BACKENDS = ["file", "sqlite"] as const;
export type StorageBackend = (typeof STORAGE_BACKENDS)[number];

const DAY_MS = 24 * 60 * 60 * 1000;

export interface NetrecallConfig {
  /** Which durable backend the CLI opens */
  backend: StorageBackend;
  /** On-disk encoding for the file backend */
  format: SessionFormat;
  /** Sessions kept before the oldest are evicted */
  maxSessions: number;
  /** Sessions untouched for longer than this are removed during cleanup */
  retentionDays: number;
  /** Run cleanup after every save */
  autoCleanup: boolean;
  maxSearchResults: number;
  searchTimeoutMs: number;
  /** Log file size in bytes before rotation */
  maxLogSize: number;
}

export const DEFAULT_CONFIG: NetrecallConfig = {
  backend: "file",
  format: "json",
  maxSessions: 10_000,
  retentionDays: 30,
  autoCleanup: true,
  maxSearchResults: 1000,
  searchTimeoutMs: 10_000,
  maxLogSize: 10 * 1024 * 1024,
};

export function retentionPeriodMs(config: Pick<NetrecallConfig, "retentionDays">): number {
  return config.retentionDays * DAY_MS;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function isOneOf<T extends string>(options: readonly T[], value: unknown): value is T {
  return typeof value === "string" && options.some((option) => option === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Keep the valid fields of a parsed config, defaulting the rest.
 */
export function validateConfig(raw: Record<string, unknown>): NetrecallConfig {
  const config = { ...DEFAULT_CONFIG };

  if (isOneOf(STORAGE_BACKENDS, raw["backend"])) config.backend = raw["backend"];
  if (isOneOf(SESSION_FORMATS, raw["format"])) config.format = raw["format"];
  if (isPositiveInteger(raw["maxSessions"])) config.maxSessions = raw["maxSessions"];
  if (isPositiveNumber(raw["retentionDays"])) config.retentionDays = raw["retentionDays"];
  if (typeof raw["autoCleanup"] === "boolean") config.autoCleanup = raw["autoCleanup"];
  if (isPositiveInteger(raw["maxSearchResults"])) config.maxSearchResults = raw["maxSearchResults"];
  if (isPositiveInteger(raw["searchTimeoutMs"])) config.searchTimeoutMs = raw["searchTimeoutMs"];
  if (isPositiveInteger(raw["maxLogSize"])) config.maxLogSize = raw["maxLogSize"];

  return config;
}

/**
 * Load `.netrecall/config.json` from the project root.
 *
 * A missing file gives the defaults. Malformed JSON, or JSON that is not an
 * object, logs a warning and gives the defaults.
 */
export function loadConfig(projectRoot: string, logLevel?: LogLevel): NetrecallConfig {
  const { configFile } = getNetrecallPaths(projectRoot);

  let raw: string;
  try {
    raw = fs.readFileSync(configFile, "utf-8");
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    warn(projectRoot, logLevel, "Malformed config.json, using defaults");
    return { ...DEFAULT_CONFIG };
  }

  if (!isRecord(parsed)) {
    warn(projectRoot, logLevel, "config.json must be an object, using defaults");
    return { ...DEFAULT_CONFIG };
  }

  return validateConfig(parsed);
}

function warn(projectRoot: string, logLevel: LogLevel | undefined, msg: string): void {
  const logger = createLogger("cli", projectRoot, logLevel);
  logger.warn(msg);
  logger.close();
}
