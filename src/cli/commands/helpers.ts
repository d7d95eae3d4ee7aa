import { Command } from "commander";
import { findOrCreateProjectRoot, getNetrecallPaths } from "../../shared/project.js";
import { loadConfig, retentionPeriodMs, type NetrecallConfig } from "../../shared/config.js";
import { createLogger, parseVerbosity, type Logger } from "../../shared/logger.js";
import { getErrorMessage } from "../../shared/errors.js";
import { FileSessionStorage } from "../../storage/file-storage.js";
import { SqliteSessionStorage } from "../../storage/sqlite-storage.js";
import type { QueuedSessionStorage } from "../../storage/storage.js";

export interface GlobalOptions {
  verbose: number;
  dir?: string;
}

/**
 * Validate and extract global CLI options from a Commander command.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const raw: Record<string, unknown> = command.optsWithGlobals();
  const options: GlobalOptions = {
    verbose: typeof raw["verbose"] === "number" ? raw["verbose"] : 0,
  };
  if (typeof raw["dir"] === "string") {
    options.dir = raw["dir"];
  }
  return options;
}

export interface CliContext {
  projectRoot: string;
  config: NetrecallConfig;
  logger: Logger;
}

export function resolveContext(command: Command): CliContext {
  const globalOpts = getGlobalOptions(command);
  const projectRoot = findOrCreateProjectRoot(undefined, globalOpts.dir);
  const level = parseVerbosity(globalOpts.verbose);
  const config = loadConfig(projectRoot, level);
  const logger = createLogger("cli", projectRoot, level, { maxLogSize: config.maxLogSize });
  return { projectRoot, config, logger };
}

export interface OpenStorage {
  storage: QueuedSessionStorage;
  /** Directory or database file the backend reads */
  location: string;
}

/**
 * Open the backend named in config.json.
 */
export function openStorage(context: CliContext): OpenStorage {
  const { config, projectRoot } = context;
  const paths = getNetrecallPaths(projectRoot);
  const options = {
    maxSessions: config.maxSessions,
    retentionPeriodMs: retentionPeriodMs(config),
    autoCleanup: config.autoCleanup,
    logger: context.logger.forComponent("storage"),
  };

  if (config.backend === "sqlite") {
    return {
      storage: new SqliteSessionStorage({ ...options, databaseFile: paths.databaseFile }),
      location: paths.databaseFile,
    };
  }
  return {
    storage: new FileSessionStorage({ ...options, directory: paths.sessionsDir, format: config.format }),
    location: paths.sessionsDir,
  };
}

/**
 * Run a command body against the configured storage. Failures are printed
 * as "Error <action>: <message>" and set a non-zero exit code; the storage
 * and the log are closed either way.
 */
export async function withStorage(
  command: Command,
  action: string,
  body: (opened: OpenStorage, context: CliContext) => Promise<void>
): Promise<void> {
  let context: CliContext | undefined;
  try {
    context = resolveContext(command);
    const opened = openStorage(context);
    try {
      await body(opened, context);
    } finally {
      await opened.storage.close();
    }
  } catch (err) {
    context?.logger.error(`Error ${action}`, { error: getErrorMessage(err) });
    console.error(`Error ${action}: ${getErrorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    context?.logger.close();
  }
}

/**
 * Parse a non-negative integer flag.
 */
export function parseIntFlag(value: string, flagName: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${flagName} value: "${value}"`);
  }
  return parsed;
}
