import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

const NETRECALL_DIR = ".netrecall";

/**
 * Expand a leading `~` and make the path absolute.
 */
export function resolveUserPath(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/") || input.startsWith("~" + path.sep)) {
    return path.join(os.homedir(), input.slice(2));
  }
  return path.resolve(input);
}

function isProjectRoot(dir: string): boolean {
  return fs.existsSync(path.join(dir, NETRECALL_DIR)) || fs.existsSync(path.join(dir, ".git"));
}

/**
 * Walk up from `startDir` looking for a `.netrecall` or `.git` directory.
 * A `.netrecall` directory anywhere up the tree wins over a nearer `.git`.
 *
 * With an override the walk is skipped: the resolved override is returned
 * if it is itself a project root.
 */
export function findProjectRoot(
  startDir: string = process.cwd(),
  override?: string
): string | undefined {
  if (override !== undefined) {
    const resolved = resolveUserPath(override);
    return isProjectRoot(resolved) ? resolved : undefined;
  }

  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;
  let gitRoot: string | undefined;

  while (currentDir !== root) {
    if (fs.existsSync(path.join(currentDir, NETRECALL_DIR))) {
      return currentDir;
    }
    if (gitRoot === undefined && fs.existsSync(path.join(currentDir, ".git"))) {
      gitRoot = currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return gitRoot;
}

/**
 * Like findProjectRoot, but falls back to the home directory so there is
 * always somewhere to keep sessions. An override is used as given.
 */
export function findOrCreateProjectRoot(
  startDir: string = process.cwd(),
  override?: string
): string {
  if (override !== undefined) {
    return resolveUserPath(override);
  }
  return findProjectRoot(startDir) ?? os.homedir();
}

export function getNetrecallDir(projectRoot: string): string {
  return path.join(projectRoot, NETRECALL_DIR);
}

/**
 * Create `.netrecall` if missing and return its path.
 */
export function ensureNetrecallDir(projectRoot: string): string {
  const dir = getNetrecallDir(projectRoot);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export interface NetrecallPaths {
  netrecallDir: string;
  sessionsDir: string;
  databaseFile: string;
  logFile: string;
  configFile: string;
}

export function getNetrecallPaths(projectRoot: string): NetrecallPaths {
  const netrecallDir = getNetrecallDir(projectRoot);

  return {
    netrecallDir,
    sessionsDir: path.join(netrecallDir, "sessions"),
    databaseFile: path.join(netrecallDir, "sessions.db"),
    logFile: path.join(netrecallDir, "netrecall.log"),
    configFile: path.join(netrecallDir, "config.json"),
  };
}
