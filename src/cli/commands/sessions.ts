/**
 * `netrecall sessions`: list, show, delete, summarise and clean up stored sessions.
 */

import { Command } from "commander";
import type { Session } from "../../shared/types.js";
import { isHttpMethod } from "../../shared/request.js";
import { toRecord } from "../../shared/serialization.js";
import { Criteria } from "../../filter/criteria.js";
import { FilterEngine } from "../../filter/engine.js";
import type { SessionStorage } from "../../storage/storage.js";
import { parseIntFlag, withStorage } from "./helpers.js";
import { formatSessionTable } from "../formatters/table.js";
import { formatSessionDetail, formatStorageStats } from "../formatters/detail.js";
import { formatHint } from "../formatters/colour.js";
import { parseDuration, parseTime } from "../utils/parse-time.js";

const DEFAULT_LIMIT = 50;

const STATUS_CLASS_RE = /^([1-5])xx$/;
const STATUS_CODE_RE = /^\d{3}$/;

export interface FilterFlags {
  method?: string;
  status?: string;
  host?: string;
  path?: string;
  url?: string;
  regex?: string;
  contentType?: string;
  since?: string;
  before?: string;
  minDuration?: string;
  maxDuration?: string;
  errors?: boolean;
  cached?: boolean;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Any of the listed values, as one nested condition.
 */
function anyOf(values: string[], add: (criteria: Criteria, value: string) => void): Criteria {
  const nested = new Criteria();
  for (const value of values) {
    add(nested, value);
  }
  return nested;
}

/**
 * Build a Criteria from CLI filter flags. Every flag given must match.
 * Comma-separated methods and statuses match any of their values.
 */
export function buildCriteria(flags: FilterFlags, now: number = Date.now()): Criteria {
  const criteria = new Criteria();

  if (flags.method) {
    const methods = splitList(flags.method.toUpperCase());
    criteria.where(
      anyOf(methods, (nested, method) => {
        if (!isHttpMethod(method)) {
          throw new Error(`Invalid --method: "${method}"`);
        }
        nested.method(method, "or");
      })
    );
  }

  if (flags.status) {
    criteria.where(
      anyOf(splitList(flags.status.toLowerCase()), (nested, status) => {
        const statusClass = STATUS_CLASS_RE.exec(status);
        if (statusClass) {
          const base = parseInt(statusClass[1] ?? "0", 10) * 100;
          nested.statusCodeRange(base, base + 100, "or");
        } else if (STATUS_CODE_RE.test(status)) {
          nested.statusCode(parseInt(status, 10), "or");
        } else {
          throw new Error(`Invalid --status: "${status}". Use e.g. 404 or 4xx`);
        }
      })
    );
  }

  if (flags.host) criteria.host(flags.host);
  if (flags.path) criteria.path(flags.path);
  if (flags.url) criteria.url(flags.url);
  if (flags.regex) criteria.url(flags.regex, { regex: true });
  if (flags.contentType) criteria.contentType(flags.contentType);

  if (flags.since !== undefined || flags.before !== undefined) {
    criteria.startTime({
      ...(flags.since !== undefined && { from: parseTime(flags.since, now) }),
      ...(flags.before !== undefined && { to: parseTime(flags.before, now) - 1 }),
    });
  }

  if (flags.minDuration !== undefined || flags.maxDuration !== undefined) {
    criteria.duration({
      ...(flags.minDuration !== undefined && { min: parseDuration(flags.minDuration) }),
      ...(flags.maxDuration !== undefined && { max: parseDuration(flags.maxDuration) }),
    });
  }

  if (flags.errors) criteria.hasError();
  if (flags.cached) criteria.fromCache();

  return criteria;
}

/**
 * Add the filter flags shared by `sessions list`, `sessions delete` and `search`.
 */
export function addFilterFlags(cmd: Command, options: { urlRegex: boolean } = { urlRegex: true }): Command {
  cmd
    .option("--method <methods>", "filter by HTTP method (comma-separated)")
    .option("--status <codes>", "filter by status (404, 4xx, comma-separated)")
    .option("--host <text>", "host contains text")
    .option("--path <text>", "path contains text")
    .option("--url <text>", "URL contains text");
  if (options.urlRegex) {
    cmd.option("--regex <pattern>", "URL matches a regular expression");
  }
  return cmd
    .option("--content-type <text>", "response Content-Type contains text")
    .option("--since <time>", "started at or after (5m, 2h, today, 2024-01-01)")
    .option("--before <time>", "started before (same formats as --since)")
    .option("--min-duration <duration>", "took at least (250ms, 2s)")
    .option("--max-duration <duration>", "took at most (same formats)")
    .option("--errors", "only 4xx, 5xx and failed sessions")
    .option("--cached", "only responses served from cache");
}

/**
 * Resolve a full id or a unique prefix of one.
 */
export async function findSession(storage: SessionStorage, idOrPrefix: string): Promise<Session> {
  const wanted = idOrPrefix.trim().toLowerCase();
  const matches = (await storage.loadAll()).filter((s) => s.id.toLowerCase().startsWith(wanted));

  const [first, ...others] = matches;
  if (first === undefined || wanted.length === 0) {
    throw new Error(`No session matches "${idOrPrefix}"`);
  }
  if (others.length > 0) {
    throw new Error(`"${idOrPrefix}" matches ${matches.length} sessions; use more of the id`);
  }
  return first;
}

// --- Subcommands ---

const listSubcommand = new Command("list")
  .description("List stored sessions, newest first")
  .option("--limit <n>", "max results", String(DEFAULT_LIMIT))
  .option("--offset <n>", "skip results", "0")
  .option("--json", "JSON output");

addFilterFlags(listSubcommand);

listSubcommand.action(
  async (opts: FilterFlags & { limit: string; offset: string; json?: boolean }, command: Command) => {
    await withStorage(command, "listing sessions", async ({ storage }, { logger }) => {
      const criteria = buildCriteria(opts);
      const limit = parseIntFlag(opts.limit, "--limit");
      const offset = parseIntFlag(opts.offset, "--offset");

      const engine = new FilterEngine({ logger: logger.forComponent("filter") });
      const matching = engine.filterAndSort(await storage.loadAll(), criteria, false);
      const page = matching.slice(offset, offset + limit);

      if (opts.json) {
        const sessions = page.map(toRecord);
        console.log(JSON.stringify({ sessions, total: matching.length, limit, offset }, null, 2));
        return;
      }

      if (page.length === 0) {
        console.log(criteria.hasConditions ? "  No sessions match" : "  No sessions stored");
        return;
      }

      console.log(formatSessionTable(page, matching.length));

      const hint = formatHint([
        "netrecall sessions show <id>",
        "--method, --status, --host, --since to filter",
        "--json for JSON",
      ]);
      if (hint) console.log(hint);
    });
  }
);

const showSubcommand = new Command("show")
  .description("Show one session in full")
  .argument("<id>", "session id or unique prefix")
  .option("--json", "JSON output")
  .action(async (id: string, opts: { json?: boolean }, command: Command) => {
    await withStorage(command, "showing session", async ({ storage }) => {
      const session = await findSession(storage, id);

      if (opts.json) {
        console.log(JSON.stringify(toRecord(session), null, 2));
        return;
      }
      console.log(formatSessionDetail(session));
    });
  });

const deleteSubcommand = new Command("delete")
  .description("Delete one session, every matching session, or all of them")
  .argument("[id]", "session id or unique prefix")
  .option("--all", "delete every stored session");

addFilterFlags(deleteSubcommand);

deleteSubcommand.action(
  async (id: string | undefined, opts: FilterFlags & { all?: boolean }, command: Command) => {
    await withStorage(command, "deleting sessions", async ({ storage }) => {
      const criteria = buildCriteria(opts);

      if (id !== undefined) {
        if (opts.all || criteria.hasConditions) {
          throw new Error("Give an id, --all or filter flags, not several");
        }
        const session = await findSession(storage, id);
        await storage.delete(session.id);
        console.log(`  Deleted ${session.id}`);
        return;
      }

      if (opts.all) {
        if (criteria.hasConditions) {
          throw new Error("--all cannot be combined with filter flags");
        }
        const count = await storage.count();
        await storage.deleteAll();
        console.log(`  Deleted ${count} session${count === 1 ? "" : "s"}`);
        return;
      }

      if (!criteria.hasConditions) {
        throw new Error("Give an id, --all or at least one filter flag");
      }
      const removed = await storage.deleteMatching(criteria);
      console.log(`  Deleted ${removed} session${removed === 1 ? "" : "s"}`);
    });
  }
);

const statsSubcommand = new Command("stats")
  .description("Show storage usage and a breakdown of stored sessions")
  .option("--json", "JSON output")
  .action(async (opts: { json?: boolean }, command: Command) => {
    await withStorage(command, "reading statistics", async ({ storage, location }, { config, logger }) => {
      const sessions = await storage.loadAll();
      const bytes = await storage.storageSize();
      const summary = new FilterEngine({ logger: logger.forComponent("filter") }).summarize(sessions);
      const stats = { backend: config.backend, location, count: sessions.length, bytes, summary };

      if (opts.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }
      console.log(formatStorageStats(stats));
    });
  });

const cleanupSubcommand = new Command("cleanup")
  .description("Apply the retention period and session limit now")
  .action(async (_opts: unknown, command: Command) => {
    await withStorage(command, "cleaning up", async ({ storage }) => {
      const removed = await storage.cleanup();
      console.log(`  Removed ${removed} session${removed === 1 ? "" : "s"}`);
    });
  });

export const sessionsCommand = new Command("sessions")
  .description("Browse and manage stored sessions")
  .addCommand(listSubcommand, { isDefault: true })
  .addCommand(showSubcommand)
  .addCommand(deleteSubcommand)
  .addCommand(statsSubcommand)
  .addCommand(cleanupSubcommand);
