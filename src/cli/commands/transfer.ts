/**
 * `netrecall export` and `netrecall import`: move sessions between the
 * configured storage and a single JSON or plist document.
 */

import * as path from "node:path";
import { Command } from "commander";
import { SESSION_FORMATS, isSessionFormat, type SessionFormat } from "../../shared/serialization.js";
import { readSessionsFile, writeSessionsFile } from "../../storage/file-storage.js";
import { withStorage } from "./helpers.js";
import { buildCriteria, addFilterFlags, type FilterFlags } from "./sessions.js";

export function parseFormatFlag(value: string | undefined): SessionFormat | undefined {
  if (value === undefined) return undefined;
  const lower = value.toLowerCase();
  if (!isSessionFormat(lower)) {
    throw new Error(`Invalid --format: "${value}". Use one of: ${SESSION_FORMATS.join(", ")}`);
  }
  return lower;
}

function plural(count: number): string {
  return `${count} session${count === 1 ? "" : "s"}`;
}

export const exportCommand = new Command("export")
  .description("Write stored sessions to one file")
  .argument("<file>", "destination (.json or .plist)")
  .option("--format <format>", `file format (${SESSION_FORMATS.join(", ")}); defaults to the file extension`);

addFilterFlags(exportCommand);

exportCommand.action(async (file: string, opts: FilterFlags & { format?: string }, command: Command) => {
  await withStorage(command, "exporting sessions", async ({ storage }, { logger }) => {
    const format = parseFormatFlag(opts.format);
    const criteria = buildCriteria(opts);
    const sessions = criteria.hasConditions ? await storage.loadMatching(criteria) : await storage.loadAll();

    const target = path.resolve(file);
    const written = await writeSessionsFile(sessions, target, format);
    logger.info("Exported sessions", { count: sessions.length, file: target, format: written });
    console.log(`  Exported ${plural(sessions.length)} to ${target}`);
  });
});

export const importCommand = new Command("import")
  .description("Save the sessions from an exported file into storage")
  .argument("<file>", "file written by `netrecall export`")
  .option("--format <format>", `file format (${SESSION_FORMATS.join(", ")}); defaults to the file extension`)
  .option("--replace", "delete every stored session first")
  .action(async (file: string, opts: { format?: string; replace?: boolean }, command: Command) => {
    await withStorage(command, "importing sessions", async ({ storage }, { logger }) => {
      const format = parseFormatFlag(opts.format);
      const source = path.resolve(file);
      const sessions = await readSessionsFile(source, format);

      if (opts.replace) {
        await storage.deleteAll();
      }
      await storage.saveAll(sessions);

      logger.info("Imported sessions", { count: sessions.length, file: source, replace: opts.replace ?? false });
      console.log(`  Imported ${plural(sessions.length)} from ${source}`);
    });
  });
