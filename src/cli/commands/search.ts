/**
 * `netrecall search <text>`: full-text search over stored sessions.
 */

import { Command } from "commander";
import type { NetrecallConfig } from "../../shared/config.js";
import { parseRegexLiteral } from "../../shared/regex-filter.js";
import { toRecord } from "../../shared/serialization.js";
import { SEARCH_FIELDS, isSearchField, type SearchField } from "../../search/fields.js";
import {
  SORT_OPTIONS,
  SearchService,
  isSortOption,
  type SearchConfig,
  type SearchQuery,
} from "../../search/search-service.js";
import { parseIntFlag, withStorage } from "./helpers.js";
import { addFilterFlags, buildCriteria, type FilterFlags } from "./sessions.js";
import { formatSessionTable } from "../formatters/table.js";
import { formatHint } from "../formatters/colour.js";

const DEFAULT_LIMIT = 50;

export interface SearchFlags extends Omit<FilterFlags, "regex"> {
  /** Regex mode for the search text */
  regex?: boolean;
  caseSensitive?: boolean;
  field: string[];
  sort: string;
  asc?: boolean;
  limit: string;
  offset: string;
  json?: boolean;
}

export interface SearchRequest {
  config: Partial<SearchConfig>;
  query: SearchQuery;
}

/**
 * Turn the command line into a service config and a query.
 */
export function buildSearchRequest(
  text: string,
  flags: SearchFlags,
  settings: Pick<NetrecallConfig, "maxSearchResults" | "searchTimeoutMs">,
  now: number = Date.now()
): SearchRequest {
  const fields: SearchField[] = [];
  for (const field of flags.field) {
    if (!isSearchField(field)) {
      throw new Error(`Invalid --field: "${field}". Use one of: ${SEARCH_FIELDS.join(", ")}`);
    }
    if (!fields.includes(field)) fields.push(field);
  }

  if (!isSortOption(flags.sort)) {
    throw new Error(`Invalid --sort: "${flags.sort}". Use one of: ${SORT_OPTIONS.join(", ")}`);
  }

  const { regex: _regexMode, ...filterFlags } = flags;
  const criteria = buildCriteria(filterFlags, now);

  // `/pattern/flags` switches to regex mode; without `i` it is case-sensitive
  const literal = flags.regex ? undefined : parseRegexLiteral(text);

  return {
    config: {
      useRegex: literal !== undefined || (flags.regex ?? false),
      caseSensitive: flags.caseSensitive ?? (literal !== undefined && !literal.flags.includes("i")),
      maxResults: settings.maxSearchResults,
      timeoutMs: settings.searchTimeoutMs,
      ...(fields.length > 0 && { searchFields: fields }),
    },
    query: {
      text: literal?.pattern ?? text,
      sortBy: flags.sort,
      ascending: flags.asc ?? false,
      offset: parseIntFlag(flags.offset, "--offset"),
      limit: parseIntFlag(flags.limit, "--limit"),
      ...(criteria.hasConditions && { filters: [criteria] }),
    },
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export const searchCommand = new Command("search")
  .description("Search URLs, headers, bodies and metadata of stored sessions")
  .argument("<text>", "text to find; a regular expression with --regex or as /pattern/flags")
  .option("--regex", "treat the text as a regular expression")
  .option("--case-sensitive", "match case exactly")
  .option("--field <name>", `search only this field (repeatable: ${SEARCH_FIELDS.join(", ")})`, collect, [])
  .option("--sort <order>", `sort by ${SORT_OPTIONS.join(", ")}`, "relevance")
  .option("--asc", "lowest first")
  .option("--limit <n>", "max results", String(DEFAULT_LIMIT))
  .option("--offset <n>", "skip results", "0")
  .option("--json", "JSON output");

addFilterFlags(searchCommand, { urlRegex: false });

searchCommand.action(async (text: string, opts: SearchFlags, command: Command) => {
  await withStorage(command, "searching sessions", async ({ storage }, { config, logger }) => {
    const request = buildSearchRequest(text, opts, config);
    const service = new SearchService({ config: request.config, logger: logger.forComponent("search") });
    const result = await service.searchStorage(request.query, storage);

    if (opts.json) {
      const output = {
        totalCount: result.totalCount,
        matchCount: result.matchCount,
        matchRatio: result.matchRatio,
        searchTimeMs: result.searchTimeMs,
        sessions: result.sessions.map(toRecord),
        highlights: result.highlights,
      };
      console.log(JSON.stringify(output, null, 2));
      return;
    }

    if (result.sessions.length === 0) {
      console.log(`  No sessions found matching "${text}"`);
      return;
    }

    console.log(formatSessionTable(result.sessions, result.matchCount));
    console.log(
      `  ${result.matchCount} of ${result.totalCount} sessions matched in ${Math.round(result.searchTimeMs)}ms`
    );

    const hint = formatHint(["netrecall sessions show <id>", "--field to narrow", "--json for highlights"]);
    if (hint) console.log(hint);
  });
});
