import { compileSafeRegex } from "../shared/regex-filter.js";

export interface TextRange {
  /** Offset in UTF-16 code units */
  start: number;
  length: number;
}

export interface TextMatcherOptions {
  caseSensitive: boolean;
  useRegex: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Finds a search term in field text, as a literal substring or as a regex.
 * Construction throws InvalidRegexError for a pattern that does not compile
 * or is unsafe.
 */
export class TextMatcher {
  private readonly probe: RegExp;
  private readonly scanner: RegExp;

  constructor(term: string, options: TextMatcherOptions) {
    const flags = options.caseSensitive ? "" : "i";
    this.probe = options.useRegex ? compileSafeRegex(term, flags) : new RegExp(escapeRegExp(term), flags);
    this.scanner = new RegExp(this.probe.source, `${flags}g`);
  }

  test(text: string): boolean {
    return text.length > 0 && this.probe.test(text);
  }

  /** Non-overlapping, non-empty occurrences from left to right. */
  findAll(text: string): TextRange[] {
    const ranges: TextRange[] = [];
    for (const match of text.matchAll(this.scanner)) {
      if (match[0].length > 0) {
        ranges.push({ start: match.index, length: match[0].length });
      }
    }
    return ranges;
  }
}
