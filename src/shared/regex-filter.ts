/**
 * Parsing and validation for user-supplied regular expressions.
 */

import safe from "safe-regex2";
import { InvalidRegexError, getErrorMessage } from "./errors.js";

const REGEX_LITERAL_PATTERN = /^\/((?:\\.|[^\\/])*)\/([dgimsuvy]*)$/;
const VALID_REGEX_FLAGS = new Set(["d", "g", "i", "m", "s", "u", "v", "y"]);

export interface RegexFilterSpec {
  pattern: string;
  flags: string;
}

function validateRegexFlags(pattern: string, flags: string): void {
  const seen = new Set<string>();

  for (const flag of flags) {
    if (!VALID_REGEX_FLAGS.has(flag)) {
      throw new InvalidRegexError(pattern, `Unsupported regex flag "${flag}".`);
    }
    if (seen.has(flag)) {
      throw new InvalidRegexError(pattern, `Duplicate regex flag "${flag}".`);
    }
    seen.add(flag);
  }
}

/**
 * Compile a pattern, rejecting syntax errors and patterns prone to
 * catastrophic backtracking with InvalidRegexError.
 */
export function compileSafeRegex(pattern: string, flags = ""): RegExp {
  validateRegexFlags(pattern, flags);

  let compiled: RegExp;
  try {
    compiled = new RegExp(pattern, flags);
  } catch (err) {
    throw new InvalidRegexError(pattern, `Invalid regex pattern "${pattern}": ${getErrorMessage(err)}`, {
      cause: err,
    });
  }

  if (!safe(compiled)) {
    throw new InvalidRegexError(
      pattern,
      `Regex pattern "${pattern}" is rejected: potential catastrophic backtracking. Simplify the pattern.`
    );
  }

  return compiled;
}

export function validateRegexFilter(pattern: string, flags = ""): RegexFilterSpec {
  compileSafeRegex(pattern, flags);
  return { pattern, flags };
}

/**
 * Parse a slash-delimited literal (`/pattern/flags`). Returns undefined when
 * the input is not a literal; throws when it is one but does not compile.
 */
export function parseRegexLiteral(input: string): RegexFilterSpec | undefined {
  const match = REGEX_LITERAL_PATTERN.exec(input);
  if (!match) return undefined;

  return validateRegexFilter(match[1] ?? "", match[2] ?? "");
}
