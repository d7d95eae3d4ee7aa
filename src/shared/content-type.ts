/**
 * Content-type detection and normalisation helpers.
 *
 * Used by the response model (charset, MIME type) and by the CLI detail
 * view to decide how a body is previewed.
 */

/**
 * Content type prefixes that indicate text content.
 */
export const TEXT_CONTENT_TYPES = [
  "text/",
  "application/json",
  "application/xml",
  "application/javascript",
  "application/x-www-form-urlencoded",
  "application/xhtml+xml",
  "application/ld+json",
  "application/manifest+json",
  "application/x-javascript",
] as const;

/**
 * Content type suffixes that indicate text (e.g. application/hal+json).
 */
export const TEXT_SUFFIXES = ["+json", "+xml", "+html", "+text"] as const;

export const JSON_CONTENT_TYPES = [
  "application/json",
  "application/ld+json",
  "application/manifest+json",
] as const;

export const JSON_SUFFIX = "+json";

const CHARSET_PARAM_RE = /;\s*charset\s*=\s*"?([^";\s]+)"?/i;

/**
 * Check whether a MIME type represents JSON content, including `+json` suffixes.
 */
export function isJsonContentType(contentType: string | undefined): boolean {
  const normalised = normaliseContentType(contentType);
  if (!normalised) return false;

  for (const jsonType of JSON_CONTENT_TYPES) {
    if (normalised === jsonType) {
      return true;
    }
  }

  return normalised.endsWith(JSON_SUFFIX);
}

/**
 * Check whether a MIME type represents text content.
 * Returns `true` for types like `application/json`, `text/html`, `application/hal+json`.
 * Returns `false` for `undefined`, empty strings, and binary types like `image/png`.
 */
export function isTextContentType(contentType: string | undefined): boolean {
  const normalised = normaliseContentType(contentType);
  if (!normalised) return false;

  for (const prefix of TEXT_CONTENT_TYPES) {
    if (normalised.startsWith(prefix)) {
      return true;
    }
  }

  for (const suffix of TEXT_SUFFIXES) {
    if (normalised.endsWith(suffix)) {
      return true;
    }
  }

  return false;
}

/**
 * Normalise a raw Content-Type header value for comparison.
 * Strips parameters (charset, boundary, etc.), trims whitespace, and lowercases.
 * Returns `null` for undefined or empty input.
 */
export function normaliseContentType(raw: string | undefined): string | null {
  if (!raw) return null;
  const base = raw.split(";")[0]?.trim().toLowerCase();
  return base || null;
}

/**
 * Pull the `charset` parameter out of a Content-Type header value.
 */
export function parseCharset(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const match = CHARSET_PARAM_RE.exec(raw);
  return match?.[1]?.toLowerCase();
}
