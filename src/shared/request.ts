import { createHash } from "node:crypto";
import { TextDecoder } from "node:util";
import type { Headers, HttpMethod, HttpRequest } from "./types.js";
import { HTTP_METHODS } from "./types.js";

export interface HttpRequestInit {
  url: string;
  method: HttpMethod;
  headers?: Headers;
  body?: Buffer;
  timestamp?: number;
}

export interface ParsedUrl {
  host?: string;
  path?: string;
  query: Record<string, string>;
}

/**
 * Hash used to spot duplicate captures of the same request.
 */
export function computeRequestHash(url: string, method: HttpMethod, timestamp: number): string {
  return createHash("sha1").update(`${method}\u0000${url}\u0000${timestamp}`).digest("hex");
}

export function createRequest(init: HttpRequestInit): HttpRequest {
  const timestamp = init.timestamp ?? Date.now();
  const request: HttpRequest = {
    url: init.url,
    method: init.method,
    headers: { ...init.headers },
    timestamp,
    hash: computeRequestHash(init.url, init.method, timestamp),
  };
  return init.body !== undefined ? { ...request, body: init.body } : request;
}

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/**
 * Best-effort URL decomposition. Unparseable URLs yield no host or path.
 */
export function parseUrl(url: string): ParsedUrl {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { query: {} };
  }

  const query: Record<string, string> = {};
  for (const [name, value] of parsed.searchParams) {
    query[name] = value;
  }

  return {
    host: parsed.hostname || undefined,
    path: parsed.pathname,
    query,
  };
}

export function getRequestHost(request: HttpRequest): string | undefined {
  return parseUrl(request.url).host;
}

export function getRequestPath(request: HttpRequest): string | undefined {
  return parseUrl(request.url).path;
}

export function getQueryParameters(request: HttpRequest): Record<string, string> {
  return parseUrl(request.url).query;
}

/**
 * Decode a body as text. Returns undefined when the bytes are not valid in
 * the given charset (binary payloads), or when there is no body.
 */
export function decodeBody(body: Buffer | undefined, charset = "utf-8"): string | undefined {
  if (!body) return undefined;

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset, { fatal: true });
  } catch {
    // Unknown charset label
    decoder = new TextDecoder("utf-8", { fatal: true });
  }

  try {
    return decoder.decode(body);
  } catch {
    return undefined;
  }
}

export function requestBodyAsText(request: HttpRequest): string | undefined {
  return decodeBody(request.body);
}

export function headersEqual(a: Readonly<Headers>, b: Readonly<Headers>): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

export function bodiesEqual(a: Buffer | undefined, b: Buffer | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.equals(b);
}

/**
 * Request equality by content: url, method, headers and body.
 */
export function requestsEqual(a: HttpRequest, b: HttpRequest): boolean {
  return (
    a.url === b.url &&
    a.method === b.method &&
    headersEqual(a.headers, b.headers) &&
    bodiesEqual(a.body, b.body)
  );
}

/**
 * Case-insensitive header lookup. Stored keys keep their original casing.
 */
export function getHeader(headers: Readonly<Headers>, name: string): string | undefined {
  const direct = headers[name];
  if (direct !== undefined) return direct;

  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}
