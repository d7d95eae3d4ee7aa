import type { Headers, HttpResponse, ResponseError, StatusCategory } from "./types.js";
import { bodiesEqual, decodeBody, getHeader, headersEqual } from "./request.js";
import { normaliseContentType, parseCharset } from "./content-type.js";

const STATUS_CATEGORIES: Record<number, StatusCategory> = {
  1: "informational",
  2: "success",
  3: "redirection",
  4: "clientError",
  5: "serverError",
};

export interface HttpResponseInit {
  statusCode: number;
  headers?: Headers;
  body?: Buffer;
  timestamp?: number;
  durationMs?: number;
  mimeType?: string;
  charset?: string;
  fromCache?: boolean;
  error?: ResponseError;
}

/**
 * Derive the category from the first digit of the status code.
 * Anything outside 100..599 is "unknown".
 */
export function statusCategoryOf(statusCode: number): StatusCategory {
  if (!Number.isInteger(statusCode) || statusCode < 100 || statusCode > 599) {
    return "unknown";
  }
  return STATUS_CATEGORIES[Math.floor(statusCode / 100)] ?? "unknown";
}

function resolveContentLength(headers: Readonly<Headers>, body: Buffer | undefined): number {
  const header = getHeader(headers, "Content-Length");
  if (header !== undefined && /^\d+$/.test(header.trim())) {
    return parseInt(header.trim(), 10);
  }
  return body?.length ?? 0;
}

export function createResponse(init: HttpResponseInit): HttpResponse {
  const headers = { ...init.headers };
  const contentType = getHeader(headers, "Content-Type");

  const response: HttpResponse = {
    statusCode: init.statusCode,
    statusCategory: statusCategoryOf(init.statusCode),
    headers,
    timestamp: init.timestamp ?? Date.now(),
    durationMs: init.durationMs ?? 0,
    contentLength: resolveContentLength(headers, init.body),
    fromCache: init.fromCache ?? false,
  };

  const mimeType = init.mimeType ?? normaliseContentType(contentType) ?? undefined;
  const charset = init.charset ?? parseCharset(contentType);

  return {
    ...response,
    ...(init.body !== undefined && { body: init.body }),
    ...(mimeType !== undefined && { mimeType }),
    ...(charset !== undefined && { charset }),
    ...(init.error !== undefined && { error: { ...init.error } }),
  };
}

export function isSuccess(response: HttpResponse): boolean {
  return response.statusCategory === "success";
}

export function isClientError(response: HttpResponse): boolean {
  return response.statusCategory === "clientError";
}

export function isServerError(response: HttpResponse): boolean {
  return response.statusCategory === "serverError";
}

/**
 * A response counts as an error when it is 4xx/5xx or carries a transport error.
 */
export function isErrorResponse(response: HttpResponse): boolean {
  return isClientError(response) || isServerError(response) || response.error !== undefined;
}

/**
 * Decode the response body using, in order: the explicit charset, the
 * Content-Type charset parameter, UTF-8.
 */
export function responseBodyAsText(response: HttpResponse): string | undefined {
  const charset = response.charset ?? parseCharset(getHeader(response.headers, "Content-Type"));
  return decodeBody(response.body, charset);
}

/**
 * Response equality. Ignores `error`.
 */
export function responsesEqual(a: HttpResponse, b: HttpResponse): boolean {
  return (
    a.statusCode === b.statusCode &&
    headersEqual(a.headers, b.headers) &&
    bodiesEqual(a.body, b.body) &&
    a.mimeType === b.mimeType &&
    a.charset === b.charset &&
    a.contentLength === b.contentLength &&
    a.fromCache === b.fromCache
  );
}
