import type { Headers, Session } from "../shared/types.js";
import { getQueryParameters, getRequestHost, getRequestPath, requestBodyAsText } from "../shared/request.js";
import { responseBodyAsText } from "../shared/response.js";
import { metadataValueToString } from "../shared/session.js";

export const SEARCH_FIELDS = [
  "url",
  "method",
  "statusCode",
  "requestHeaders",
  "responseHeaders",
  "requestBody",
  "responseBody",
  "metadata",
  "host",
  "path",
  "queryParameters",
] as const;

export type SearchField = (typeof SEARCH_FIELDS)[number];

export function isSearchField(value: string): value is SearchField {
  return SEARCH_FIELDS.some((field) => field === value);
}

function joinPairs(pairs: Iterable<[string, string]>): string {
  return Array.from(pairs, ([key, value]) => `${key}: ${value}`).join(" ");
}

/** Each header as "name: value". */
export function headerPairs(headers: Readonly<Headers>): string[] {
  return Object.entries(headers).map(([key, value]) => `${key}: ${value}`);
}

/**
 * The searchable text of one field. Missing parts (no response, no body, a
 * URL that does not parse) read as "".
 */
export function extractFieldText(session: Session, field: SearchField): string {
  const { request, response } = session;

  switch (field) {
    case "url":
      return request.url;
    case "method":
      return request.method;
    case "statusCode":
      return response ? String(response.statusCode) : "";
    case "requestHeaders":
      return headerPairs(request.headers).join(" ");
    case "responseHeaders":
      return response ? headerPairs(response.headers).join(" ") : "";
    case "requestBody":
      return requestBodyAsText(request) ?? "";
    case "responseBody":
      return (response && responseBodyAsText(response)) ?? "";
    case "metadata":
      return joinPairs(
        Object.entries(session.metadata).map(([key, value]): [string, string] => [key, metadataValueToString(value)])
      );
    case "host":
      return getRequestHost(request) ?? "";
    case "path":
      return getRequestPath(request) ?? "";
    case "queryParameters":
      return joinPairs(Object.entries(getQueryParameters(request)));
  }
}
