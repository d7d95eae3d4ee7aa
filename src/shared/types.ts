/**
 * Core types for netrecall
 */

export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "DELETE",
  "HEAD",
  "OPTIONS",
  "TRACE",
  "CONNECT",
  "PATCH",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type StatusCategory =
  | "informational"
  | "success"
  | "redirection"
  | "clientError"
  | "serverError"
  | "unknown";

export type SessionState =
  | "initialized"
  | "sending"
  | "waiting"
  | "receiving"
  | "completed"
  | "failed"
  | "cancelled";

export const TERMINAL_STATES: readonly SessionState[] = ["completed", "failed", "cancelled"];

export type Headers = Record<string, string>;

export interface HttpRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Headers>;
  readonly body?: Buffer;
  /** Epoch ms */
  readonly timestamp: number;
  /** Derived from url + method + timestamp, usable for de-duplication */
  readonly hash: string;
}

export interface ResponseError {
  message: string;
  code?: string;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly statusCategory: StatusCategory;
  readonly headers: Readonly<Headers>;
  readonly body?: Buffer;
  readonly timestamp: number;
  readonly durationMs: number;
  readonly mimeType?: string;
  readonly charset?: string;
  /** Content-Length header when present and numeric, otherwise body byte count */
  readonly contentLength: number;
  readonly fromCache: boolean;
  readonly error?: ResponseError;
}

export type MetadataValue =
  | { type: "string"; value: string }
  | { type: "int"; value: number }
  | { type: "double"; value: number }
  | { type: "bool"; value: boolean }
  | { type: "date"; value: number };

export type Metadata = Readonly<Record<string, MetadataValue>>;

export interface Session {
  readonly id: string;
  readonly request: HttpRequest;
  readonly response?: HttpResponse;
  readonly state: SessionState;
  readonly startTime: number;
  readonly responseStartTime?: number;
  readonly endTime?: number;
  readonly requestDurationMs?: number;
  readonly queuedTime?: number;
  readonly metadata: Metadata;
  readonly retryCount: number;
  readonly usedSecureDecryption: boolean;
  readonly relatedSessionIds: readonly string[];
  readonly parentSessionId?: string;
}

/**
 * Anything that can decide whether a session is of interest.
 * Third parties implement this to plug custom rules into filtering and search.
 */
export interface Predicate {
  matches(session: Session): boolean;
}

export type LogicalOperator = "and" | "or";
