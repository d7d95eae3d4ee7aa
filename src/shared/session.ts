/**
 * Session aggregate: construction, lifecycle transitions and accessors.
 *
 * Sessions are immutable values. Every transition returns a new object and
 * copies the metadata map and related-session list, so no two holders ever
 * share mutable state.
 */

import { v4 as uuidv4 } from "uuid";
import type {
  HttpRequest,
  HttpResponse,
  Metadata,
  MetadataValue,
  ResponseError,
  Session,
  SessionState,
} from "./types.js";
import { TERMINAL_STATES } from "./types.js";
import { getRequestHost, getRequestPath } from "./request.js";
import { createResponse } from "./response.js";
import { SessionStateError } from "./errors.js";

export interface SessionInit {
  id?: string;
  request: HttpRequest;
  response?: HttpResponse;
  state?: SessionState;
  startTime?: number;
  responseStartTime?: number;
  endTime?: number;
  requestDurationMs?: number;
  queuedTime?: number;
  metadata?: Metadata;
  retryCount?: number;
  usedSecureDecryption?: boolean;
  relatedSessionIds?: readonly string[];
  parentSessionId?: string;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export function createSession(init: SessionInit): Session {
  const session: Mutable<Session> = {
    id: init.id ?? uuidv4(),
    request: init.request,
    state: init.state ?? "initialized",
    startTime: init.startTime ?? Date.now(),
    metadata: { ...init.metadata },
    retryCount: init.retryCount ?? 0,
    usedSecureDecryption: init.usedSecureDecryption ?? false,
    relatedSessionIds: [...(init.relatedSessionIds ?? [])],
  };

  if (init.response !== undefined) session.response = init.response;
  if (init.responseStartTime !== undefined) session.responseStartTime = init.responseStartTime;
  if (init.endTime !== undefined) session.endTime = init.endTime;
  if (init.requestDurationMs !== undefined) session.requestDurationMs = init.requestDurationMs;
  if (init.queuedTime !== undefined) session.queuedTime = init.queuedTime;
  if (init.parentSessionId !== undefined) session.parentSessionId = init.parentSessionId;

  return session;
}

/**
 * Copy a session with some fields replaced. Collections are always copied.
 */
function update(session: Session, changes: Partial<Mutable<Session>>): Session {
  return {
    ...session,
    metadata: { ...session.metadata },
    relatedSessionIds: [...session.relatedSessionIds],
    ...changes,
  };
}

export function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.includes(state);
}

function transition(session: Session, to: SessionState, changes: Partial<Mutable<Session>>): Session {
  if (isTerminal(session.state)) {
    throw new SessionStateError(
      `Cannot move session ${session.id} from ${session.state} to ${to}: session already finished`
    );
  }
  return update(session, { ...changes, state: to });
}

// --- Lifecycle ---

export function markSending(session: Session): Session {
  return transition(session, "sending", {});
}

export function markWaiting(session: Session, requestDurationMs: number): Session {
  return transition(session, "waiting", { requestDurationMs });
}

export function markReceiving(session: Session, responseStartTime: number = Date.now()): Session {
  return transition(session, "receiving", { responseStartTime });
}

export function markCompleted(
  session: Session,
  response: HttpResponse,
  endTime: number = Date.now()
): Session {
  return transition(session, "completed", { response, endTime });
}

/**
 * Fail the session. A placeholder response with status 0 carries the error.
 */
export function markFailed(
  session: Session,
  error: ResponseError,
  endTime: number = Date.now()
): Session {
  const response = createResponse({
    statusCode: 0,
    timestamp: endTime,
    durationMs: endTime - session.startTime,
    error,
  });
  return transition(session, "failed", { response, endTime });
}

export function markCancelled(session: Session, endTime: number = Date.now()): Session {
  return transition(session, "cancelled", { endTime });
}

export function incrementRetry(session: Session): Session {
  return update(session, { retryCount: session.retryCount + 1 });
}

// --- Metadata ---

export function setMetadata(session: Session, key: string, value: MetadataValue): Session {
  return update(session, { metadata: { ...session.metadata, [key]: { ...value } } });
}

export function mergeMetadata(session: Session, metadata: Metadata): Session {
  return update(session, { metadata: { ...session.metadata, ...metadata } });
}

export function removeMetadata(session: Session, key: string): Session {
  const { [key]: _removed, ...rest } = session.metadata;
  return update(session, { metadata: rest });
}

/**
 * Convert an old string-only metadata map into typed metadata.
 */
export function convertLegacyMetadata(legacy: Record<string, string>): Metadata {
  const metadata: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(legacy)) {
    metadata[key] = { type: "string", value };
  }
  return metadata;
}

export function metadataValueToString(value: MetadataValue): string {
  switch (value.type) {
    case "string":
      return value.value;
    case "int":
    case "double":
    case "bool":
      return String(value.value);
    case "date":
      return new Date(value.value).toISOString();
  }
}

export function metadataValuesEqual(a: MetadataValue, b: MetadataValue): boolean {
  return a.type === b.type && a.value === b.value;
}

// --- Related sessions ---

export function addRelatedSession(session: Session, relatedId: string): Session {
  if (session.relatedSessionIds.includes(relatedId)) {
    return update(session, {});
  }
  return update(session, { relatedSessionIds: [...session.relatedSessionIds, relatedId] });
}

export function removeRelatedSession(session: Session, relatedId: string): Session {
  return update(session, {
    relatedSessionIds: session.relatedSessionIds.filter((id) => id !== relatedId),
  });
}

export function createChildSession(parent: Session, request: HttpRequest): Session {
  return createSession({ request, parentSessionId: parent.id });
}

// --- Accessors ---

/**
 * Elapsed time in ms. Finished sessions use their end time; in-flight
 * sessions keep advancing against `now`.
 */
export function getSessionDuration(session: Session, now: number = Date.now()): number {
  if (session.endTime !== undefined) {
    return session.endTime - session.startTime;
  }
  if (session.responseStartTime !== undefined) {
    return now - session.responseStartTime + (session.response?.durationMs ?? 0);
  }
  return now - session.startTime;
}

export function getSessionHost(session: Session): string | undefined {
  return getRequestHost(session.request);
}

export function getSessionPath(session: Session): string | undefined {
  return getRequestPath(session.request);
}

export function getStatusCode(session: Session): number | undefined {
  return session.response?.statusCode;
}

export function isFinished(session: Session): boolean {
  return isTerminal(session.state);
}

export function isOngoing(session: Session): boolean {
  return !isFinished(session);
}

export function hasParent(session: Session): boolean {
  return session.parentSessionId !== undefined;
}

export function hasChildren(session: Session): boolean {
  return session.relatedSessionIds.length > 0;
}

/**
 * Sessions are equal when their identifiers are, whatever their content.
 */
export function sessionsEqual(a: Session, b: Session): boolean {
  return a.id === b.id;
}
