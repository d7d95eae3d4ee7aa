/**
 * Session wire format.
 *
 * JSON and plist documents share one record shape: times are ISO-8601
 * strings and bodies are base64. Records are validated with zod on the way
 * in, so a decoded Session is always structurally sound.
 */

import * as path from "node:path";
import plist from "plist";
import { z } from "zod";
import type {
  HttpRequest,
  HttpResponse,
  Metadata,
  MetadataValue,
  Session,
} from "./types.js";
import { HTTP_METHODS } from "./types.js";
import { createRequest } from "./request.js";
import { statusCategoryOf } from "./response.js";
import { StorageError, getErrorMessage } from "./errors.js";

export const SESSION_FORMATS = ["json", "plist"] as const;

export type SessionFormat = (typeof SESSION_FORMATS)[number];

export function isSessionFormat(value: string): value is SessionFormat {
  return SESSION_FORMATS.some((format) => format === value);
}

/**
 * Infer a format from a file extension. Unknown extensions yield undefined.
 */
export function formatFromPath(filePath: string): SessionFormat | undefined {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return isSessionFormat(ext) ? ext : undefined;
}

// --- Schemas ---

const IsoDate = z.string().datetime({ offset: true });
const Base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, "expected base64");

const MetadataValueSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("string"), value: z.string() }),
  z.object({ type: z.literal("int"), value: z.number().int() }),
  z.object({ type: z.literal("double"), value: z.number() }),
  z.object({ type: z.literal("bool"), value: z.boolean() }),
  z.object({ type: z.literal("date"), value: IsoDate }),
]);

const RequestRecordSchema = z.object({
  url: z.string(),
  method: z.enum(HTTP_METHODS),
  headers: z.record(z.string(), z.string()),
  body: Base64.optional(),
  timestamp: IsoDate,
});

const ResponseRecordSchema = z.object({
  statusCode: z.number().int(),
  headers: z.record(z.string(), z.string()),
  body: Base64.optional(),
  timestamp: IsoDate,
  durationMs: z.number().nonnegative(),
  mimeType: z.string().optional(),
  charset: z.string().optional(),
  contentLength: z.number().int().nonnegative(),
  fromCache: z.boolean(),
  error: z.object({ message: z.string(), code: z.string().optional() }).optional(),
});

export const SessionRecordSchema = z.object({
  id: z.string().min(1),
  request: RequestRecordSchema,
  response: ResponseRecordSchema.optional(),
  state: z.enum(["initialized", "sending", "waiting", "receiving", "completed", "failed", "cancelled"]),
  startTime: IsoDate,
  responseStartTime: IsoDate.optional(),
  endTime: IsoDate.optional(),
  requestDurationMs: z.number().nonnegative().optional(),
  queuedTime: IsoDate.optional(),
  metadata: z.record(z.string(), MetadataValueSchema).default({}),
  retryCount: z.number().int().nonnegative().default(0),
  usedSecureDecryption: z.boolean().default(false),
  relatedSessionIds: z.array(z.string()).default([]),
  parentSessionId: z.string().optional(),
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

const SessionListSchema = z.array(SessionRecordSchema);

// --- Session <-> record ---

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

function optionalIso(ms: number | undefined): string | undefined {
  return ms === undefined ? undefined : iso(ms);
}

function toBase64(body: Buffer | undefined): string | undefined {
  return body === undefined ? undefined : body.toString("base64");
}

function fromBase64(body: string | undefined): Buffer | undefined {
  return body === undefined ? undefined : Buffer.from(body, "base64");
}

function metadataToRecord(metadata: Metadata): SessionRecord["metadata"] {
  const out: SessionRecord["metadata"] = {};
  for (const [key, value] of Object.entries(metadata)) {
    out[key] = value.type === "date" ? { type: "date", value: iso(value.value) } : { ...value };
  }
  return out;
}

function metadataFromRecord(record: SessionRecord["metadata"]): Metadata {
  const out: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = value.type === "date" ? { type: "date", value: Date.parse(value.value) } : value;
  }
  return out;
}

export function toRecord(session: Session): SessionRecord {
  const { request, response } = session;
  return {
    id: session.id,
    request: {
      url: request.url,
      method: request.method,
      headers: { ...request.headers },
      body: toBase64(request.body),
      timestamp: iso(request.timestamp),
    },
    response: response && {
      statusCode: response.statusCode,
      headers: { ...response.headers },
      body: toBase64(response.body),
      timestamp: iso(response.timestamp),
      durationMs: response.durationMs,
      mimeType: response.mimeType,
      charset: response.charset,
      contentLength: response.contentLength,
      fromCache: response.fromCache,
      error: response.error && { ...response.error },
    },
    state: session.state,
    startTime: iso(session.startTime),
    responseStartTime: optionalIso(session.responseStartTime),
    endTime: optionalIso(session.endTime),
    requestDurationMs: session.requestDurationMs,
    queuedTime: optionalIso(session.queuedTime),
    metadata: metadataToRecord(session.metadata),
    retryCount: session.retryCount,
    usedSecureDecryption: session.usedSecureDecryption,
    relatedSessionIds: [...session.relatedSessionIds],
    parentSessionId: session.parentSessionId,
  };
}

function requestFromRecord(record: SessionRecord["request"]): HttpRequest {
  const body = fromBase64(record.body);
  return createRequest({
    url: record.url,
    method: record.method,
    headers: record.headers,
    timestamp: Date.parse(record.timestamp),
    ...(body !== undefined && { body }),
  });
}

function responseFromRecord(record: NonNullable<SessionRecord["response"]>): HttpResponse {
  // Stored values win over anything derivable from headers
  const response: HttpResponse = {
    statusCode: record.statusCode,
    statusCategory: statusCategoryOf(record.statusCode),
    headers: record.headers,
    timestamp: Date.parse(record.timestamp),
    durationMs: record.durationMs,
    contentLength: record.contentLength,
    fromCache: record.fromCache,
  };
  const body = fromBase64(record.body);
  return {
    ...response,
    ...(body !== undefined && { body }),
    ...(record.mimeType !== undefined && { mimeType: record.mimeType }),
    ...(record.charset !== undefined && { charset: record.charset }),
    ...(record.error !== undefined && { error: record.error }),
  };
}

export function fromRecord(record: SessionRecord): Session {
  const session: Session = {
    id: record.id,
    request: requestFromRecord(record.request),
    state: record.state,
    startTime: Date.parse(record.startTime),
    metadata: metadataFromRecord(record.metadata),
    retryCount: record.retryCount,
    usedSecureDecryption: record.usedSecureDecryption,
    relatedSessionIds: record.relatedSessionIds,
  };
  return {
    ...session,
    ...(record.response !== undefined && { response: responseFromRecord(record.response) }),
    ...(record.responseStartTime !== undefined && {
      responseStartTime: Date.parse(record.responseStartTime),
    }),
    ...(record.endTime !== undefined && { endTime: Date.parse(record.endTime) }),
    ...(record.requestDurationMs !== undefined && { requestDurationMs: record.requestDurationMs }),
    ...(record.queuedTime !== undefined && { queuedTime: Date.parse(record.queuedTime) }),
    ...(record.parentSessionId !== undefined && { parentSessionId: record.parentSessionId }),
  };
}

// --- Documents ---

type PlainValue = string | number | boolean | PlainValue[] | { [key: string]: PlainValue };

/**
 * Reduce a record to plain data: undefined and null are dropped and object
 * keys come out sorted. Plist has no null, and sorted keys keep files diffable.
 */
function toPlain(value: unknown): PlainValue | undefined {
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`cannot encode non-finite number ${value}`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    const items: PlainValue[] = [];
    for (const item of value) {
      const plain = toPlain(item);
      if (plain !== undefined) items.push(plain);
    }
    return items;
  }
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: PlainValue } = {};
    for (const key of Object.keys(value).sort()) {
      const plain = toPlain(Reflect.get(value, key));
      if (plain !== undefined) out[key] = plain;
    }
    return out;
  }
  return undefined;
}

/**
 * `build` runs inside the encode guard, so a session that cannot become a
 * record (an invalid date, say) fails as encode-failed too.
 */
function serialise(build: () => unknown, format: SessionFormat): string {
  let plain: PlainValue | undefined;
  try {
    plain = toPlain(build());
  } catch (err) {
    throw new StorageError("encode-failed", `Failed to encode sessions: ${getErrorMessage(err)}`, {
      cause: err,
    });
  }
  if (plain === undefined) {
    throw new StorageError("encode-failed", "Failed to encode sessions: nothing to encode");
  }

  try {
    return format === "json" ? `${JSON.stringify(plain, null, 2)}\n` : plist.build(plain);
  } catch (err) {
    throw new StorageError("encode-failed", `Failed to encode sessions as ${format}: ${getErrorMessage(err)}`, {
      cause: err,
    });
  }
}

function deserialise(text: string, format: SessionFormat): unknown {
  try {
    return format === "json" ? JSON.parse(text) : plist.parse(text);
  } catch (err) {
    throw new StorageError("decode-failed", `Failed to parse ${format} document: ${getErrorMessage(err)}`, {
      cause: err,
    });
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new StorageError(
      "corrupted-data",
      `Invalid session data${where}: ${issue?.message ?? "unknown schema error"}`,
      { cause: result.error }
    );
  }
  return result.data;
}

export function encodeSession(session: Session, format: SessionFormat = "json"): string {
  return serialise(() => toRecord(session), format);
}

export function decodeSession(text: string, format: SessionFormat = "json"): Session {
  return fromRecord(validate(SessionRecordSchema, deserialise(text, format)));
}

export function encodeSessions(sessions: readonly Session[], format: SessionFormat = "json"): string {
  return serialise(() => sessions.map(toRecord), format);
}

export function decodeSessions(text: string, format: SessionFormat = "json"): Session[] {
  return validate(SessionListSchema, deserialise(text, format)).map(fromRecord);
}
