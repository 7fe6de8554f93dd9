/**
 * Session payload construction and canonical JSON serialization.
 *
 * Serialized form: keys in insertion order, `", "` between members,
 * `": "` between key and value, DEL and non-ASCII escaped as \uXXXX. The output
 * is pure ASCII, so its UTF-8 bytes equal its characters one-to-one.
 */

import { z } from 'zod';
import { SessionErrors } from '../utils/errors.js';
import { SESSION_ID_KEY } from './types.js';
import type { JsonValue, PayloadFields, SessionPayload } from './types.js';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const SessionPayloadSchema = z
  .object({ [SESSION_ID_KEY]: z.string() })
  .catchall(JsonValueSchema);

/**
 * @throws ConfigurationError (RESERVED_PAYLOAD_KEY) if `extra` owns `session_id`
 */
export function assertNoReservedKeys(extra?: PayloadFields): void {
  if (extra && Object.prototype.hasOwnProperty.call(extra, SESSION_ID_KEY)) {
    throw SessionErrors.RESERVED_PAYLOAD_KEY(SESSION_ID_KEY);
  }
}

/**
 * Merge caller fields behind a fresh `session_id`. Every caller field,
 * `__proto__` included, becomes an own property.
 *
 * @throws ConfigurationError (RESERVED_PAYLOAD_KEY) if `extra` owns `session_id`
 */
export function buildPayload(sessionId: string, extra?: PayloadFields): SessionPayload {
  assertNoReservedKeys(extra);
  return { [SESSION_ID_KEY]: sessionId, ...extra };
}

// DEL and everything above it, as in ASCII-only JSON encoders
function quote(text: string): string {
  return JSON.stringify(text).replace(
    /[\u007f-\uffff]/g,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

function serializeValue(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string') {
    return quote(value);
  }
  if (typeof value === 'number') {
    // NaN and Infinity have no JSON form
    return Number.isFinite(value) ? JSON.stringify(value) : 'null';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    return `[${value.map(serializeValue).join(', ')}]`;
  }
  const members = Object.entries(value).map(([key, member]) => `${quote(key)}: ${serializeValue(member)}`);
  return `{${members.join(', ')}}`;
}

export function serializePayload(payload: SessionPayload): string {
  return serializeValue(payload);
}

/**
 * Parse serialized payload text back into a SessionPayload.
 *
 * @throws DecodeError (INVALID_JSON)
 */
export function parsePayload(text: string): SessionPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw SessionErrors.INVALID_JSON(error instanceof Error ? error.message : 'unparseable');
  }

  // Return the parsed value itself: zod's output is rebuilt by assignment
  // and would lose a `__proto__` member
  if (isSessionPayload(raw)) {
    return raw;
  }
  const result = SessionPayloadSchema.safeParse(raw);
  throw SessionErrors.INVALID_JSON(result.error?.issues[0]?.message ?? 'invalid payload');
}

function isSessionPayload(value: unknown): value is SessionPayload {
  return SessionPayloadSchema.safeParse(value).success;
}
