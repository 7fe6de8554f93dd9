/**
 * Core Session Token Types
 *
 * Type definitions shared by the random source, codec, payload serializer
 * and token manager. Nothing here depends on the config layer.
 */

// ============================================================================
// Constants
// ============================================================================

/** Payload key bound to the random identifier; callers may not supply it. */
export const SESSION_ID_KEY = 'session_id';

/** Length of generated session ids and secret keys, in characters. */
export const RANDOM_STRING_LENGTH = 44;

export const ALPHANUMERIC = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/** Name of the environment variable holding the signing key. */
export const SECRET_KEY_ENV = 'SESSION_SECRET_KEY';

// ============================================================================
// Payload
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Caller-supplied fields merged into a token payload. */
export type PayloadFields = Record<string, JsonValue>;

/**
 * Decoded token payload. `session_id` is always the first key.
 */
export interface SessionPayload {
  session_id: string;
  [key: string]: JsonValue;
}

/**
 * Signing key. Strings are taken as UTF-8.
 */
export type SecretKey = string | Uint8Array;

// ============================================================================
// Audit
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field to track the origin of the entry.
 * Entries never carry raw tokens or secret keys.
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry (e.g., 'session:token') */
  source: string;

  /** User ID associated with the event (if applicable) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error message if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}
