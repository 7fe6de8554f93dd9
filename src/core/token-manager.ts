/**
 * Session Token Manager - Session Id Generation and Signature Verification
 *
 * Token format:
 * - unsigned: `<base64url(payload_json)>`
 * - signed:   `<base64url(payload_json)>.<base64url(HMAC-SHA256(key, payload_segment))>`
 *
 * The payload is readable by anyone holding the token. Signing gives
 * authenticity, not confidentiality.
 *
 * Usage:
 * ```typescript
 * const manager = new SessionTokenManager({ secretKey, signSessions: true });
 * const token = manager.generateSessionId({ extraPayload: { user: 'alice' } });
 *
 * if (manager.checkSessionIdSignature(token)) {
 *   const { session_id } = manager.getTokenPayload(token);
 * }
 * ```
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { DecodeError, SessionErrors, sanitizeError } from '../utils/errors.js';
import { readEnvironmentSettingsOrDefaults } from '../config/environment.js';
import { AuditService } from './audit-service.js';
import { base64Decode, base64Encode, decodeUtf8, toBytes } from './codec.js';
import { assertNoReservedKeys, buildPayload, parsePayload, serializePayload } from './payload.js';
import { getRandomnessState, randomString, reseedIfNeeded } from './random-source.js';
import type { RandomnessState } from './random-source.js';
import type { PayloadFields, SecretKey, SessionPayload } from './types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface SessionTokenManagerConfig {
  /** Default signing key for every call */
  secretKey?: SecretKey;

  /** Whether tokens are signed and checked by default (default: false) */
  signSessions?: boolean;

  /** Randomness state (default: the process-wide one) */
  randomness?: RandomnessState;

  /** Optional audit trail of generation and failed verification */
  auditService?: AuditService;
}

export interface GenerateSessionIdOptions {
  signed?: boolean;
  secretKey?: SecretKey;
  extraPayload?: PayloadFields;
}

export interface CheckSignatureOptions {
  signed?: boolean;
  secretKey?: SecretKey;
}

type SignatureCheck = { valid: true } | { valid: false; reason: string; error?: unknown };

const TOKEN_SEPARATOR = '.';
const SIGNATURE_BYTES = 32;
const AUDIT_SOURCE = 'session:token';

function hmacSha256(secretKey: SecretKey, message: string): Buffer {
  return createHmac('sha256', toBytes(secretKey)).update(message, 'utf8').digest();
}

/**
 * Compute the encoded signature of `text`.
 */
export function signature(text: string, secretKey: SecretKey): string {
  return base64Encode(hmacSha256(secretKey, text));
}

// ============================================================================
// Session Token Manager
// ============================================================================

export class SessionTokenManager {
  private readonly secretKey?: SecretKey;
  private readonly signSessions: boolean;
  private readonly randomness?: RandomnessState;
  private readonly auditService?: AuditService;

  constructor(config: SessionTokenManagerConfig = {}) {
    this.secretKey = config.secretKey;
    this.signSessions = config.signSessions ?? false;
    this.randomness = config.randomness;
    this.auditService = config.auditService;
  }

  /**
   * Generate a new session token.
   *
   * @throws ConfigurationError (RESERVED_PAYLOAD_KEY) if extraPayload contains `session_id`
   * @throws ConfigurationError (MISSING_SECRET_KEY) if signing without a secret key
   */
  generateSessionId(options: GenerateSessionIdOptions = {}): string {
    const signed = options.signed ?? this.signSessions;
    const secretKey = options.secretKey ?? this.secretKey;

    assertNoReservedKeys(options.extraPayload);
    if (signed && secretKey === undefined) {
      throw SessionErrors.MISSING_SECRET_KEY('sign session ids');
    }

    const source = this.getRandomness().obtain();
    reseedIfNeeded(source, secretKey);
    const payload = buildPayload(randomString(source), options.extraPayload);

    const segment = base64Encode(serializePayload(payload));
    const token =
      signed && secretKey !== undefined
        ? `${segment}${TOKEN_SEPARATOR}${signature(segment, secretKey)}`
        : segment;

    this.auditService?.log({
      timestamp: new Date(),
      source: AUDIT_SOURCE,
      action: 'generate',
      success: true,
      metadata: {
        signed,
        usingSecureSource: source.usingSecureSource,
        extraFields: Object.keys(options.extraPayload ?? {}),
      },
    });

    return token;
  }

  /**
   * Check that a token was signed with the given key.
   *
   * Returns true for any input when signing is disabled. Never throws.
   */
  checkSessionIdSignature(token: string | Uint8Array, options: CheckSignatureOptions = {}): boolean {
    const signed = options.signed ?? this.signSessions;
    if (!signed) {
      return true;
    }

    const result = this.verify(token, options.secretKey ?? this.secretKey);
    if (!result.valid) {
      this.auditService?.log({
        timestamp: new Date(),
        source: AUDIT_SOURCE,
        action: 'verify',
        success: false,
        reason: result.reason,
        ...(result.error !== undefined && { error: String(sanitizeError(result.error).message) }),
      });
    }
    return result.valid;
  }

  /**
   * Generate a printable secret key suitable for signing.
   */
  generateSecretKey(): string {
    const source = this.getRandomness().obtain();
    reseedIfNeeded(source, this.secretKey);
    return randomString(source);
  }

  /**
   * Decode the payload of a signed or unsigned token. Does NOT verify the
   * signature; call checkSessionIdSignature first.
   *
   * @throws DecodeError
   */
  getTokenPayload(token: string): SessionPayload {
    const segments = token.split(TOKEN_SEPARATOR);
    if (segments.length > 2) {
      throw SessionErrors.MALFORMED_TOKEN({ segments: segments.length });
    }
    return parsePayload(base64Decode(segments[0], 'utf-8'));
  }

  /**
   * @throws DecodeError
   */
  getSessionId(token: string): string {
    return this.getTokenPayload(token).session_id;
  }

  private getRandomness(): RandomnessState {
    return this.randomness ?? getRandomnessState();
  }

  private verify(token: string | Uint8Array, secretKey?: SecretKey): SignatureCheck {
    if (secretKey === undefined) {
      return { valid: false, reason: 'no secret key' };
    }

    try {
      const text = typeof token === 'string' ? token : decodeUtf8(token);
      const segments = text.split(TOKEN_SEPARATOR);
      if (segments.length !== 2) {
        return { valid: false, reason: 'malformed token' };
      }

      const [payloadSegment, signatureSegment] = segments;
      const canonicalSegment = base64Encode(base64Decode(payloadSegment));
      const presented = base64Decode(signatureSegment);
      if (presented.length !== SIGNATURE_BYTES) {
        return { valid: false, reason: 'signature length mismatch' };
      }

      const expected = hmacSha256(secretKey, canonicalSegment);
      return timingSafeEqual(presented, expected)
        ? { valid: true }
        : { valid: false, reason: 'signature mismatch' };
    } catch (error) {
      if (error instanceof DecodeError) {
        return { valid: false, reason: 'undecodable token', error };
      }
      throw error;
    }
  }
}

// ============================================================================
// Module-level API
// ============================================================================

let defaultManager: SessionTokenManager | null = null;

/**
 * Manager used by the module-level functions. Built lazily from
 * environment settings unless replaced with setDefaultTokenManager().
 * Invalid settings are ignored with a warning, so checkSessionIdSignature
 * keeps its never-throws contract.
 */
export function getDefaultTokenManager(): SessionTokenManager {
  if (defaultManager === null) {
    const settings = readEnvironmentSettingsOrDefaults();
    defaultManager = new SessionTokenManager({
      secretKey: settings.secretKey,
      signSessions: settings.signSessions,
      auditService: settings.audit ? new AuditService({ enabled: true }) : undefined,
    });
  }
  return defaultManager;
}

export function setDefaultTokenManager(manager: SessionTokenManager | null): void {
  defaultManager = manager;
}

export function generateSessionId(options?: GenerateSessionIdOptions): string {
  return getDefaultTokenManager().generateSessionId(options);
}

export function checkSessionIdSignature(
  token: string | Uint8Array,
  options?: CheckSignatureOptions
): boolean {
  return getDefaultTokenManager().checkSessionIdSignature(token, options);
}

export function generateSecretKey(): string {
  return getDefaultTokenManager().generateSecretKey();
}

export function getTokenPayload(token: string): SessionPayload {
  return getDefaultTokenManager().getTokenPayload(token);
}

export function getSessionId(token: string): string {
  return getDefaultTokenManager().getSessionId(token);
}
