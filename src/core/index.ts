/**
 * Core Module Public API
 *
 * Random source, codec, payload serializer and token manager.
 */

// ============================================================================
// Services
// ============================================================================

export {
  SessionTokenManager,
  signature,
  generateSessionId,
  checkSessionIdSignature,
  generateSecretKey,
  getTokenPayload,
  getSessionId,
  getDefaultTokenManager,
  setDefaultTokenManager,
} from './token-manager.js';
export type {
  SessionTokenManagerConfig,
  GenerateSessionIdOptions,
  CheckSignatureOptions,
} from './token-manager.js';

export {
  RandomnessState,
  SecureRandomGenerator,
  FallbackRandomGenerator,
  createSecureRandomGenerator,
  getRandomnessState,
  setRandomnessState,
  obtainRandomSource,
  reseedIfNeeded,
  randomString,
  INSECURE_FALLBACK_WARNING,
  MISSING_SECRET_KEY_WARNING,
} from './random-source.js';
export type {
  RandomGenerator,
  SeedableRandomGenerator,
  RandomSource,
  RandomnessStateOptions,
} from './random-source.js';

export { base64Encode, base64Decode, decodeUtf8, toBytes } from './codec.js';
export type { TextEncoding } from './codec.js';

export {
  assertNoReservedKeys,
  buildPayload,
  serializePayload,
  parsePayload,
  SessionPayloadSchema,
} from './payload.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

// ============================================================================
// Types
// ============================================================================

export type {
  AuditEntry,
  JsonPrimitive,
  JsonValue,
  PayloadFields,
  SecretKey,
  SessionPayload,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

export { SESSION_ID_KEY, RANDOM_STRING_LENGTH, ALPHANUMERIC, SECRET_KEY_ENV } from './types.js';
