/**
 * Configuration Module - Public API
 */

export { ConfigManager, type ConfigManagerOptions } from './manager.js';

export {
  SessionConfigSchema,
  AuditConfigSchema,
  DEFAULT_SESSION_CONFIG,
  RECOMMENDED_SECRET_KEY_LENGTH,
  type SessionConfig,
  type AuditConfig,
} from './schema.js';

export {
  EnvironmentSchema,
  readEnvironmentSettings,
  readEnvironmentSettingsOrDefaults,
  isSecretKeyConfigured,
  type EnvironmentSettings,
} from './environment.js';

