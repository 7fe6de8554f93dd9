import { readFile } from 'fs/promises';
import { SessionConfigSchema, RECOMMENDED_SECRET_KEY_LENGTH, type SessionConfig } from './schema.js';
import { readEnvironmentSettings } from './environment.js';
import { AuditService } from '../core/audit-service.js';
import { SessionTokenManager } from '../core/token-manager.js';
import type { RandomnessState } from '../core/random-source.js';
import { SessionErrors } from '../utils/errors.js';

export interface ConfigManagerOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Audit service handed to token managers built by createTokenManager() */
  auditService?: AuditService;
}

export class ConfigManager {
  private config: SessionConfig | null = null;
  private env: NodeJS.ProcessEnv;
  private auditService?: AuditService;

  constructor(options?: ConfigManagerOptions) {
    this.env = options?.env ?? process.env;
    this.auditService = options?.auditService;
  }

  /**
   * Load and validate configuration.
   *
   * Reads the JSON file at `configPath` (or SESSION_CONFIG_PATH) when one is
   * given, then lets environment variables override file values. Without a
   * file the environment alone is used.
   *
   * @throws Error prefixed with "Failed to load configuration:"
   */
  async loadConfig(configPath?: string): Promise<SessionConfig> {
    if (this.config) {
      return this.config;
    }

    try {
      const settings = readEnvironmentSettings(this.env);
      const path = configPath ?? settings.configPath;

      let fileConfig: unknown = {};
      if (path) {
        fileConfig = JSON.parse(await readFile(path, 'utf-8'));
        console.log(`[ConfigManager] Loaded configuration from ${path}`);
      }

      const result = SessionConfigSchema.safeParse(fileConfig);
      if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw SessionErrors.INVALID_CONFIGURATION(issues.join('; '), { issues });
      }

      const parsed = result.data;
      const config: SessionConfig = {
        ...parsed,
        secretKey: settings.secretKey ?? parsed.secretKey,
        signSessions: settings.signSessions ?? parsed.signSessions,
        audit: { ...parsed.audit, enabled: settings.audit ?? parsed.audit.enabled },
      };

      this.validateSecurityRequirements(config);

      this.config = config;
      return this.config;
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration: ${error.message}`);
      }
      throw error;
    }
  }

  getEnvironment(): NodeJS.ProcessEnv {
    return this.env;
  }

  getConfig(): SessionConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  /**
   * Build a token manager whose defaults come from the loaded configuration.
   */
  createTokenManager(randomness?: RandomnessState): SessionTokenManager {
    const config = this.getConfig();
    const auditService =
      this.auditService ??
      (config.audit.enabled
        ? new AuditService({ enabled: true, logAllAttempts: config.audit.logAllAttempts })
        : undefined);

    return new SessionTokenManager({
      secretKey: config.secretKey,
      signSessions: config.signSessions,
      randomness,
      auditService,
    });
  }

  async reloadConfig(configPath?: string): Promise<SessionConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  isSecureEnvironment(): boolean {
    return this.env.NODE_ENV === 'production';
  }

  private validateSecurityRequirements(config: SessionConfig): void {
    if (config.signSessions && config.secretKey === undefined) {
      throw SessionErrors.MISSING_SECRET_KEY('enable session signing');
    }

    if (config.secretKey !== undefined && config.secretKey.length < RECOMMENDED_SECRET_KEY_LENGTH) {
      console.warn(
        `[ConfigManager] Secret key is shorter than ${RECOMMENDED_SECRET_KEY_LENGTH} characters - ` +
          'consider generating one with generateSecretKey()'
      );
    }

    if (this.isSecureEnvironment() && !config.signSessions) {
      console.warn('[ConfigManager] Session signing is disabled in a production environment');
    }
  }
}
