/**
 * Unit Tests for Configuration Manager
 *
 * Tests configuration loading, environment overrides, security validation
 * and token manager construction.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { ConfigManager } from '../../../src/config/manager.js';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import { createRandomnessState } from '../../../src/testing/index.js';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

const LONG_KEY = 'test-secret-test-secret-test-secret';

describe('ConfigManager', () => {
  let testDir: string;
  let configPath: string;
  let warnSpy: MockInstance;
  let logSpy: MockInstance;

  async function writeConfig(config: unknown): Promise<void> {
    await writeFile(configPath, JSON.stringify(config), 'utf-8');
  }

  function createManager(env: NodeJS.ProcessEnv = {}): ConfigManager {
    return new ConfigManager({ env });
  }

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'session-config-test-'));
    configPath = join(testDir, 'session.json');
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    warnSpy.mockRestore();
    logSpy.mockRestore();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should use defaults without a file or environment', async () => {
      const config = await createManager().loadConfig();

      expect(config).toEqual({
        secretKey: undefined,
        signSessions: false,
        audit: { enabled: false, logAllAttempts: true },
      });
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should load a configuration file', async () => {
      await writeConfig({ secretKey: LONG_KEY, signSessions: true, audit: { enabled: true } });

      const config = await createManager().loadConfig(configPath);

      expect(config).toEqual({
        secretKey: LONG_KEY,
        signSessions: true,
        audit: { enabled: true, logAllAttempts: true },
      });
      expect(logSpy).toHaveBeenCalledWith(`[ConfigManager] Loaded configuration from ${configPath}`);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('should read the file named by SESSION_CONFIG_PATH', async () => {
      await writeConfig({ signSessions: false, audit: { enabled: true } });

      const config = await createManager({ SESSION_CONFIG_PATH: configPath }).loadConfig();

      expect(config.audit.enabled).toBe(true);
    });

    it('should let environment variables override the file', async () => {
      await writeConfig({ secretKey: LONG_KEY, signSessions: true, audit: { enabled: true } });

      const config = await createManager({
        SESSION_SECRET_KEY: `${LONG_KEY}-env`,
        SESSION_SIGN_SESSIONS: 'yes',
        SESSION_AUDIT: 'false',
      }).loadConfig(configPath);

      expect(config.secretKey).toBe(`${LONG_KEY}-env`);
      expect(config.signSessions).toBe(true);
      expect(config.audit.enabled).toBe(false);
    });

    it('should keep file values the environment does not set', async () => {
      await writeConfig({ secretKey: LONG_KEY, audit: { enabled: true, logAllAttempts: false } });

      const config = await createManager({ SESSION_SIGN_SESSIONS: 'true' }).loadConfig(configPath);

      expect(config).toEqual({
        secretKey: LONG_KEY,
        signSessions: true,
        audit: { enabled: true, logAllAttempts: false },
      });
    });

    it('should cache the loaded configuration', async () => {
      const manager = createManager();

      const first = await manager.loadConfig();
      const second = await manager.loadConfig();

      expect(second).toBe(first);
    });

    it('should wrap a missing file', async () => {
      await expect(createManager().loadConfig(join(testDir, 'missing.json'))).rejects.toThrow(
        /^Failed to load configuration: ENOENT/
      );
    });

    it('should wrap invalid JSON', async () => {
      await writeFile(configPath, '{ not json', 'utf-8');

      await expect(createManager().loadConfig(configPath)).rejects.toThrow(
        /^Failed to load configuration:/
      );
    });

    it('should wrap schema violations', async () => {
      await writeConfig({ signSessions: 'sometimes' });

      await expect(createManager().loadConfig(configPath)).rejects.toThrow(
        'Failed to load configuration: Configuration error: signSessions: Expected boolean, received string'
      );
    });

    it('should wrap invalid environment flags', async () => {
      await expect(createManager({ SESSION_SIGN_SESSIONS: 'maybe' }).loadConfig()).rejects.toThrow(
        /^Failed to load configuration:/
      );
    });
  });

  describe('security requirements', () => {
    it('should require a secret key when signing is enabled', async () => {
      await expect(createManager({ SESSION_SIGN_SESSIONS: 'true' }).loadConfig()).rejects.toThrow(
        'Failed to load configuration: A secret key is required to enable session signing'
      );
    });

    it('should warn about short secret keys', async () => {
      await createManager({ SESSION_SECRET_KEY: 'test-secret' }).loadConfig();

      expect(warnSpy).toHaveBeenCalledWith(
        '[ConfigManager] Secret key is shorter than 32 characters - ' +
          'consider generating one with generateSecretKey()'
      );
    });

    it('should warn when signing is disabled in production', async () => {
      const manager = createManager({ NODE_ENV: 'production' });

      await manager.loadConfig();

      expect(manager.isSecureEnvironment()).toBe(true);
      expect(warnSpy).toHaveBeenCalledWith(
        '[ConfigManager] Session signing is disabled in a production environment'
      );
    });

    it('should not warn for a signed production setup', async () => {
      await createManager({
        NODE_ENV: 'production',
        SESSION_SECRET_KEY: LONG_KEY,
        SESSION_SIGN_SESSIONS: '1',
      }).loadConfig();

      expect(warnSpy).not.toHaveBeenCalled();
    });
  });

  describe('getConfig', () => {
    it('should throw before loading', () => {
      expect(() => createManager().getConfig()).toThrow(
        'Configuration not loaded. Call loadConfig() first.'
      );
    });

    it('should return the loaded configuration', async () => {
      const manager = createManager();
      const config = await manager.loadConfig();

      expect(manager.getConfig()).toBe(config);
    });
  });

  describe('reloadConfig', () => {
    it('should read the file again', async () => {
      await writeConfig({ signSessions: false });
      const manager = createManager();
      await manager.loadConfig(configPath);

      await writeConfig({ secretKey: LONG_KEY, signSessions: true });
      const reloaded = await manager.reloadConfig(configPath);

      expect(reloaded.signSessions).toBe(true);
      expect(logSpy).toHaveBeenCalledWith('[ConfigManager] Reloading configuration...');
    });
  });

  describe('createTokenManager', () => {
    it('should build a signing manager from the configuration', async () => {
      const manager = createManager({ SESSION_SECRET_KEY: LONG_KEY, SESSION_SIGN_SESSIONS: 'true' });
      await manager.loadConfig();

      const tokens = manager.createTokenManager(createRandomnessState());
      const token = tokens.generateSessionId();

      expect(token.split('.')).toHaveLength(2);
      expect(tokens.checkSessionIdSignature(token)).toBe(true);
      expect(tokens.checkSessionIdSignature(token, { secretKey: 'qrs' })).toBe(false);
    });

    it('should use the injected audit service', async () => {
      const auditService = new AuditService({ enabled: true });
      const manager = new ConfigManager({ env: {}, auditService });
      await manager.loadConfig();

      manager.createTokenManager(createRandomnessState()).generateSessionId();

      const entries = (auditService._getStorage() as InMemoryAuditStorage).getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].action).toBe('generate');
    });

    it('should throw before loading', () => {
      expect(() => createManager().createTokenManager()).toThrow(
        'Configuration not loaded. Call loadConfig() first.'
      );
    });
  });

  describe('accessors', () => {
    it('should expose the environment', () => {
      const env = { NODE_ENV: 'test' };
      const manager = createManager(env);

      expect(manager.getEnvironment()).toBe(env);
      expect(manager.isSecureEnvironment()).toBe(false);
    });
  });
});
