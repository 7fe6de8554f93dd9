/**
 * Audit Service
 *
 * Write-only trail of token generation and failed verification. Disabled
 * instances accept and discard every entry, so callers never branch on
 * whether auditing is on. Logging is synchronous like every token operation.
 */

import type { AuditEntry } from './types.js';

export interface AuditServiceConfig {
  /** Record entries at all (default: false) */
  enabled?: boolean;

  /** Record successes as well as failures (default: true) */
  logAllAttempts?: boolean;

  /** Where entries go (default: a bounded InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Capacity of the default storage (default: 10000) */
  maxEntries?: number;

  /** Receives the full buffer, oldest first, each time the default storage is over capacity */
  onOverflow?: (entries: AuditEntry[]) => void;
}

export interface AuditStorage {
  log(entry: AuditEntry): void;
}

/**
 * Bounded buffer; the oldest entry is evicted once capacity is exceeded.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 10000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);
    if (this.entries.length <= this.maxEntries) {
      return;
    }

    this.onOverflow?.(this.entries.slice());
    this.entries.splice(0, this.entries.length - this.maxEntries);
  }

  /** @internal */
  getEntries(): AuditEntry[] {
    return this.entries.slice();
  }

  /** @internal */
  clear(): void {
    this.entries.length = 0;
  }
}

export class AuditService {
  private readonly enabled: boolean;
  private readonly logAllAttempts: boolean;
  private readonly storage: AuditStorage;

  constructor(config: AuditServiceConfig = {}) {
    this.enabled = config.enabled ?? false;
    this.logAllAttempts = config.logAllAttempts ?? true;
    this.storage = config.storage ?? new InMemoryAuditStorage(config.maxEntries, config.onOverflow);
  }

  /**
   * @throws Error if an enabled service receives an entry without a source
   */
  log(entry: AuditEntry): void {
    if (!this.enabled) {
      return;
    }
    if (!entry.source) {
      throw new Error(`[AuditService] Audit entry for action "${entry.action}" has no source`);
    }
    if (entry.success && !this.logAllAttempts) {
      return;
    }
    this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** @internal */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}
