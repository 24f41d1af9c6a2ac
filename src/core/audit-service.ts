/**
 * Audit Service - Authentication Trail with Null Object Pattern
 *
 * Write-only audit logging with overflow handling. Works without
 * configuration (disabled by default), so callers never need a null check.
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Maximum entries kept by the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Callback invoked when the in-memory storage reaches capacity */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage interface for audit entries
 *
 * CRITICAL: This is a WRITE-ONLY API. Querying must be backed by indexed persistence.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

/**
 * Default in-memory audit storage; calls onOverflow before discarding entries
 */
class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];
  private readonly maxEntries: number;
  private onOverflow?: (entries: AuditEntry[]) => void;

  constructor(maxEntries: number = 10000, onOverflow?: (entries: AuditEntry[]) => void) {
    this.maxEntries = maxEntries;
    this.onOverflow = onOverflow;
  }

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      if (this.onOverflow) {
        this.onOverflow([...this.entries]);
      }

      // Remove oldest entry
      this.entries.shift();
    }
  }

  /**
   * @internal
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /**
   * @internal
   */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service (Null Object Pattern)
// ============================================================================

/**
 * Usage:
 * ```typescript
 * // Disabled by default (Null Object Pattern)
 * const audit = new AuditService();
 * await audit.log({ ... }); // No-op
 *
 * const audit = new AuditService({
 *   enabled: true,
 *   onOverflow: (entries) => archive(entries),
 * });
 * ```
 */
export class AuditService {
  private enabled: boolean;
  private storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
  }

  /**
   * Log an audit entry
   *
   * @throws {Error} If the entry has no source field
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error(
        'CRITICAL: AuditEntry missing required field: source. ' +
          'All audit entries must include a source field for audit trail integrity.'
      );
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * @internal
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}

export { InMemoryAuditStorage };
