import type { AuditEntry } from '../types.js';

/**
 * AuditSink interface for writing audit log entries.
 * Writes are synchronous so an entry is durable before the store call that
 * produced it returns.
 */
export interface AuditSink {
  name: string;

  /**
   * Write an audit entry. Implementations must not throw.
   */
  write(entry: AuditEntry): void;
}
