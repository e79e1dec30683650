import { appendFileSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { AuditEntry } from '../types.js';
import type { AuditSink } from './types.js';

/**
 * JSONL audit sink - writes audit entries to daily log files.
 * Entries are append-only and never mutated.
 */
export class JsonlAuditSink implements AuditSink {
  name = 'jsonl';

  constructor(private readonly auditDir: string) {}

  write(entry: AuditEntry): void {
    if (!existsSync(this.auditDir)) {
      mkdirSync(this.auditDir, { recursive: true });
    }

    const logFile = join(this.auditDir, `${entry.timestamp.slice(0, 10)}.jsonl`);
    const line = JSON.stringify(entry) + '\n';

    try {
      appendFileSync(logFile, line, 'utf-8');
    } catch (err) {
      // Audit failure never blocks an approval decision; surface it on stderr
      console.error('Failed to write audit log:', err);
      console.error('Entry:', entry);
    }
  }
}
