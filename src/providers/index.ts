import type { AppConfig } from '../config.js';
import type { AuditSink } from './types.js';
import { JsonlAuditSink } from './jsonl-audit.js';

export type { AuditSink } from './types.js';
export { JsonlAuditSink } from './jsonl-audit.js';

/**
 * Create the audit sink selected by AUDIT_SINK. Returns null when auditing is off.
 */
export function createAuditSink(cfg: Pick<AppConfig, 'auditSink' | 'auditDir'>): AuditSink | null {
  switch (cfg.auditSink) {
    case 'none':
      return null;
    case 'jsonl':
    default:
      return new JsonlAuditSink(cfg.auditDir);
  }
}
