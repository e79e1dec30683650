import { config, validateConfig } from '../src/config.js';
import { ApprovalStore } from '../src/approvals/store.js';
import { AuditLogger } from '../src/audit/logger.js';
import { createAuditSink } from '../src/providers/index.js';

validateConfig();

const audit = new AuditLogger(createAuditSink(config), config.version);
const store = ApprovalStore.fromConfig(config, { audit });

try {
  // fromConfig already pruned once; expire overdue rows and prune again
  const expired = store.expireOverdueEnvelopes();
  const pruned = store.pruneExpiredEnvelopes();
  console.log(`Expired ${expired} overdue envelope(s), pruned ${pruned} past retention`);
  console.log(`Pending envelopes: ${store.countPending()}`);
} finally {
  store.close();
}
