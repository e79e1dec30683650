import { config, validateConfig, ConfigError } from './config.js';
import { buildServer } from './app.js';
import { ApprovalStore } from './approvals/store.js';
import { AuditLogger } from './audit/logger.js';
import { KeyManagerError } from './keys/errors.js';
import { ApprovalKeyManager } from './keys/manager.js';
import { readPassphrase } from './keys/passphrase.js';
import { loadToolPolicy, ToolPolicyRegistry } from './policy/toolPolicy.js';
import { createAuditSink } from './providers/index.js';

// Validate config before starting
validateConfig();

let store: ApprovalStore;
let keyManager: ApprovalKeyManager;
let toolPolicy: ToolPolicyRegistry;

try {
  toolPolicy = config.toolPolicyPath ? loadToolPolicy(config.toolPolicyPath) : ToolPolicyRegistry.default();

  const audit = new AuditLogger(createAuditSink(config), config.version);
  store = ApprovalStore.fromConfig(config, { audit });

  keyManager = ApprovalKeyManager.fromConfig(config);
  if (!keyManager.hasKeyFiles()) {
    throw new KeyManagerError('missing_file', 'No approval key found. Run `npm run keys -- init` first.');
  }
  const { keyId, upgraded } = await keyManager.unlock(
    await readPassphrase('APPROVAL_PASSPHRASE', 'Approval key passphrase: ')
  );
  console.log(`Approval key unlocked: ${keyId.slice(0, 12)}`);
  if (upgraded) {
    console.log('Approval key re-encrypted with current KDF parameters');
  }
} catch (err) {
  if (err instanceof ConfigError || err instanceof KeyManagerError) {
    console.error(`ERROR: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

console.log(`Tool policy: ${config.toolPolicyPath || 'built-in defaults'}`);
console.log(`Read-only tools: ${toolPolicy.readOnlyTools().join(', ')}`);
console.log(`Approval store: ${config.approvalDbPath}`);

const app = await buildServer(
  { store, keyManager, toolPolicy, version: config.version },
  { logLevel: config.logLevel }
);

// Periodic expiry of overdue envelopes (every 5 minutes)
const sweep = setInterval(
  () => {
    store.expireOverdueEnvelopes();
  },
  5 * 60 * 1000
);

// Graceful shutdown
async function shutdown(): Promise<void> {
  console.log('Shutting down...');
  clearInterval(sweep);
  await app.close();
  keyManager.lock();
  store.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

// Start server
try {
  await app.listen({ port: config.port, host: config.host });
  console.log(`Countersign running on http://${config.host}:${config.port}`);
  console.log(`Health check: http://${config.host}:${config.port}/health`);
} catch (err) {
  console.error('Failed to start server:', err);
  process.exit(1);
}
