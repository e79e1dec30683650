import { config, validateConfig, ConfigError } from '../src/config.js';
import { ApprovalStore } from '../src/approvals/store.js';
import { AuditLogger } from '../src/audit/logger.js';
import { KeyManagerError } from '../src/keys/errors.js';
import { ApprovalKeyManager } from '../src/keys/manager.js';
import { readNewPassphrase, readPassphrase } from '../src/keys/passphrase.js';
import { createAuditSink } from '../src/providers/index.js';

function usage(): void {
  console.log(
    [
      'Usage:',
      '  tsx scripts/keys.ts init      Generate the first approval signing key',
      '  tsx scripts/keys.ts rotate    Replace the signing key and expire pending envelopes',
      '  tsx scripts/keys.ts status    Show the active key and keyring',
      '',
      'Passphrases are read from APPROVAL_PASSPHRASE (and APPROVAL_NEW_PASSPHRASE for rotate),',
      'or prompted for on a terminal.',
    ].join('\n')
  );
}

async function init(keyManager: ApprovalKeyManager): Promise<void> {
  const passphrase = await readNewPassphrase('APPROVAL_PASSPHRASE', 'New approval key passphrase: ');
  const keyId = await keyManager.createInitialKey(passphrase);
  console.log(`Created approval key ${keyId}`);
  console.log(`Private key: ${config.privateKeyPath}`);
  console.log(`Public key: ${config.publicKeyPath}`);
}

async function rotate(keyManager: ApprovalKeyManager): Promise<void> {
  const currentPassphrase = await readPassphrase('APPROVAL_PASSPHRASE', 'Current approval key passphrase: ');
  const newPassphrase = await readNewPassphrase('APPROVAL_NEW_PASSPHRASE', 'New approval key passphrase: ');

  const audit = new AuditLogger(createAuditSink(config), config.version);
  const store = ApprovalStore.fromConfig(config, { audit });
  try {
    const result = await keyManager.rotateKey({
      currentPassphrase,
      newPassphrase,
      expirePendingEnvelopes: () => store.expirePendingEnvelopes(),
    });
    audit.keyRotated(result);
    console.log(`Rotated approval key ${result.previousKeyId} -> ${result.keyId}`);
    console.log(`Expired ${result.expiredEnvelopes} pending envelope(s)`);
  } finally {
    store.close();
  }
}

function status(keyManager: ApprovalKeyManager): void {
  if (!keyManager.hasKeyFiles()) {
    console.log('No approval key. Run `tsx scripts/keys.ts init`.');
    return;
  }
  for (const entry of keyManager.listKeyring()) {
    const state = entry.retired_at ? `retired ${entry.retired_at}` : 'active';
    console.log(`${entry.key_id}  created ${entry.created_at}  ${state}`);
  }
}

validateConfig();

const command = process.argv[2];
const keyManager = ApprovalKeyManager.fromConfig(config);

try {
  switch (command) {
    case 'init':
      await init(keyManager);
      break;
    case 'rotate':
      await rotate(keyManager);
      break;
    case 'status':
      status(keyManager);
      break;
    default:
      usage();
      process.exit(1);
  }
} catch (err) {
  if (err instanceof ConfigError || err instanceof KeyManagerError) {
    console.error(`ERROR: ${err.message}`);
    process.exit(1);
  }
  throw err;
} finally {
  keyManager.lock();
}
