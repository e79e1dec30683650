import { existsSync, readFileSync } from 'node:fs';
import { join, dirname, isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectRoot = findProjectRoot(__dirname);

/**
 * Fatal operator error in configuration. Entry points print it and exit.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Walk up from the module until package.json is found (src/ in dev, dist/src/ when built)
function findProjectRoot(start: string): string {
  let current = start;
  for (let i = 0; i < 4; i += 1) {
    if (existsSync(join(current, 'package.json'))) {
      return current;
    }
    current = dirname(current);
  }
  return join(start, '..');
}

// Load version from package.json
function loadVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(projectRoot, 'package.json'), 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export type AuditSinkType = 'jsonl' | 'none';
export type KdfPreference = 'argon2id' | 'scrypt';

type Env = Record<string, string | undefined>;

export function readPositiveInt(name: string, defaultValue: number, env: Env = process.env): number {
  const value = readInt(name, defaultValue, env);
  if (value <= 0) {
    throw new ConfigError(`${name} must be > 0.`);
  }
  return value;
}

export function readNonNegativeInt(
  name: string,
  defaultValue: number,
  env: Env = process.env
): number {
  const value = readInt(name, defaultValue, env);
  if (value < 0) {
    throw new ConfigError(`${name} must be >= 0.`);
  }
  return value;
}

function readInt(name: string, defaultValue: number, env: Env): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be an integer.`);
  }
  return parseInt(raw, 10);
}

/**
 * Expired nonces must outlive every envelope that could still be replayed,
 * including the tolerated clock skew between issuing and consuming hosts.
 */
export function validateRetentionWindow(params: {
  ttlSeconds: number;
  nonceRetentionSeconds: number;
  clockSkewSeconds: number;
}): void {
  if (params.nonceRetentionSeconds < params.ttlSeconds + params.clockSkewSeconds) {
    throw new ConfigError(
      'Invalid approval retention config: NONCE_RETENTION_PERIOD_SECONDS must be >= ' +
        'APPROVAL_TTL_SECONDS + APPROVAL_CLOCK_SKEW_SECONDS.'
    );
  }
}

/**
 * Resolve the SQLite file backing the approval store.
 * APPROVAL_DB_PATH wins; otherwise APPROVAL_DATABASE_URL must be a sqlite:/// URL.
 */
export function resolveApprovalDbPath(env: Env = process.env, baseDir = projectRoot): string {
  const explicit = env.APPROVAL_DB_PATH;
  if (explicit) {
    return resolveFrom(explicit, baseDir);
  }

  const dataDir = resolveFrom(env.DATA_DIR || 'data', baseDir);
  const dbUrl = env.APPROVAL_DATABASE_URL || `sqlite:///${join(dataDir, 'approvals.sqlite')}`;
  if (!dbUrl.startsWith('sqlite:///')) {
    throw new ConfigError(
      'Approval store requires SQLite. Set APPROVAL_DB_PATH or use a sqlite:/// APPROVAL_DATABASE_URL.'
    );
  }

  const path = dbUrl.slice('sqlite:///'.length);
  if (path === ':memory:') {
    return path;
  }
  return resolveFrom(path, baseDir);
}

export function parseAuditSink(value: string | undefined): AuditSinkType {
  if (!value || value === 'jsonl') return 'jsonl';
  if (value === 'none') return 'none';
  throw new ConfigError(`AUDIT_SINK must be "jsonl" or "none", got "${value}".`);
}

export function parseKdfPreference(value: string | undefined): KdfPreference {
  if (!value || value === 'argon2id') return 'argon2id';
  if (value === 'scrypt') return 'scrypt';
  throw new ConfigError(`APPROVAL_KDF must be "argon2id" or "scrypt", got "${value}".`);
}

function resolveFrom(raw: string, baseDir: string): string {
  return isAbsolute(raw) ? raw : resolve(baseDir, raw);
}

export const config = {
  // Server
  port: parseInt(process.env.COUNTERSIGN_PORT || '3848', 10),
  host: process.env.COUNTERSIGN_HOST || '127.0.0.1',

  // Approval envelopes
  get approvalTtlSeconds() {
    return readPositiveInt('APPROVAL_TTL_SECONDS', 3600);
  },
  get nonceRetentionSeconds() {
    return readPositiveInt('NONCE_RETENTION_PERIOD_SECONDS', 7 * 24 * 3600);
  },
  get clockSkewSeconds() {
    return readNonNegativeInt('APPROVAL_CLOCK_SKEW_SECONDS', 60);
  },
  minPassphraseLength: 12,

  // Paths
  dataDir: resolveFrom(process.env.DATA_DIR || 'data', projectRoot),
  toolPolicyPath: process.env.TOOL_POLICY_PATH || '',

  // Provider selection
  get auditSink() {
    return parseAuditSink(process.env.AUDIT_SINK);
  },
  get kdf() {
    return parseKdfPreference(process.env.APPROVAL_KDF);
  },

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',

  // Version
  version: loadVersion(),

  // Derived paths
  get approvalDbPath() {
    return resolveApprovalDbPath();
  },
  get keyDir() {
    const raw = process.env.APPROVAL_KEY_DIR;
    return raw ? resolveFrom(raw, projectRoot) : join(this.dataDir, 'keys');
  },
  get privateKeyPath() {
    const raw = process.env.APPROVAL_PRIVATE_KEY_PATH;
    return raw ? resolveFrom(raw, projectRoot) : join(this.keyDir, 'approval.key');
  },
  get publicKeyPath() {
    const raw = process.env.APPROVAL_PUBLIC_KEY_PATH;
    return raw ? resolveFrom(raw, projectRoot) : join(this.keyDir, 'approval.pub');
  },
  get keyringPath() {
    const raw = process.env.APPROVAL_KEYRING_PATH;
    return raw ? resolveFrom(raw, projectRoot) : join(this.keyDir, 'keyring.json');
  },
  get auditDir() {
    return join(this.dataDir, 'audit');
  },
};

export type AppConfig = typeof config;

// Validate config before anything touches keys or the store
export function validateConfig(): void {
  try {
    validateRetentionWindow({
      ttlSeconds: config.approvalTtlSeconds,
      nonceRetentionSeconds: config.nonceRetentionSeconds,
      clockSkewSeconds: config.clockSkewSeconds,
    });
    void config.approvalDbPath;
    void config.auditSink;
    void config.kdf;
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`ERROR: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
  if (Number.isNaN(config.port)) {
    console.error('ERROR: COUNTERSIGN_PORT must be an integer');
    process.exit(1);
  }
}
