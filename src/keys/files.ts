import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync, chmodSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { KeyManagerError } from './errors.js';
import type { KeyringEntry } from '../types.js';

export const PRIVATE_FILE_VERSION = 1;
export const PUBLIC_FILE_VERSION = 1;
export const KEYRING_FILE_VERSION = 1;

const positiveInt = z.number().int().positive();

export const Argon2KdfSchema = z.object({
  name: z.literal('argon2id'),
  salt_b64: z.string().min(1),
  iterations: positiveInt,
  lanes: positiveInt,
  memory_kib: positiveInt,
  length: positiveInt,
});

export const ScryptKdfSchema = z.object({
  name: z.literal('scrypt'),
  salt_b64: z.string().min(1),
  n: positiveInt,
  r: positiveInt,
  p: positiveInt,
  length: positiveInt,
});

export const KdfConfigSchema = z.discriminatedUnion('name', [Argon2KdfSchema, ScryptKdfSchema]);

export const PrivateKeyFileSchema = z.object({
  version: z.literal(PRIVATE_FILE_VERSION),
  created_at: z.string(),
  kdf: KdfConfigSchema,
  aead: z.object({
    name: z.literal('aesgcm'),
    nonce_b64: z.string().min(1),
  }),
  ciphertext_b64: z.string().min(1),
});

export const PublicKeyFileSchema = z.object({
  version: z.literal(PUBLIC_FILE_VERSION),
  key_id: z.string().min(1, 'key_id missing'),
  public_key_hex: z.string().min(1, 'public_key_hex missing'),
  created_at: z.string(),
});

export const KeyringEntrySchema = z.object({
  key_id: z.string().min(1),
  public_key_hex: z.string().min(1),
  created_at: z.string(),
  retired_at: z.string().nullable(),
});

export const KeyringFileSchema = z.object({
  version: z.literal(KEYRING_FILE_VERSION),
  keys: z.array(KeyringEntrySchema),
});

export type Argon2KdfConfig = z.infer<typeof Argon2KdfSchema>;
export type ScryptKdfConfig = z.infer<typeof ScryptKdfSchema>;
export type KdfConfig = z.infer<typeof KdfConfigSchema>;
export type PrivateKeyFile = z.infer<typeof PrivateKeyFileSchema>;
export type PublicKeyFile = z.infer<typeof PublicKeyFileSchema>;
export type KeyringFile = z.infer<typeof KeyringFileSchema>;

/**
 * Read a key file and validate its shape. Missing or malformed files are fatal.
 */
export function readJsonFile<T>(path: string, schema: z.ZodType<T>, label: string): T {
  if (!existsSync(path)) {
    throw new KeyManagerError('missing_file', `Required file missing: ${path}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    throw new KeyManagerError('malformed_key_file', `Invalid JSON file: ${path}`);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const detail = issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'invalid shape';
    throw new KeyManagerError('malformed_key_file', `${label} is invalid (${detail}).`);
  }
  return parsed.data;
}

/**
 * Atomically replace a JSON file: write a sibling temp file, then rename over the target.
 */
export function writeJsonFile(path: string, payload: unknown, fileMode = 0o644): void {
  mkdirSync(dirname(path), { recursive: true });
  const tempPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    writeFileSync(tempPath, JSON.stringify(payload, null, 2), { encoding: 'utf-8', mode: fileMode, flag: 'wx' });
    renameSync(tempPath, path);
    chmodSync(path, fileMode);
  } finally {
    rmSync(tempPath, { force: true });
  }
}

export function readKeyringEntries(path: string): KeyringEntry[] {
  if (!existsSync(path)) {
    return [];
  }
  return readJsonFile(path, KeyringFileSchema, 'Approval keyring file').keys;
}

/**
 * Append a keyring entry. With retireExisting, every entry still active is
 * stamped retired first. Entries are never removed.
 */
export function upsertKeyringEntry(params: {
  path: string;
  entry: Omit<KeyringEntry, 'retired_at'>;
  retireExisting: boolean;
  now?: Date;
}): KeyringEntry[] {
  const keys = readKeyringEntries(params.path);
  const retiredAt = (params.now ?? new Date()).toISOString();

  const updated: KeyringEntry[] = keys.map((item) =>
    params.retireExisting && item.retired_at === null ? { ...item, retired_at: retiredAt } : item
  );
  updated.push({ ...params.entry, retired_at: null });

  writeJsonFile(params.path, { version: KEYRING_FILE_VERSION, keys: updated });
  return updated;
}
