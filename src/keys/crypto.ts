import {
  createCipheriv,
  createDecipheriv,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  randomBytes,
  scrypt,
  sign,
  verify,
  type KeyObject,
} from 'node:crypto';
import { KeyManagerError } from './errors.js';
import { PRIVATE_FILE_VERSION, type KdfConfig, type PrivateKeyFile } from './files.js';
import { computeHash } from '../utils.js';

// Bound into every private-key ciphertext so a blob cannot be replayed under another format
export const KEY_AEAD_AD = Buffer.from('countersign:approval-key:v1', 'utf-8');

// DER wrappers around raw Ed25519 key bytes (RFC 8410)
const ED25519_PKCS8_PREFIX = Buffer.from('302e020100300506032b657004220420', 'hex');
const ED25519_SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex');

const SEED_LENGTH = 32;
const PUBLIC_KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;
const SALT_LENGTH = 16;
const AES_KEY_LENGTH = 32;

export interface KdfPolicy {
  preferred: 'argon2id' | 'scrypt';
  argon2: { iterations: number; memoryKib: number; lanes: number };
  scrypt: { n: number; r: number; p: number };
  keyLength: number;
}

export const DEFAULT_KDF_POLICY: KdfPolicy = {
  preferred: 'argon2id',
  argon2: { iterations: 3, memoryKib: 64 * 1024, lanes: 1 },
  scrypt: { n: 2 ** 15, r: 8, p: 1 },
  keyLength: AES_KEY_LENGTH,
};

type HashWasm = typeof import('hash-wasm');

let hashWasm: Promise<HashWasm | null> | undefined;

/**
 * Load the argon2id implementation once. Resolves null when the module cannot
 * be loaded, in which case new keys fall back to scrypt.
 */
export function loadArgon2(): Promise<HashWasm | null> {
  hashWasm ??= import('hash-wasm').then(
    (mod) => mod,
    () => null
  );
  return hashWasm;
}

// ============================================================================
// Ed25519
// ============================================================================

export function generateSigningKey(): { privateKey: KeyObject; publicKey: KeyObject } {
  return generateKeyPairSync('ed25519');
}

export function rawPublicKey(publicKey: KeyObject): Buffer {
  return publicKey.export({ format: 'der', type: 'spki' }).subarray(ED25519_SPKI_PREFIX.length);
}

export function publicKeyHex(publicKey: KeyObject): string {
  return rawPublicKey(publicKey).toString('hex');
}

/**
 * Key id: sha256 of the raw 32-byte public key, lowercase hex.
 */
export function computeKeyId(publicKey: KeyObject): string {
  return computeHash(rawPublicKey(publicKey));
}

export function derivePublicKey(privateKey: KeyObject): KeyObject {
  return createPublicKey(privateKey);
}

export function publicKeyFromHex(hex: string): KeyObject {
  if (!/^[0-9a-fA-F]+$/.test(hex) || hex.length !== PUBLIC_KEY_LENGTH * 2) {
    throw new KeyManagerError('malformed_key_file', 'Public key must be 32 bytes of hex.');
  }
  return createPublicKey({
    key: Buffer.concat([ED25519_SPKI_PREFIX, Buffer.from(hex, 'hex')]),
    format: 'der',
    type: 'spki',
  });
}

export function rawPrivateSeed(privateKey: KeyObject): Buffer {
  return privateKey.export({ format: 'der', type: 'pkcs8' }).subarray(ED25519_PKCS8_PREFIX.length);
}

export function privateKeyFromSeed(seed: Buffer): KeyObject {
  const der = Buffer.concat([ED25519_PKCS8_PREFIX, seed]);
  try {
    return createPrivateKey({ key: der, format: 'der', type: 'pkcs8' });
  } finally {
    der.fill(0);
  }
}

export function signUtf8(privateKey: KeyObject, payload: string): string {
  return sign(null, Buffer.from(payload, 'utf-8'), privateKey).toString('hex');
}

/**
 * Returns false for any signature that is not well-formed hex of the right length.
 */
export function verifyUtf8(publicKey: KeyObject, payload: string, signatureHex: string): boolean {
  if (!/^[0-9a-fA-F]*$/.test(signatureHex) || signatureHex.length !== 128) {
    return false;
  }
  return verify(null, Buffer.from(payload, 'utf-8'), publicKey, Buffer.from(signatureHex, 'hex'));
}

// ============================================================================
// Passphrase KDFs
// ============================================================================

function scryptKey(
  passphrase: Buffer,
  salt: Buffer,
  params: { n: number; r: number; p: number; length: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(
      passphrase,
      salt,
      params.length,
      { N: params.n, r: params.r, p: params.p, maxmem: 256 * params.n * params.r * params.p },
      (err, key) => (err ? reject(err) : resolve(key))
    );
  });
}

async function argon2Key(
  argon2: HashWasm,
  passphrase: Buffer,
  salt: Buffer,
  params: { iterations: number; memoryKib: number; lanes: number; length: number }
): Promise<Buffer> {
  const out: Uint8Array | string = await argon2.argon2id({
    password: passphrase,
    salt,
    iterations: params.iterations,
    parallelism: params.lanes,
    memorySize: params.memoryKib,
    hashLength: params.length,
    outputType: 'binary',
  });
  return typeof out === 'string' ? Buffer.from(out, 'hex') : Buffer.from(out);
}

/**
 * Derive a fresh wrapping key under the policy. argon2id is used when preferred
 * and loadable; otherwise scrypt.
 */
export async function deriveNewKey(
  passphrase: Buffer,
  policy: KdfPolicy
): Promise<{ key: Buffer; kdf: KdfConfig }> {
  const salt = randomBytes(SALT_LENGTH);
  const salt_b64 = salt.toString('base64');

  if (policy.preferred === 'argon2id') {
    const argon2 = await loadArgon2();
    if (argon2) {
      const key = await argon2Key(argon2, passphrase, salt, {
        ...policy.argon2,
        length: policy.keyLength,
      });
      return {
        key,
        kdf: {
          name: 'argon2id',
          salt_b64,
          iterations: policy.argon2.iterations,
          lanes: policy.argon2.lanes,
          memory_kib: policy.argon2.memoryKib,
          length: policy.keyLength,
        },
      };
    }
  }

  const key = await scryptKey(passphrase, salt, { ...policy.scrypt, length: policy.keyLength });
  return {
    key,
    kdf: { name: 'scrypt', salt_b64, ...policy.scrypt, length: policy.keyLength },
  };
}

/**
 * Re-derive the wrapping key recorded in a key file.
 */
export async function deriveStoredKey(passphrase: Buffer, kdf: KdfConfig): Promise<Buffer> {
  const salt = Buffer.from(kdf.salt_b64, 'base64');

  if (kdf.name === 'argon2id') {
    const argon2 = await loadArgon2();
    if (!argon2) {
      throw new KeyManagerError(
        'argon2_unavailable',
        'Approval key uses argon2id but no argon2id implementation could be loaded.'
      );
    }
    return argon2Key(argon2, passphrase, salt, {
      iterations: kdf.iterations,
      memoryKib: kdf.memory_kib,
      lanes: kdf.lanes,
      length: kdf.length,
    });
  }

  try {
    return await scryptKey(passphrase, salt, kdf);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new KeyManagerError('malformed_key_file', `Approval key scrypt parameters are invalid: ${message}`);
  }
}

/**
 * True when the stored parameters are weaker than the policy. A scrypt file is
 * judged against the scrypt thresholds only; it is not migrated to argon2id.
 */
export function kdfRequiresUpgrade(kdf: KdfConfig, policy: KdfPolicy): boolean {
  if (kdf.name === 'argon2id') {
    return (
      kdf.iterations < policy.argon2.iterations ||
      kdf.memory_kib < policy.argon2.memoryKib ||
      kdf.lanes < policy.argon2.lanes
    );
  }
  return kdf.n < policy.scrypt.n || kdf.r < policy.scrypt.r || kdf.p < policy.scrypt.p;
}

// ============================================================================
// Private key wrapping
// ============================================================================

export async function encryptPrivateKey(
  privateKey: KeyObject,
  passphrase: string,
  policy: KdfPolicy = DEFAULT_KDF_POLICY,
  now: Date = new Date()
): Promise<PrivateKeyFile> {
  const secret = Buffer.from(passphrase, 'utf-8');
  const { key, kdf } = await deriveNewKey(secret, policy);
  const seed = rawPrivateSeed(privateKey);
  const nonce = randomBytes(NONCE_LENGTH);

  try {
    const cipher = createCipheriv('aes-256-gcm', key, nonce);
    cipher.setAAD(KEY_AEAD_AD);
    const ciphertext = Buffer.concat([cipher.update(seed), cipher.final(), cipher.getAuthTag()]);

    return {
      version: PRIVATE_FILE_VERSION,
      created_at: now.toISOString(),
      kdf,
      aead: { name: 'aesgcm', nonce_b64: nonce.toString('base64') },
      ciphertext_b64: ciphertext.toString('base64'),
    };
  } finally {
    seed.fill(0);
    key.fill(0);
    secret.fill(0);
  }
}

/**
 * Unwrap the private key. An authentication failure means the passphrase is
 * wrong (or the file was tampered with); both are reported as invalid_passphrase.
 */
export async function decryptPrivateKey(file: PrivateKeyFile, passphrase: string): Promise<KeyObject> {
  const nonce = Buffer.from(file.aead.nonce_b64, 'base64');
  const payload = Buffer.from(file.ciphertext_b64, 'base64');
  if (nonce.length !== NONCE_LENGTH || payload.length <= TAG_LENGTH || file.kdf.length !== AES_KEY_LENGTH) {
    throw new KeyManagerError('malformed_key_file', 'Approval private key file is malformed.');
  }

  const secret = Buffer.from(passphrase, 'utf-8');
  const key = await deriveStoredKey(secret, file.kdf);
  secret.fill(0);

  let seed: Buffer;
  try {
    const decipher = createDecipheriv('aes-256-gcm', key, nonce);
    decipher.setAAD(KEY_AEAD_AD);
    decipher.setAuthTag(payload.subarray(payload.length - TAG_LENGTH));
    seed = Buffer.concat([decipher.update(payload.subarray(0, payload.length - TAG_LENGTH)), decipher.final()]);
  } catch {
    throw new KeyManagerError('invalid_passphrase', 'Invalid approval passphrase.');
  } finally {
    key.fill(0);
  }

  try {
    if (seed.length !== SEED_LENGTH) {
      throw new KeyManagerError('malformed_key_file', 'Approval private key has an unexpected length.');
    }
    return privateKeyFromSeed(seed);
  } finally {
    seed.fill(0);
  }
}

export function validateNewPassphrase(passphrase: string, field: string, minLength: number): void {
  if (passphrase.length < minLength) {
    throw new KeyManagerError(
      'weak_passphrase',
      `${field} must be at least ${minLength} characters long.`
    );
  }
}
