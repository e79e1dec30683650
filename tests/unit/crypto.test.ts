import { describe, it, expect } from 'vitest';
import {
  DEFAULT_KDF_POLICY,
  computeKeyId,
  decryptPrivateKey,
  encryptPrivateKey,
  generateSigningKey,
  kdfRequiresUpgrade,
  loadArgon2,
  publicKeyFromHex,
  publicKeyHex,
  rawPrivateSeed,
  signUtf8,
  validateNewPassphrase,
  verifyUtf8,
} from '../../src/keys/crypto.js';
import { KeyManagerError } from '../../src/keys/errors.js';
import type { KdfConfig } from '../../src/keys/files.js';
import { computeHash } from '../../src/utils.js';
import { FAST_KDF } from '../helpers/approvals.js';

async function captureKeyError(promise: Promise<unknown>): Promise<KeyManagerError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof KeyManagerError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a KeyManagerError');
}

describe('Ed25519 helpers', () => {
  it('derives the key id from the raw public key', () => {
    const { publicKey } = generateSigningKey();
    const hex = publicKeyHex(publicKey);

    expect(hex).toMatch(/^[a-f0-9]{64}$/);
    expect(computeKeyId(publicKey)).toBe(computeHash(Buffer.from(hex, 'hex')));
  });

  it('rebuilds a public key from hex', () => {
    const { publicKey } = generateSigningKey();
    expect(publicKeyHex(publicKeyFromHex(publicKeyHex(publicKey)))).toBe(publicKeyHex(publicKey));
  });

  it('rejects public key hex of the wrong length', () => {
    expect(() => publicKeyFromHex('abcd')).toThrow(KeyManagerError);
    expect(() => publicKeyFromHex('zz'.repeat(32))).toThrow(KeyManagerError);
  });

  it('exports a 32-byte seed', () => {
    const { privateKey } = generateSigningKey();
    expect(rawPrivateSeed(privateKey)).toHaveLength(32);
  });

  it('verifies its own signatures and nothing else', () => {
    const { privateKey, publicKey } = generateSigningKey();
    const other = generateSigningKey();
    const signature = signUtf8(privateKey, '{"a":1}');

    expect(signature).toMatch(/^[a-f0-9]{128}$/);
    expect(verifyUtf8(publicKey, '{"a":1}', signature)).toBe(true);
    expect(verifyUtf8(publicKey, '{"a":2}', signature)).toBe(false);
    expect(verifyUtf8(other.publicKey, '{"a":1}', signature)).toBe(false);
  });

  it('treats malformed signatures as invalid', () => {
    const { publicKey } = generateSigningKey();
    expect(verifyUtf8(publicKey, 'x', 'not-hex')).toBe(false);
    expect(verifyUtf8(publicKey, 'x', 'ab')).toBe(false);
  });
});

describe('private key wrapping', () => {
  it('round-trips under scrypt', async () => {
    const { privateKey, publicKey } = generateSigningKey();
    const file = await encryptPrivateKey(privateKey, 'test-passphrase', FAST_KDF);

    expect(file.kdf.name).toBe('scrypt');
    expect(file.aead.name).toBe('aesgcm');
    expect(Buffer.from(file.aead.nonce_b64, 'base64')).toHaveLength(12);
    expect(Buffer.from(file.ciphertext_b64, 'base64')).toHaveLength(48);

    const decrypted = await decryptPrivateKey(file, 'test-passphrase');
    expect(signUtf8(decrypted, 'payload')).toBe(signUtf8(privateKey, 'payload'));
    expect(verifyUtf8(publicKey, 'payload', signUtf8(decrypted, 'payload'))).toBe(true);
  });

  it('round-trips under argon2id when it is available', async () => {
    const argon2 = await loadArgon2();
    const { privateKey } = generateSigningKey();
    const file = await encryptPrivateKey(privateKey, 'test-passphrase', { ...FAST_KDF, preferred: 'argon2id' });

    expect(file.kdf.name).toBe(argon2 ? 'argon2id' : 'scrypt');
    const decrypted = await decryptPrivateKey(file, 'test-passphrase');
    expect(rawPrivateSeed(decrypted).equals(rawPrivateSeed(privateKey))).toBe(true);
  });

  it('fails with invalid_passphrase on a wrong passphrase', async () => {
    const { privateKey } = generateSigningKey();
    const file = await encryptPrivateKey(privateKey, 'test-passphrase', FAST_KDF);

    const err = await captureKeyError(decryptPrivateKey(file, 'wrong-passphrase'));
    expect(err.kind).toBe('invalid_passphrase');
  });

  it('fails with invalid_passphrase when the ciphertext was tampered with', async () => {
    const { privateKey } = generateSigningKey();
    const file = await encryptPrivateKey(privateKey, 'test-passphrase', FAST_KDF);
    const bytes = Buffer.from(file.ciphertext_b64, 'base64');
    bytes[0] = bytes[0] === 0 ? 1 : 0;

    const err = await captureKeyError(
      decryptPrivateKey({ ...file, ciphertext_b64: bytes.toString('base64') }, 'test-passphrase')
    );
    expect(err.kind).toBe('invalid_passphrase');
  });

  it('rejects a truncated ciphertext as malformed', async () => {
    const { privateKey } = generateSigningKey();
    const file = await encryptPrivateKey(privateKey, 'test-passphrase', FAST_KDF);

    const err = await captureKeyError(
      decryptPrivateKey({ ...file, ciphertext_b64: Buffer.alloc(8).toString('base64') }, 'test-passphrase')
    );
    expect(err.kind).toBe('malformed_key_file');
  });

  it('rejects a derived key length other than 32 bytes as malformed', async () => {
    const { privateKey } = generateSigningKey();
    const file = await encryptPrivateKey(privateKey, 'test-passphrase', FAST_KDF);

    const err = await captureKeyError(decryptPrivateKey({ ...file, kdf: { ...file.kdf, length: 16 } }, 'test-passphrase'));
    expect(err.kind).toBe('malformed_key_file');
  });
});

describe('kdfRequiresUpgrade', () => {
  const scrypt: KdfConfig = { name: 'scrypt', salt_b64: 'c2FsdA==', n: 2 ** 15, r: 8, p: 1, length: 32 };
  const argon2: KdfConfig = {
    name: 'argon2id',
    salt_b64: 'c2FsdA==',
    iterations: 3,
    lanes: 1,
    memory_kib: 65536,
    length: 32,
  };

  it('accepts parameters that meet the policy', () => {
    expect(kdfRequiresUpgrade(scrypt, DEFAULT_KDF_POLICY)).toBe(false);
    expect(kdfRequiresUpgrade(argon2, DEFAULT_KDF_POLICY)).toBe(false);
  });

  it('flags weaker scrypt parameters', () => {
    expect(kdfRequiresUpgrade({ ...scrypt, n: 1024 }, DEFAULT_KDF_POLICY)).toBe(true);
  });

  it('flags weaker argon2id parameters', () => {
    expect(kdfRequiresUpgrade({ ...argon2, memory_kib: 1024 }, DEFAULT_KDF_POLICY)).toBe(true);
    expect(kdfRequiresUpgrade({ ...argon2, iterations: 2 }, DEFAULT_KDF_POLICY)).toBe(true);
  });
});

describe('validateNewPassphrase', () => {
  it('rejects short passphrases', () => {
    expect(() => validateNewPassphrase('short', 'Approval passphrase', 12)).toThrow(
      'Approval passphrase must be at least 12 characters long.'
    );
  });

  it('accepts passphrases at the minimum length', () => {
    expect(() => validateNewPassphrase('a'.repeat(12), 'Approval passphrase', 12)).not.toThrow();
  });
});
