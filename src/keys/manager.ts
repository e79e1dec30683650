import { existsSync } from 'node:fs';
import type { KeyObject } from 'node:crypto';
import {
  DEFAULT_KDF_POLICY,
  computeKeyId,
  decryptPrivateKey,
  derivePublicKey,
  encryptPrivateKey,
  generateSigningKey,
  kdfRequiresUpgrade,
  publicKeyFromHex,
  publicKeyHex,
  signUtf8,
  validateNewPassphrase,
  verifyUtf8,
  type KdfPolicy,
} from './crypto.js';
import { KeyManagerError } from './errors.js';
import {
  PUBLIC_FILE_VERSION,
  PrivateKeyFileSchema,
  PublicKeyFileSchema,
  readJsonFile,
  readKeyringEntries,
  upsertKeyringEntry,
  writeJsonFile,
  type PublicKeyFile,
} from './files.js';
import { SIGNED_OBJECT_CONTEXT } from '../approvals/scope.js';
import type { AppConfig } from '../config.js';
import type { KeyringEntry, SignedDecision, SignedObject } from '../types.js';

export interface KeyPaths {
  privateKeyPath: string;
  publicKeyPath: string;
  keyringPath: string;
}

export interface UnlockResult {
  keyId: string;
  upgraded: boolean;
}

export interface RotationResult {
  previousKeyId: string;
  keyId: string;
  expiredEnvelopes: number;
}

export interface RotateKeyOptions {
  currentPassphrase: string;
  newPassphrase: string;
  // Invalidate everything issued under the old key; returns how many envelopes it expired
  expirePendingEnvelopes: () => number;
}

const PRIVATE_FILE_MODE = 0o600;

/**
 * Owns the Ed25519 approval signing key.
 *
 * The private key lives on disk wrapped under a passphrase and is only held in
 * memory between unlock() and lock(). Verification needs no passphrase: it
 * reads the active public key file or, for keys retired by rotation, the
 * keyring.
 */
export class ApprovalKeyManager {
  private privateKey: KeyObject | null = null;
  private publicKey: KeyObject | null = null;
  private activeKeyId: string | null = null;

  constructor(
    readonly paths: KeyPaths,
    private readonly kdfPolicy: KdfPolicy = DEFAULT_KDF_POLICY,
    private readonly minPassphraseLength = 12
  ) {}

  static fromConfig(
    cfg: Pick<AppConfig, 'privateKeyPath' | 'publicKeyPath' | 'keyringPath' | 'kdf' | 'minPassphraseLength'>
  ): ApprovalKeyManager {
    return new ApprovalKeyManager(
      {
        privateKeyPath: cfg.privateKeyPath,
        publicKeyPath: cfg.publicKeyPath,
        keyringPath: cfg.keyringPath,
      },
      { ...DEFAULT_KDF_POLICY, preferred: cfg.kdf },
      cfg.minPassphraseLength
    );
  }

  hasKeyFiles(): boolean {
    return existsSync(this.paths.privateKeyPath) && existsSync(this.paths.publicKeyPath);
  }

  isUnlocked(): boolean {
    return this.privateKey !== null;
  }

  /**
   * Generate the first signing key. Refuses to overwrite existing key files.
   */
  async createInitialKey(passphrase: string): Promise<string> {
    if (existsSync(this.paths.privateKeyPath) || existsSync(this.paths.publicKeyPath)) {
      throw new KeyManagerError(
        'key_exists',
        'Approval key files already exist. Use rotate to replace them.'
      );
    }
    validateNewPassphrase(passphrase, 'Approval passphrase', this.minPassphraseLength);

    return this.writeNewKey(passphrase, false);
  }

  /**
   * Decrypt the private key and check it against the public key file. When the
   * stored KDF parameters are weaker than policy the file is re-encrypted in place.
   */
  async unlock(passphrase: string): Promise<UnlockResult> {
    const privateFile = readJsonFile(
      this.paths.privateKeyPath,
      PrivateKeyFileSchema,
      'Approval private key file'
    );
    const publicFile = this.readPublicFile();

    const privateKey = await decryptPrivateKey(privateFile, passphrase);
    const publicKey = derivePublicKey(privateKey);
    const keyId = computeKeyId(publicKey);

    if (keyId !== publicFile.key_id || publicKeyHex(publicKey) !== publicFile.public_key_hex.toLowerCase()) {
      throw new KeyManagerError(
        'key_mismatch',
        'Approval private key does not match the public key file.'
      );
    }

    let upgraded = false;
    if (kdfRequiresUpgrade(privateFile.kdf, this.kdfPolicy)) {
      const rewrapped = await encryptPrivateKey(privateKey, passphrase, this.kdfPolicy);
      writeJsonFile(this.paths.privateKeyPath, rewrapped, PRIVATE_FILE_MODE);
      upgraded = true;
    }

    // Keys created before the keyring existed are registered on first unlock
    if (!readKeyringEntries(this.paths.keyringPath).some((entry) => entry.key_id === keyId)) {
      upsertKeyringEntry({
        path: this.paths.keyringPath,
        entry: { key_id: keyId, public_key_hex: publicFile.public_key_hex.toLowerCase(), created_at: publicFile.created_at },
        retireExisting: false,
      });
    }

    this.privateKey = privateKey;
    this.publicKey = publicKey;
    this.activeKeyId = keyId;
    return { keyId, upgraded };
  }

  lock(): void {
    this.privateKey = null;
    this.publicKey = null;
    this.activeKeyId = null;
  }

  /**
   * Replace the signing key. The old public key stays in the keyring, marked
   * retired, and every pending envelope is expired so nothing issued under the
   * old key can still be approved.
   */
  async rotateKey(options: RotateKeyOptions): Promise<RotationResult> {
    validateNewPassphrase(options.newPassphrase, 'New approval passphrase', this.minPassphraseLength);
    const { keyId: previousKeyId } = await this.unlock(options.currentPassphrase);

    const keyId = await this.writeNewKey(options.newPassphrase, true);
    const expiredEnvelopes = options.expirePendingEnvelopes();

    return { previousKeyId, keyId, expiredEnvelopes };
  }

  currentKeyId(): string {
    if (this.activeKeyId === null) {
      throw new KeyManagerError('locked', 'Approval key is locked. Unlock it before signing.');
    }
    return this.activeKeyId;
  }

  signPayload(payload: string): string {
    if (this.privateKey === null) {
      throw new KeyManagerError('locked', 'Approval key is locked. Unlock it before signing.');
    }
    return signUtf8(this.privateKey, payload);
  }

  verifySignature(payload: string, signatureHex: string, keyId: string): boolean {
    const publicKey = this.resolvePublicKey(keyId);
    if (publicKey === null) {
      return false;
    }
    return verifyUtf8(publicKey, payload, signatureHex);
  }

  /**
   * Public key for a key id: the unlocked key, the active public key file,
   * then the keyring. Null when the id is unknown.
   */
  resolvePublicKey(keyId: string): KeyObject | null {
    if (keyId === '') {
      return null;
    }
    if (this.publicKey !== null && keyId === this.activeKeyId) {
      return this.publicKey;
    }

    if (existsSync(this.paths.publicKeyPath)) {
      const publicFile = this.readPublicFile();
      if (publicFile.key_id === keyId) {
        return publicKeyFromHex(publicFile.public_key_hex);
      }
    }

    const entry = readKeyringEntries(this.paths.keyringPath).find((item) => item.key_id === keyId);
    return entry ? publicKeyFromHex(entry.public_key_hex) : null;
  }

  /**
   * The exact object that gets canonicalized and signed for an approval.
   */
  signedObject(params: { nonce: string; planHash: string; decisions: SignedDecision[] }): SignedObject {
    return {
      ctx: SIGNED_OBJECT_CONTEXT,
      nonce: params.nonce,
      plan_hash: params.planHash,
      key_id: this.currentKeyId(),
      decisions: params.decisions,
    };
  }

  listKeyring(): KeyringEntry[] {
    return readKeyringEntries(this.paths.keyringPath);
  }

  private readPublicFile(): PublicKeyFile {
    return readJsonFile(this.paths.publicKeyPath, PublicKeyFileSchema, 'Approval public key file');
  }

  private async writeNewKey(passphrase: string, retireExisting: boolean): Promise<string> {
    const { privateKey, publicKey } = generateSigningKey();
    const keyId = computeKeyId(publicKey);
    const hex = publicKeyHex(publicKey);
    const createdAt = new Date().toISOString();

    const privateFile = await encryptPrivateKey(privateKey, passphrase, this.kdfPolicy);
    writeJsonFile(this.paths.privateKeyPath, privateFile, PRIVATE_FILE_MODE);
    writeJsonFile(this.paths.publicKeyPath, {
      version: PUBLIC_FILE_VERSION,
      key_id: keyId,
      public_key_hex: hex,
      created_at: createdAt,
    } satisfies PublicKeyFile);
    upsertKeyringEntry({
      path: this.paths.keyringPath,
      entry: { key_id: keyId, public_key_hex: hex, created_at: createdAt },
      retireExisting,
    });

    this.privateKey = privateKey;
    this.publicKey = publicKey;
    this.activeKeyId = keyId;
    return keyId;
  }
}
