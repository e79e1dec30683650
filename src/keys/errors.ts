export type KeyManagerErrorKind =
  | 'missing_file'
  | 'malformed_key_file'
  | 'invalid_passphrase'
  | 'key_mismatch'
  | 'key_exists'
  | 'argon2_unavailable'
  | 'weak_passphrase'
  | 'locked';

/**
 * Key material problems are operator errors: entry points print the message and
 * exit rather than retrying or falling back to defaults.
 */
export class KeyManagerError extends Error {
  readonly kind: KeyManagerErrorKind;

  constructor(kind: KeyManagerErrorKind, message: string) {
    super(message);
    this.name = 'KeyManagerError';
    this.kind = kind;
  }
}
