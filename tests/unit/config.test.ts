import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  parseAuditSink,
  parseKdfPreference,
  readNonNegativeInt,
  readPositiveInt,
  resolveApprovalDbPath,
  validateRetentionWindow,
} from '../../src/config.js';

describe('config', () => {
  describe('readPositiveInt', () => {
    it('falls back to the default when unset or blank', () => {
      expect(readPositiveInt('APPROVAL_TTL_SECONDS', 3600, {})).toBe(3600);
      expect(readPositiveInt('APPROVAL_TTL_SECONDS', 3600, { APPROVAL_TTL_SECONDS: ' ' })).toBe(3600);
    });

    it('parses integers', () => {
      expect(readPositiveInt('APPROVAL_TTL_SECONDS', 3600, { APPROVAL_TTL_SECONDS: '120' })).toBe(120);
    });

    it('rejects zero, negatives and non-integers', () => {
      expect(() => readPositiveInt('APPROVAL_TTL_SECONDS', 1, { APPROVAL_TTL_SECONDS: '0' })).toThrow(
        'APPROVAL_TTL_SECONDS must be > 0.'
      );
      expect(() => readPositiveInt('APPROVAL_TTL_SECONDS', 1, { APPROVAL_TTL_SECONDS: '-5' })).toThrow(ConfigError);
      expect(() => readPositiveInt('APPROVAL_TTL_SECONDS', 1, { APPROVAL_TTL_SECONDS: '1.5' })).toThrow(
        'APPROVAL_TTL_SECONDS must be an integer.'
      );
    });
  });

  describe('readNonNegativeInt', () => {
    it('allows zero', () => {
      expect(readNonNegativeInt('APPROVAL_CLOCK_SKEW_SECONDS', 60, { APPROVAL_CLOCK_SKEW_SECONDS: '0' })).toBe(0);
    });
  });

  describe('validateRetentionWindow', () => {
    it('accepts retention equal to TTL plus skew', () => {
      expect(() =>
        validateRetentionWindow({ ttlSeconds: 3600, nonceRetentionSeconds: 3660, clockSkewSeconds: 60 })
      ).not.toThrow();
    });

    it('rejects retention shorter than TTL plus skew', () => {
      expect(() =>
        validateRetentionWindow({ ttlSeconds: 3600, nonceRetentionSeconds: 3659, clockSkewSeconds: 60 })
      ).toThrow(ConfigError);
    });
  });

  describe('resolveApprovalDbPath', () => {
    it('prefers APPROVAL_DB_PATH', () => {
      expect(
        resolveApprovalDbPath({ APPROVAL_DB_PATH: 'state/approvals.db', APPROVAL_DATABASE_URL: 'postgres://x' }, '/srv')
      ).toBe('/srv/state/approvals.db');
    });

    it('derives the path from a sqlite URL', () => {
      expect(resolveApprovalDbPath({ APPROVAL_DATABASE_URL: 'sqlite:////var/lib/approvals.db' }, '/srv')).toBe(
        '/var/lib/approvals.db'
      );
      expect(resolveApprovalDbPath({ APPROVAL_DATABASE_URL: 'sqlite:///:memory:' }, '/srv')).toBe(':memory:');
    });

    it('defaults under the data directory', () => {
      expect(resolveApprovalDbPath({ DATA_DIR: '/data' }, '/srv')).toBe('/data/approvals.sqlite');
    });

    it('rejects other database URLs', () => {
      expect(() => resolveApprovalDbPath({ APPROVAL_DATABASE_URL: 'postgres://localhost/app' }, '/srv')).toThrow(
        ConfigError
      );
    });
  });

  describe('provider selection', () => {
    it('parses the audit sink', () => {
      expect(parseAuditSink(undefined)).toBe('jsonl');
      expect(parseAuditSink('none')).toBe('none');
      expect(() => parseAuditSink('syslog')).toThrow(ConfigError);
    });

    it('parses the KDF preference', () => {
      expect(parseKdfPreference(undefined)).toBe('argon2id');
      expect(parseKdfPreference('scrypt')).toBe('scrypt');
      expect(() => parseKdfPreference('pbkdf2')).toThrow('APPROVAL_KDF must be "argon2id" or "scrypt", got "pbkdf2".');
    });
  });
});
