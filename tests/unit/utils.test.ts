import { describe, it, expect } from 'vitest';
import {
  canonicalize,
  computeHash,
  generateId,
  generateNonce,
  isRecord,
  redactSecrets,
  truncate,
} from '../../src/utils.js';

describe('canonicalize', () => {
  it('sorts object keys alphabetically', () => {
    const obj = { b: 1, a: 2, c: 3 };
    expect(canonicalize(obj)).toBe('{"a":2,"b":1,"c":3}');
  });

  it('handles nested objects', () => {
    const obj = { z: { b: 1, a: 2 }, a: 1 };
    expect(canonicalize(obj)).toBe('{"a":1,"z":{"a":2,"b":1}}');
  });

  it('preserves array order but sorts nested objects', () => {
    const obj = {
      arr: [
        { b: 1, a: 2 },
        { d: 3, c: 4 },
      ],
    };
    expect(canonicalize(obj)).toBe('{"arr":[{"a":2,"b":1},{"c":4,"d":3}]}');
  });

  it('handles primitives', () => {
    expect(canonicalize(null)).toBe('null');
    expect(canonicalize(123)).toBe('123');
    expect(canonicalize(1.5)).toBe('1.5');
    expect(canonicalize('hello')).toBe('"hello"');
    expect(canonicalize(true)).toBe('true');
  });

  it('escapes non-ASCII characters as lowercase \\u sequences', () => {
    expect(canonicalize({ name: 'caf\u00e9' })).toBe('{"name":"caf\\u00e9"}');
  });

  it('escapes astral characters as two surrogate code units', () => {
    expect(canonicalize('\u{1F600}')).toBe('"\\ud83d\\ude00"');
  });

  it('escapes non-ASCII keys too', () => {
    expect(canonicalize({ '\u00fc': 1 })).toBe('{"\\u00fc":1}');
  });

  it('produces consistent output for equivalent objects', () => {
    const obj1 = { command: 'ls', cwd: '/tmp' };
    const obj2 = { cwd: '/tmp', command: 'ls' };
    expect(canonicalize(obj1)).toBe(canonicalize(obj2));
  });

  it('rejects values JSON cannot represent exactly', () => {
    expect(() => canonicalize(Number.NaN)).toThrow(TypeError);
    expect(() => canonicalize(Number.POSITIVE_INFINITY)).toThrow(TypeError);
    expect(() => canonicalize(undefined)).toThrow(TypeError);
    expect(() => canonicalize({ a: undefined })).toThrow(TypeError);
    expect(() => canonicalize(10n)).toThrow(TypeError);
    expect(() => canonicalize(() => 1)).toThrow(TypeError);
    expect(() => canonicalize(Symbol('s'))).toThrow(TypeError);
    expect(() => canonicalize(new Date(0))).toThrow(TypeError);
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord(Object.create(null))).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord(new Map())).toBe(false);
  });
});

describe('computeHash', () => {
  it('returns the SHA-256 hex digest', () => {
    expect(computeHash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('returns different hash for different inputs', () => {
    expect(computeHash('test1')).not.toBe(computeHash('test2'));
  });
});

describe('generateId', () => {
  it('returns a valid UUID', () => {
    expect(generateId()).toMatch(/^[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}$/);
  });
});

describe('generateNonce', () => {
  it('returns 32 hex characters', () => {
    expect(generateNonce()).toMatch(/^[a-f0-9]{32}$/);
  });

  it('returns unique nonces', () => {
    const nonces = new Set(Array.from({ length: 100 }, () => generateNonce()));
    expect(nonces.size).toBe(100);
  });
});

describe('redactSecrets', () => {
  it('redacts password and passphrase fields', () => {
    expect(redactSecrets({ password: 'hunter2', passphrase: 'open sesame' })).toBe(
      '{"password":"[REDACTED]","passphrase":"[REDACTED]"}'
    );
  });

  it('redacts Bearer tokens in values', () => {
    expect(redactSecrets({ header: 'Bearer xyz123' })).toBe('{"header":"[REDACTED]"}');
  });

  it('truncates long strings', () => {
    expect(redactSecrets({ data: 'a'.repeat(12) }, 10)).toBe('{"data":"aaaaaaaaaa...[truncated 2 chars]"}');
  });

  it('preserves non-sensitive data', () => {
    expect(redactSecrets([{ path: 'a.txt' }])).toBe('[{"path":"a.txt"}]');
  });
});

describe('truncate', () => {
  it('returns unchanged string if within limit', () => {
    expect(truncate('hello', 10)).toBe('hello');
  });

  it('truncates string exceeding limit', () => {
    expect(truncate('hello world', 5)).toBe('hello...[truncated 6 chars]');
  });
});
