import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { ApprovalVerificationError } from '../../src/approvals/errors.js';
import { ConfigError } from '../../src/config.js';
import { DEFAULT_READ_ONLY_TOOLS, ToolPolicyRegistry, loadToolPolicy } from '../../src/policy/toolPolicy.js';
import { SHELL_CALL, WRITE_CALL } from '../helpers/approvals.js';

const FIXTURES = join(process.cwd(), 'tests/fixtures');

describe('ToolPolicyRegistry', () => {
  const registry = ToolPolicyRegistry.default();

  it('classifies the built-in read-only tools', () => {
    for (const name of DEFAULT_READ_ONLY_TOOLS) {
      expect(registry.classify(name)).toBe('read_only');
    }
  });

  it('treats unknown tools as side-effecting', () => {
    expect(registry.classify('write_file')).toBe('side_effecting');
    expect(registry.classify('deploy')).toBe('side_effecting');
  });

  it('accepts deferred calls to side-effecting tools', () => {
    expect(() => registry.validateDeferredCalls([WRITE_CALL, SHELL_CALL])).not.toThrow();
  });

  it('rejects a batch containing a read-only tool', () => {
    const calls = [WRITE_CALL, { tool_call_id: 'c3', tool_name: 'read_file', args: { path: 'a.txt' } }];

    let caught: unknown;
    try {
      registry.validateDeferredCalls(calls);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ApprovalVerificationError);
    expect(caught).toMatchObject({
      code: 'tool_policy_violation',
      message: "Read-only tool 'read_file' must not require deferred approval.",
    });
  });

  it('has no policy hash for the built-in defaults', () => {
    expect(registry.hash).toBeNull();
  });
});

describe('loadToolPolicy', () => {
  it('extends the defaults and applies overrides', () => {
    const registry = loadToolPolicy(join(FIXTURES, 'tool-policy.yaml'));

    expect(registry.classify('search_docs')).toBe('read_only');
    expect(registry.classify('list_issues')).toBe('read_only');
    expect(registry.classify('read_file')).toBe('read_only');
    expect(registry.classify('grep')).toBe('side_effecting');
    expect(registry.hash).toMatch(/^sha256:[a-f0-9]{64}$/);
  });

  it('lists read-only tools sorted', () => {
    const registry = loadToolPolicy(join(FIXTURES, 'tool-policy.yaml'));
    expect(registry.readOnlyTools()).toEqual([
      'glob',
      'glob_info',
      'grep_raw',
      'list_issues',
      'ls',
      'ls_info',
      'process_list',
      'process_log',
      'process_poll',
      'read',
      'read_file',
      'search_docs',
    ]);
  });

  it('throws ConfigError on a malformed file', () => {
    expect(() => loadToolPolicy(join(FIXTURES, 'tool-policy-invalid.yaml'))).toThrow(ConfigError);
  });

  it('throws ConfigError on a missing file', () => {
    expect(() => loadToolPolicy(join(FIXTURES, 'does-not-exist.yaml'))).toThrow(ConfigError);
  });
});
