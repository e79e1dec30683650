import { describe, it, expect } from 'vitest';
import {
  ApprovalScope,
  SCOPE_SCHEMA_VERSION,
  TOOLSET_MODE,
  computePlanHash,
} from '../../src/approvals/scope.js';
import { ApprovalVerificationError } from '../../src/approvals/errors.js';
import { makeScope, WRITE_CALL } from '../helpers/approvals.js';

function captureError(fn: () => unknown): ApprovalVerificationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ApprovalVerificationError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected an ApprovalVerificationError');
}

describe('ApprovalScope', () => {
  it('fills defaults in the snake-case form', () => {
    expect(makeScope().toDict()).toEqual({
      work_item_id: 'work-1',
      scope_schema_version: SCOPE_SCHEMA_VERSION,
      tool_call_ids: [],
      workspace_root: '/workspace/demo',
      agent_name: 'builder',
      toolset_mode: TOOLSET_MODE,
      allowed_paths: null,
      max_cost_cents: null,
      child_scope: null,
      parent_envelope_id: null,
      session_id: null,
      scope_tags: null,
    });
  });

  it('is immutable', () => {
    const scope = makeScope({ scopeTags: ['ci'] });
    expect(Object.isFrozen(scope)).toBe(true);
    expect(Object.isFrozen(scope.scopeTags)).toBe(true);
  });

  it('rebinds tool call ids without touching the original', () => {
    const scope = makeScope();
    const bound = scope.withToolCallIds(['c1', 'c2']);

    expect(bound.toolCallIds).toEqual(['c1', 'c2']);
    expect(scope.toolCallIds).toEqual([]);
    expect(bound.workspaceRoot).toBe(scope.workspaceRoot);
  });

  it('round-trips through its dict form', () => {
    const scope = makeScope({ allowedPaths: ['src/'], maxCostCents: 250, sessionId: 's-1' }).withToolCallIds([
      'c1',
    ]);
    expect(ApprovalScope.fromDict(scope.toDict()).toDict()).toEqual(scope.toDict());
  });

  it('treats missing optional fields as null', () => {
    const scope = ApprovalScope.fromDict({
      work_item_id: 'w',
      scope_schema_version: 1,
      tool_call_ids: ['c1'],
      workspace_root: '/ws',
      agent_name: 'a',
      toolset_mode: TOOLSET_MODE,
    });
    expect(scope.allowedPaths).toBeNull();
    expect(scope.scopeTags).toBeNull();
  });

  it('reports an unknown schema version as unsupported', () => {
    const dict = { ...makeScope().toDict(), scope_schema_version: 2 };
    expect(captureError(() => ApprovalScope.fromDict(dict)).code).toBe('scope_schema_unsupported');
  });

  it('reports the version before other problems', () => {
    expect(captureError(() => ApprovalScope.fromDict({ scope_schema_version: 99 })).code).toBe(
      'scope_schema_unsupported'
    );
  });

  it('rejects a non-object scope', () => {
    expect(captureError(() => ApprovalScope.fromDict('scope')).code).toBe('invalid_submission');
  });

  it('rejects a scope with missing required fields', () => {
    const { workspace_root: _omitted, ...dict } = makeScope().toDict();
    const err = captureError(() => ApprovalScope.fromDict(dict));
    expect(err.code).toBe('invalid_submission');
    expect(err.message).toContain('workspace_root');
  });
});

describe('computePlanHash', () => {
  const scope = makeScope().withToolCallIds(['c1']);

  it('returns 64 hex characters', () => {
    expect(computePlanHash(scope, [WRITE_CALL])).toMatch(/^[a-f0-9]{64}$/);
  });

  it('ignores argument key order', () => {
    const a = { ...WRITE_CALL, args: { path: 'a.txt', mode: 'w' } };
    const b = { ...WRITE_CALL, args: { mode: 'w', path: 'a.txt' } };
    expect(computePlanHash(scope, [a])).toBe(computePlanHash(scope, [b]));
  });

  it('changes when the scope drifts', () => {
    const drifted = makeScope({ workspaceRoot: '/workspace/other' }).withToolCallIds(['c1']);
    expect(computePlanHash(drifted, [WRITE_CALL])).not.toBe(computePlanHash(scope, [WRITE_CALL]));
  });

  it('changes when the arguments change', () => {
    const changed = { ...WRITE_CALL, args: { path: 'b.txt' } };
    expect(computePlanHash(scope, [changed])).not.toBe(computePlanHash(scope, [WRITE_CALL]));
  });

  it('binds the governed id sequence', () => {
    const unbound = makeScope();
    expect(computePlanHash(unbound, [WRITE_CALL])).not.toBe(computePlanHash(scope, [WRITE_CALL]));
  });
});
