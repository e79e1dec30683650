import { ApprovalVerificationError } from './errors.js';
import { ScopeDictSchema, describeIssues } from './schemas.js';
import { canonicalize, computeHash, isRecord } from '../utils.js';
import type { DeferredToolCall, ScopeDict, SignedDecision, SubmittedDecision } from '../types.js';

export const SCOPE_SCHEMA_VERSION = 1;
export const SIGNED_OBJECT_CONTEXT = 'countersign.approval.v1';
export const TOOLSET_MODE = 'require_write_approval';

export interface ApprovalScopeInit {
  workItemId: string;
  workspaceRoot: string;
  agentName: string;
  scopeSchemaVersion?: number;
  toolCallIds?: readonly string[];
  toolsetMode?: string;
  allowedPaths?: readonly string[] | null;
  maxCostCents?: number | null;
  childScope?: boolean | null;
  parentEnvelopeId?: string | null;
  sessionId?: string | null;
  scopeTags?: readonly string[] | null;
}

/**
 * Execution context an approval is valid for.
 *
 * A scope is built once when the deferred request is issued and again, from live
 * state, when execution resumes. Both copies must hash identically unless
 * something drifted, so the object is immutable and the only derivation is
 * rebinding the governed tool-call ids.
 */
export class ApprovalScope {
  readonly workItemId: string;
  readonly workspaceRoot: string;
  readonly agentName: string;
  readonly scopeSchemaVersion: number;
  readonly toolCallIds: readonly string[];
  readonly toolsetMode: string;
  readonly allowedPaths: readonly string[] | null;
  readonly maxCostCents: number | null;
  readonly childScope: boolean | null;
  readonly parentEnvelopeId: string | null;
  readonly sessionId: string | null;
  readonly scopeTags: readonly string[] | null;

  constructor(init: ApprovalScopeInit) {
    this.workItemId = init.workItemId;
    this.workspaceRoot = init.workspaceRoot;
    this.agentName = init.agentName;
    this.scopeSchemaVersion = init.scopeSchemaVersion ?? SCOPE_SCHEMA_VERSION;
    this.toolCallIds = Object.freeze([...(init.toolCallIds ?? [])]);
    this.toolsetMode = init.toolsetMode ?? TOOLSET_MODE;
    this.allowedPaths = freezeList(init.allowedPaths);
    this.maxCostCents = init.maxCostCents ?? null;
    this.childScope = init.childScope ?? null;
    this.parentEnvelopeId = init.parentEnvelopeId ?? null;
    this.sessionId = init.sessionId ?? null;
    this.scopeTags = freezeList(init.scopeTags);
    Object.freeze(this);
  }

  withToolCallIds(toolCallIds: readonly string[]): ApprovalScope {
    return new ApprovalScope({ ...this.toInit(), toolCallIds });
  }

  toDict(): ScopeDict {
    return {
      work_item_id: this.workItemId,
      scope_schema_version: this.scopeSchemaVersion,
      tool_call_ids: [...this.toolCallIds],
      workspace_root: this.workspaceRoot,
      agent_name: this.agentName,
      toolset_mode: this.toolsetMode,
      allowed_paths: this.allowedPaths ? [...this.allowedPaths] : null,
      max_cost_cents: this.maxCostCents,
      child_scope: this.childScope,
      parent_envelope_id: this.parentEnvelopeId,
      session_id: this.sessionId,
      scope_tags: this.scopeTags ? [...this.scopeTags] : null,
    };
  }

  /**
   * Parse a persisted or submitted scope. The schema version is checked before
   * anything else so a newer writer's scope is reported as unsupported rather
   * than malformed.
   */
  static fromDict(raw: unknown): ApprovalScope {
    if (!isRecord(raw)) {
      throw new ApprovalVerificationError('invalid_submission', 'Approval scope must be an object.');
    }
    if (raw.scope_schema_version !== SCOPE_SCHEMA_VERSION) {
      throw new ApprovalVerificationError(
        'scope_schema_unsupported',
        'Unsupported approval scope schema version.'
      );
    }

    const parsed = ScopeDictSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ApprovalVerificationError(
        'invalid_submission',
        `Approval scope is malformed: ${describeIssues(parsed.error)}`
      );
    }

    const dict = parsed.data;
    return new ApprovalScope({
      workItemId: dict.work_item_id,
      workspaceRoot: dict.workspace_root,
      agentName: dict.agent_name,
      scopeSchemaVersion: dict.scope_schema_version,
      toolCallIds: dict.tool_call_ids,
      toolsetMode: dict.toolset_mode,
      allowedPaths: dict.allowed_paths,
      maxCostCents: dict.max_cost_cents,
      childScope: dict.child_scope,
      parentEnvelopeId: dict.parent_envelope_id,
      sessionId: dict.session_id,
      scopeTags: dict.scope_tags,
    });
  }

  private toInit(): ApprovalScopeInit {
    return {
      workItemId: this.workItemId,
      workspaceRoot: this.workspaceRoot,
      agentName: this.agentName,
      scopeSchemaVersion: this.scopeSchemaVersion,
      toolCallIds: this.toolCallIds,
      toolsetMode: this.toolsetMode,
      allowedPaths: this.allowedPaths,
      maxCostCents: this.maxCostCents,
      childScope: this.childScope,
      parentEnvelopeId: this.parentEnvelopeId,
      sessionId: this.sessionId,
      scopeTags: this.scopeTags,
    };
  }
}

function freezeList(value: readonly string[] | null | undefined): readonly string[] | null {
  return value ? Object.freeze([...value]) : null;
}

/**
 * Plan hash: sha256 over the canonical {scope, tool_calls} pair.
 * SECURITY: The scope must already be rebound to the calls' ids, so that hash
 * equality also proves the governed id sequence is unchanged.
 */
export function computePlanHash(scope: ApprovalScope, toolCalls: readonly DeferredToolCall[]): string {
  return computeHash(canonicalize({ scope: scope.toDict(), tool_calls: toolCalls }));
}

export function signedDecisionsFromSubmitted(
  decisions: readonly SubmittedDecision[]
): SignedDecision[] {
  return decisions.map((item) => ({ tool_call_id: item.tool_call_id, approved: item.approved }));
}
