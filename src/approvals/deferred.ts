import { ApprovalVerificationError } from './errors.js';
import { DeferredToolCallSchema, describeIssues } from './schemas.js';
import type { ApprovalScope } from './scope.js';
import type { ApprovalSigner, ApprovalStore } from './store.js';
import type { ToolPolicyRegistry } from '../policy/toolPolicy.js';
import type {
  DeferredRequestPayload,
  DeferredToolCall,
  SubmissionPayload,
  SubmittedDecision,
  ToolCallResolution,
} from '../types.js';

export const PLAN_HASH_PREFIX_LENGTH = 8;
export const DEFAULT_DENIAL_MESSAGE = 'User denied this action.';
export const DEFAULT_RESOLUTION_DENIAL = 'User denied this tool call.';

export type DecisionInput =
  | readonly SubmittedDecision[]
  | Map<string, boolean>
  | Record<string, boolean>;

export interface DeferredDeps {
  store: ApprovalStore;
  keyManager: ApprovalSigner;
}

/**
 * Agent side: turn the calls the agent paused on into a pending envelope and
 * the payload shown to the human.
 */
export function serializeDeferredRequests(
  calls: readonly unknown[],
  deps: DeferredDeps & { scope: ApprovalScope; toolPolicy: ToolPolicyRegistry }
): DeferredRequestPayload {
  const requests: DeferredToolCall[] = calls.map((call, index) => {
    const parsed = DeferredToolCallSchema.safeParse(call);
    if (!parsed.success) {
      throw new ApprovalVerificationError(
        'invalid_submission',
        `Deferred tool call ${index} is malformed: ${describeIssues(parsed.error)}`
      );
    }
    return parsed.data;
  });
  deps.toolPolicy.validateDeferredCalls(requests);

  const envelope = deps.store.createEnvelope({
    scope: deps.scope,
    toolCalls: requests,
    keyId: deps.keyManager.currentKeyId(),
  });

  return {
    nonce: envelope.nonce,
    plan_hash_prefix: envelope.planHash.slice(0, PLAN_HASH_PREFIX_LENGTH),
    requests,
  };
}

/**
 * Human side: sign decisions for a payload. Decisions are either full entries
 * or a map of tool_call_id to approved; they are returned in request order.
 */
export function signDecisions(
  payload: DeferredRequestPayload,
  decisions: DecisionInput,
  deps: DeferredDeps
): SubmissionPayload {
  const byId = indexDecisions(decisions);

  const ordered: SubmittedDecision[] = payload.requests.map((request) => {
    const decision = byId.get(request.tool_call_id);
    if (!decision) {
      throw new ApprovalVerificationError(
        'invalid_submission',
        `Missing decision for tool call '${request.tool_call_id}'.`
      );
    }
    return {
      tool_call_id: request.tool_call_id,
      approved: decision.approved,
      denial_message: decision.approved ? null : decision.denial_message || DEFAULT_DENIAL_MESSAGE,
    };
  });

  const unknown = [...byId.keys()].filter(
    (id) => !payload.requests.some((request) => request.tool_call_id === id)
  );
  if (unknown.length > 0) {
    throw new ApprovalVerificationError(
      'invalid_submission',
      `Decision for unknown tool call '${unknown[0]}'.`
    );
  }

  deps.store.storeSignedApproval({ nonce: payload.nonce, decisions: ordered, keyManager: deps.keyManager });
  return { nonce: payload.nonce, decisions: ordered };
}

/**
 * Agent side on resume: verify and consume, then map each call to its outcome.
 */
export function resolveSubmission(
  submission: unknown,
  deps: DeferredDeps & { scope: ApprovalScope }
): ToolCallResolution[] {
  const decisions = deps.store.verifyAndConsume({
    submission,
    liveScope: deps.scope,
    keyManager: deps.keyManager,
  });

  return decisions.map((decision): ToolCallResolution =>
    decision.approved
      ? { tool_call_id: decision.tool_call_id, outcome: 'approved' }
      : {
          tool_call_id: decision.tool_call_id,
          outcome: 'denied',
          message: decision.denial_message || DEFAULT_RESOLUTION_DENIAL,
        }
  );
}

function isDecisionList(value: DecisionInput): value is readonly SubmittedDecision[] {
  return Array.isArray(value);
}

function indexDecisions(decisions: DecisionInput): Map<string, { approved: boolean; denial_message: string | null }> {
  const byId = new Map<string, { approved: boolean; denial_message: string | null }>();

  if (isDecisionList(decisions)) {
    for (const item of decisions) {
      if (byId.has(item.tool_call_id)) {
        throw new ApprovalVerificationError(
          'invalid_submission',
          `Duplicate decision for tool call '${item.tool_call_id}'.`
        );
      }
      byId.set(item.tool_call_id, { approved: item.approved, denial_message: item.denial_message });
    }
    return byId;
  }

  const entries: Iterable<[string, boolean]> =
    decisions instanceof Map ? decisions.entries() : Object.entries(decisions);
  for (const [id, approved] of entries) {
    byId.set(id, { approved, denial_message: null });
  }
  return byId;
}
