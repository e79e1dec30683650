// Any value that survives a JSON round trip unchanged
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// A tool call the agent proposed and that must wait for approval
export interface DeferredToolCall {
  tool_call_id: string;
  tool_name: string;
  args: JsonValue;
}

// Decision fields covered by the approval signature
export interface SignedDecision {
  tool_call_id: string;
  approved: boolean;
}

// Decision as submitted back for execution; denial_message is NOT signed
export interface SubmittedDecision extends SignedDecision {
  denial_message: string | null;
}

export type EnvelopeState = 'pending' | 'consumed' | 'expired';

// Snake-case scope form used for hashing and persistence
export interface ScopeDict {
  work_item_id: string;
  scope_schema_version: number;
  tool_call_ids: string[];
  workspace_root: string;
  agent_name: string;
  toolset_mode: string;
  allowed_paths: string[] | null;
  max_cost_cents: number | null;
  child_scope: boolean | null;
  parent_envelope_id: string | null;
  session_id: string | null;
  scope_tags: string[] | null;
}

// Exact structure that gets canonicalized and signed
export interface SignedObject {
  ctx: string;
  nonce: string;
  plan_hash: string;
  key_id: string;
  decisions: SignedDecision[];
}

// Approval store -> human-facing layer
export interface DeferredRequestPayload {
  nonce: string;
  plan_hash_prefix: string;
  requests: DeferredToolCall[];
}

// Human-facing layer -> approval store
export interface SubmissionPayload {
  nonce: string;
  decisions: SubmittedDecision[];
}

// Keyring entry used to verify signatures made before a rotation
export interface KeyringEntry {
  key_id: string;
  public_key_hex: string;
  created_at: string;
  retired_at: string | null;
}

// Per-call outcome handed back to the agent layer after consumption
export type ToolCallResolution =
  | { tool_call_id: string; outcome: 'approved' }
  | { tool_call_id: string; outcome: 'denied'; message: string };

// Lifecycle events written to the audit sink
export type AuditEvent =
  | 'envelope_issued'
  | 'approval_signed'
  | 'approval_consumed'
  | 'verification_failed'
  | 'envelopes_expired'
  | 'envelopes_pruned'
  | 'key_rotated';

// Audit log entry
export interface AuditEntry {
  timestamp: string;
  event: AuditEvent;
  nonce?: string;
  envelopeId?: string;
  keyId?: string;
  previousKeyId?: string;
  planHashPrefix?: string;
  tools?: string[];
  argsSummary?: string;
  approved?: string[];
  denied?: string[];
  reasonCode?: string;
  humanExplanation?: string;
  count?: number;
  countersignVersion: string;
}
