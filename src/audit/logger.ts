import type { AuditSink } from '../providers/types.js';
import type { AuditEntry, DeferredToolCall, SubmittedDecision } from '../types.js';
import type { ApprovalVerificationError } from '../approvals/errors.js';
import { redactSecrets } from '../utils.js';

const PLAN_HASH_PREFIX_LENGTH = 8;

/**
 * Envelope lifecycle audit trail.
 * SECURITY: Append-only. Entries carry a plan hash prefix and redacted argument
 * summaries, never signatures, key material or full arguments.
 */
export class AuditLogger {
  constructor(
    private readonly sink: AuditSink | null,
    private readonly version: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get enabled(): boolean {
    return this.sink !== null;
  }

  envelopeIssued(params: {
    nonce: string;
    envelopeId: string;
    keyId: string;
    planHash: string;
    toolCalls: readonly DeferredToolCall[];
  }): void {
    this.write({
      event: 'envelope_issued',
      nonce: params.nonce,
      envelopeId: params.envelopeId,
      keyId: params.keyId,
      planHashPrefix: params.planHash.slice(0, PLAN_HASH_PREFIX_LENGTH),
      tools: params.toolCalls.map((call) => call.tool_name),
      argsSummary: redactSecrets(params.toolCalls.map((call) => call.args)),
    });
  }

  approvalSigned(params: { nonce: string; keyId: string; decisions: readonly SubmittedDecision[] }): void {
    this.write({
      event: 'approval_signed',
      nonce: params.nonce,
      keyId: params.keyId,
      ...splitDecisions(params.decisions),
    });
  }

  approvalConsumed(params: {
    nonce: string;
    envelopeId: string;
    keyId: string;
    planHash: string;
    decisions: readonly SubmittedDecision[];
  }): void {
    this.write({
      event: 'approval_consumed',
      nonce: params.nonce,
      envelopeId: params.envelopeId,
      keyId: params.keyId,
      planHashPrefix: params.planHash.slice(0, PLAN_HASH_PREFIX_LENGTH),
      ...splitDecisions(params.decisions),
    });
  }

  verificationFailed(params: { nonce?: string; error: ApprovalVerificationError }): void {
    this.write({
      event: 'verification_failed',
      nonce: params.nonce,
      reasonCode: params.error.code,
      humanExplanation: params.error.message,
    });
  }

  envelopesExpired(count: number): void {
    this.write({ event: 'envelopes_expired', count });
  }

  envelopesPruned(count: number): void {
    this.write({ event: 'envelopes_pruned', count });
  }

  keyRotated(params: { previousKeyId: string; keyId: string; expiredEnvelopes: number }): void {
    this.write({
      event: 'key_rotated',
      previousKeyId: params.previousKeyId,
      keyId: params.keyId,
      count: params.expiredEnvelopes,
    });
  }

  private write(entry: Omit<AuditEntry, 'timestamp' | 'countersignVersion'>): void {
    if (this.sink === null) {
      return;
    }
    this.sink.write({
      timestamp: this.clock().toISOString(),
      ...entry,
      countersignVersion: this.version,
    });
  }
}

function splitDecisions(decisions: readonly SubmittedDecision[]): { approved: string[]; denied: string[] } {
  return {
    approved: decisions.filter((item) => item.approved).map((item) => item.tool_call_id),
    denied: decisions.filter((item) => !item.approved).map((item) => item.tool_call_id),
  };
}
