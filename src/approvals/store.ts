import { and, asc, count, eq, gt, lt, lte } from 'drizzle-orm';
import { z } from 'zod';
import { ApprovalVerificationError, isApprovalVerificationError } from './errors.js';
import { DeferredToolCallSchema, SignedObjectSchema, SubmissionSchema, describeIssues } from './schemas.js';
import { ApprovalScope, SIGNED_OBJECT_CONTEXT, computePlanHash, signedDecisionsFromSubmitted } from './scope.js';
import type { AuditLogger } from '../audit/logger.js';
import { ConfigError, validateRetentionWindow, type AppConfig } from '../config.js';
import { openDatabase, closeDatabase, type DatabaseHandle } from '../db/client.js';
import { initSchema } from '../db/migrations.js';
import { approvalEnvelopes, type EnvelopeRow } from '../db/schema.js';
import type { ApprovalKeyManager } from '../keys/manager.js';
import { canonicalize, epochSeconds, generateId, generateNonce, isRecord } from '../utils.js';
import type { DeferredToolCall, EnvelopeState, SubmittedDecision } from '../types.js';

/**
 * The slice of the key manager the store signs and verifies with.
 */
export type ApprovalSigner = Pick<
  ApprovalKeyManager,
  'currentKeyId' | 'signPayload' | 'verifySignature' | 'resolvePublicKey' | 'signedObject'
>;

export interface ApprovalStoreOptions {
  db: DatabaseHandle;
  ttlSeconds: number;
  nonceRetentionSeconds: number;
  clockSkewSeconds: number;
  audit?: AuditLogger;
  // Epoch seconds
  now?: () => number;
}

export interface IssuedEnvelope {
  envelopeId: string;
  nonce: string;
  planHash: string;
  expiresAt: number;
}

export interface Envelope {
  envelopeId: string;
  nonce: string;
  planHash: string;
  keyId: string;
  state: EnvelopeState;
  signed: boolean;
  toolCalls: DeferredToolCall[];
  issuedAt: number;
  expiresAt: number;
  consumedAt: number | null;
}

const ToolCallsSchema = z.array(DeferredToolCallSchema);

/**
 * SQLite-backed approval envelopes.
 *
 * An envelope binds a batch of deferred tool calls to the scope they were
 * proposed in (via the plan hash), to the signing key active at issuance, and
 * to a single-use nonce. Every operation is synchronous; consumption is one
 * conditional UPDATE so two processes can never both consume the same nonce.
 */
export class ApprovalStore {
  private readonly handle: DatabaseHandle;
  private readonly ttlSeconds: number;
  private readonly nonceRetentionSeconds: number;
  private readonly audit: AuditLogger | undefined;
  private readonly now: () => number;

  constructor(options: ApprovalStoreOptions) {
    requireInteger('APPROVAL_TTL_SECONDS', options.ttlSeconds, 1);
    requireInteger('NONCE_RETENTION_PERIOD_SECONDS', options.nonceRetentionSeconds, 1);
    requireInteger('APPROVAL_CLOCK_SKEW_SECONDS', options.clockSkewSeconds, 0);
    validateRetentionWindow(options);

    this.handle = options.db;
    this.ttlSeconds = options.ttlSeconds;
    this.nonceRetentionSeconds = options.nonceRetentionSeconds;
    this.audit = options.audit;
    this.now = options.now ?? epochSeconds;

    initSchema(this.handle.sqlite, this.now());
  }

  /**
   * Open the configured database and prune stale envelopes once.
   */
  static fromConfig(
    cfg: Pick<AppConfig, 'approvalDbPath' | 'approvalTtlSeconds' | 'nonceRetentionSeconds' | 'clockSkewSeconds'>,
    options: { audit?: AuditLogger } = {}
  ): ApprovalStore {
    const store = new ApprovalStore({
      db: openDatabase(cfg.approvalDbPath),
      ttlSeconds: cfg.approvalTtlSeconds,
      nonceRetentionSeconds: cfg.nonceRetentionSeconds,
      clockSkewSeconds: cfg.clockSkewSeconds,
      audit: options.audit,
    });
    store.pruneExpiredEnvelopes();
    return store;
  }

  get database(): DatabaseHandle {
    return this.handle;
  }

  close(): void {
    closeDatabase(this.handle);
  }

  /**
   * Issue a pending envelope for a batch of deferred tool calls.
   * The scope is rebound to the calls' ids before hashing.
   */
  createEnvelope(params: {
    scope: ApprovalScope;
    toolCalls: readonly DeferredToolCall[];
    keyId: string;
  }): IssuedEnvelope {
    if (params.toolCalls.length === 0) {
      throw new ApprovalVerificationError('invalid_submission', 'No deferred tool calls to approve.');
    }
    // Hashed and stored in parsed form; verification re-parses the stored calls.
    const parsed = ToolCallsSchema.safeParse(params.toolCalls);
    if (!parsed.success) {
      throw new ApprovalVerificationError(
        'invalid_submission',
        `Deferred tool calls are malformed: ${describeIssues(parsed.error)}`
      );
    }
    const toolCalls = parsed.data;
    const toolCallIds = toolCalls.map((call) => call.tool_call_id);
    if (new Set(toolCallIds).size !== toolCallIds.length) {
      throw new ApprovalVerificationError('invalid_submission', 'Deferred tool call ids must be unique.');
    }

    const scope = params.scope.withToolCallIds(toolCallIds);
    const planHash = computePlanHash(scope, toolCalls);
    const issuedAt = this.now();
    const envelope: IssuedEnvelope = {
      envelopeId: generateId(),
      nonce: generateNonce(),
      planHash,
      expiresAt: issuedAt + this.ttlSeconds,
    };

    this.handle.db
      .insert(approvalEnvelopes)
      .values({
        envelopeId: envelope.envelopeId,
        nonce: envelope.nonce,
        scopeJson: canonicalize(scope.toDict()),
        toolCallsJson: canonicalize(toolCalls),
        planHash,
        keyId: params.keyId,
        state: 'pending',
        issuedAt,
        expiresAt: envelope.expiresAt,
      })
      .run();

    this.audit?.envelopeIssued({
      nonce: envelope.nonce,
      envelopeId: envelope.envelopeId,
      keyId: params.keyId,
      planHash,
      toolCalls,
    });
    return envelope;
  }

  /**
   * Sign the human's decisions for a pending envelope. Signing again before
   * consumption replaces the earlier signature.
   */
  storeSignedApproval(params: {
    nonce: string;
    decisions: readonly SubmittedDecision[];
    keyManager: ApprovalSigner;
  }): void {
    const now = this.now();
    const row = this.findRow(params.nonce);
    if (!row) {
      throw new ApprovalVerificationError('unknown_nonce', 'Unknown approval nonce.');
    }
    if (row.state !== 'pending' || row.expiresAt <= now) {
      throw new ApprovalVerificationError('expired_or_consumed', 'Approval envelope is expired or already consumed.');
    }

    const keyId = params.keyManager.currentKeyId();
    if (row.keyId !== keyId) {
      throw new ApprovalVerificationError(
        'unknown_key_id',
        'Approval envelope was issued under a different signing key.'
      );
    }

    const expectedIds = this.parseToolCalls(row).map((call) => call.tool_call_id);
    assertBijection(expectedIds, params.decisions);

    const signedObject = params.keyManager.signedObject({
      nonce: params.nonce,
      planHash: row.planHash,
      decisions: signedDecisionsFromSubmitted(params.decisions),
    });
    const payload = canonicalize(signedObject);
    const signatureHex = params.keyManager.signPayload(payload);

    const result = this.handle.db
      .update(approvalEnvelopes)
      .set({ signedObjectJson: payload, signatureHex })
      .where(
        and(
          eq(approvalEnvelopes.nonce, params.nonce),
          eq(approvalEnvelopes.state, 'pending'),
          gt(approvalEnvelopes.expiresAt, now)
        )
      )
      .run();
    if (result.changes !== 1) {
      throw new ApprovalVerificationError('expired_or_consumed', 'Approval envelope is expired or already consumed.');
    }

    this.audit?.approvalSigned({ nonce: params.nonce, keyId, decisions: params.decisions });
  }

  /**
   * Verify a submission against the stored envelope and the live scope, then
   * consume the nonce. Returns the submitted decisions on success.
   *
   * SECURITY: Every failure is an ApprovalVerificationError; nothing here
   * falls back to executing the calls.
   */
  verifyAndConsume(params: {
    submission: unknown;
    liveScope: ApprovalScope;
    keyManager: ApprovalSigner;
  }): SubmittedDecision[] {
    let nonce: string | undefined;
    try {
      const submission = parseSubmission(params.submission);
      nonce = submission.nonce;

      const row = this.findRow(submission.nonce);
      if (!row) {
        throw new ApprovalVerificationError('unknown_nonce', 'Unknown approval nonce.');
      }

      this.verifySignatureStage(row, params.keyManager);
      verifySignedDecisions(row, submission.decisions);

      const storedScope = ApprovalScope.fromDict(parseJson(row.scopeJson, 'scope'));
      const storedToolCalls = this.parseToolCalls(row);

      const liveScope = params.liveScope.withToolCallIds(storedScope.toolCallIds);
      if (computePlanHash(liveScope, storedToolCalls) !== row.planHash) {
        throw new ApprovalVerificationError(
          'context_drift',
          'Execution context changed since approval was requested.'
        );
      }

      assertBijection(storedScope.toolCallIds, submission.decisions);

      const now = this.now();
      const result = this.handle.db
        .update(approvalEnvelopes)
        .set({ state: 'consumed', consumedAt: now })
        .where(
          and(
            eq(approvalEnvelopes.nonce, submission.nonce),
            eq(approvalEnvelopes.state, 'pending'),
            gt(approvalEnvelopes.expiresAt, now)
          )
        )
        .run();
      if (result.changes !== 1) {
        throw new ApprovalVerificationError(
          'expired_or_consumed',
          'Approval envelope is expired or already consumed.'
        );
      }

      this.audit?.approvalConsumed({
        nonce: submission.nonce,
        envelopeId: row.envelopeId,
        keyId: row.keyId,
        planHash: row.planHash,
        decisions: submission.decisions,
      });
      return submission.decisions;
    } catch (err) {
      if (isApprovalVerificationError(err)) {
        this.audit?.verificationFailed({ nonce, error: err });
      }
      throw err;
    }
  }

  /**
   * Expire every pending envelope. Used on key rotation.
   */
  expirePendingEnvelopes(): number {
    const now = this.now();
    const result = this.handle.db
      .update(approvalEnvelopes)
      .set({ state: 'expired', consumedAt: now })
      .where(eq(approvalEnvelopes.state, 'pending'))
      .run();
    if (result.changes > 0) {
      this.audit?.envelopesExpired(result.changes);
    }
    return result.changes;
  }

  /**
   * Move pending envelopes past their TTL to expired.
   */
  expireOverdueEnvelopes(): number {
    const now = this.now();
    const result = this.handle.db
      .update(approvalEnvelopes)
      .set({ state: 'expired', consumedAt: now })
      .where(and(eq(approvalEnvelopes.state, 'pending'), lte(approvalEnvelopes.expiresAt, now)))
      .run();
    if (result.changes > 0) {
      this.audit?.envelopesExpired(result.changes);
    }
    return result.changes;
  }

  /**
   * Delete expired envelopes once their nonce is past the retention window.
   */
  pruneExpiredEnvelopes(): number {
    const cutoff = this.now() - this.nonceRetentionSeconds;
    const result = this.handle.db
      .delete(approvalEnvelopes)
      .where(and(eq(approvalEnvelopes.state, 'expired'), lt(approvalEnvelopes.expiresAt, cutoff)))
      .run();
    if (result.changes > 0) {
      this.audit?.envelopesPruned(result.changes);
    }
    return result.changes;
  }

  getEnvelope(nonce: string): Envelope | null {
    const row = this.findRow(nonce);
    return row ? this.toEnvelope(row) : null;
  }

  listPending(): Envelope[] {
    const now = this.now();
    return this.handle.db
      .select()
      .from(approvalEnvelopes)
      .where(and(eq(approvalEnvelopes.state, 'pending'), gt(approvalEnvelopes.expiresAt, now)))
      .orderBy(asc(approvalEnvelopes.issuedAt))
      .all()
      .map((row) => this.toEnvelope(row));
  }

  countPending(): number {
    const [row] = this.handle.db
      .select({ value: count() })
      .from(approvalEnvelopes)
      .where(eq(approvalEnvelopes.state, 'pending'))
      .all();
    return row?.value ?? 0;
  }

  private findRow(nonce: string): EnvelopeRow | undefined {
    return this.handle.db.select().from(approvalEnvelopes).where(eq(approvalEnvelopes.nonce, nonce)).get();
  }

  private verifySignatureStage(row: EnvelopeRow, keyManager: ApprovalSigner): void {
    if (row.keyId === '') {
      throw new ApprovalVerificationError('unknown_key_id', 'Approval envelope has no signing key.');
    }
    if (row.signedObjectJson === null || row.signatureHex === null) {
      throw new ApprovalVerificationError('invalid_signature', 'Approval envelope has not been signed.');
    }
    if (keyManager.resolvePublicKey(row.keyId) === null) {
      throw new ApprovalVerificationError('unknown_key_id', 'Approval signing key is not known.');
    }
    if (!keyManager.verifySignature(row.signedObjectJson, row.signatureHex, row.keyId)) {
      throw new ApprovalVerificationError('invalid_signature', 'Approval signature is invalid.');
    }
  }

  private parseToolCalls(row: EnvelopeRow): DeferredToolCall[] {
    const parsed = ToolCallsSchema.safeParse(parseJson(row.toolCallsJson, 'tool calls'));
    if (!parsed.success) {
      throw new ApprovalVerificationError(
        'invalid_submission',
        `Stored tool calls are malformed: ${describeIssues(parsed.error)}`
      );
    }
    return parsed.data;
  }

  private toEnvelope(row: EnvelopeRow): Envelope {
    return {
      envelopeId: row.envelopeId,
      nonce: row.nonce,
      planHash: row.planHash,
      keyId: row.keyId,
      state: row.state,
      signed: row.signatureHex !== null,
      toolCalls: this.parseToolCalls(row),
      issuedAt: row.issuedAt,
      expiresAt: row.expiresAt,
      consumedAt: row.consumedAt,
    };
  }
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}.`);
  }
}

function parseJson(raw: string, label: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ApprovalVerificationError('invalid_submission', `Stored ${label} are not valid JSON.`);
  }
}

function parseSubmission(raw: unknown): { nonce: string; decisions: SubmittedDecision[] } {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new ApprovalVerificationError('invalid_submission', 'Approval submission is not valid JSON.');
    }
  }
  if (!isRecord(value)) {
    throw new ApprovalVerificationError('invalid_submission', 'Approval submission must be an object.');
  }

  const parsed = SubmissionSchema.safeParse(value);
  if (!parsed.success) {
    throw new ApprovalVerificationError(
      'invalid_submission',
      `Approval submission is malformed: ${describeIssues(parsed.error)}`
    );
  }
  return parsed.data;
}

/**
 * The signed object must be exactly what the store signed for this envelope,
 * and the submitted decisions must match the signed ones.
 */
function verifySignedDecisions(row: EnvelopeRow, decisions: readonly SubmittedDecision[]): void {
  let raw: unknown;
  try {
    raw = JSON.parse(row.signedObjectJson ?? '');
  } catch {
    throw new ApprovalVerificationError('invalid_signature', 'Signed approval payload is not valid JSON.');
  }

  const parsed = SignedObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ApprovalVerificationError('invalid_signature', 'Signed approval payload is malformed.');
  }

  const signed = parsed.data;
  if (
    signed.ctx !== SIGNED_OBJECT_CONTEXT ||
    signed.nonce !== row.nonce ||
    signed.plan_hash !== row.planHash ||
    signed.key_id !== row.keyId
  ) {
    throw new ApprovalVerificationError('invalid_signature', 'Signed approval payload does not match the envelope.');
  }

  if (canonicalize(signed.decisions) !== canonicalize(signedDecisionsFromSubmitted(decisions))) {
    throw new ApprovalVerificationError('bijection_mismatch', 'Submitted decisions differ from the signed decisions.');
  }
}

/**
 * Decisions must cover the governed tool calls exactly once each, in order.
 */
function assertBijection(expectedIds: readonly string[], decisions: readonly SubmittedDecision[]): void {
  const submittedIds = decisions.map((item) => item.tool_call_id);
  const matches =
    submittedIds.length === expectedIds.length &&
    new Set(submittedIds).size === submittedIds.length &&
    submittedIds.every((id, index) => id === expectedIds[index]);
  if (!matches) {
    throw new ApprovalVerificationError(
      'bijection_mismatch',
      'Decisions must cover each deferred tool call exactly once.'
    );
  }
}
