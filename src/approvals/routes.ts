import type { FastifyInstance, FastifyReply } from 'fastify';
import {
  ApprovalVerificationError,
  formatApprovalFailure,
  isApprovalVerificationError,
  type ApprovalErrorCode,
} from './errors.js';
import { PLAN_HASH_PREFIX_LENGTH, signDecisions } from './deferred.js';
import { DecisionsBodySchema, describeIssues } from './schemas.js';
import type { ApprovalSigner, ApprovalStore, Envelope } from './store.js';
import { KeyManagerError } from '../keys/errors.js';
import type { DeferredRequestPayload } from '../types.js';
import { epochSeconds } from '../utils.js';

interface ApprovalParams {
  nonce: string;
}

export interface ApprovalRouteDeps {
  store: ApprovalStore;
  keyManager: ApprovalSigner;
  now?: () => number;
}

const STATUS_BY_CODE: Record<ApprovalErrorCode, number> = {
  unknown_nonce: 404,
  expired_or_consumed: 409,
  context_drift: 409,
  invalid_submission: 400,
  tool_policy_violation: 400,
  unknown_key_id: 403,
  invalid_signature: 403,
  bijection_mismatch: 403,
  scope_schema_unsupported: 403,
};

/**
 * Register the human-facing approval routes: list and inspect pending
 * envelopes, and sign decisions for one.
 */
export function registerApprovalRoutes(app: FastifyInstance, deps: ApprovalRouteDeps): void {
  // GET /approvals
  app.get('/approvals', async () => {
    return { approvals: deps.store.listPending().map(toPayload) };
  });

  // GET /approvals/:nonce
  app.get<{ Params: ApprovalParams }>('/approvals/:nonce', async (request, reply) => {
    const envelope = deps.store.getEnvelope(request.params.nonce);
    if (!envelope) {
      return sendError(reply, 'unknown_nonce', 'Unknown approval nonce.');
    }
    if (!isOpen(envelope, deps.now)) {
      return sendError(reply, 'expired_or_consumed', 'Approval envelope is expired or already consumed.');
    }
    return toPayload(envelope);
  });

  // POST /approvals/:nonce/decisions
  app.post<{ Params: ApprovalParams }>('/approvals/:nonce/decisions', async (request, reply) => {
    const body = DecisionsBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendError(reply, 'invalid_submission', `Invalid request: ${describeIssues(body.error)}`);
    }

    const envelope = deps.store.getEnvelope(request.params.nonce);
    if (!envelope) {
      return sendError(reply, 'unknown_nonce', 'Unknown approval nonce.');
    }

    try {
      const submission = signDecisions(toPayload(envelope), body.data.decisions, {
        store: deps.store,
        keyManager: deps.keyManager,
      });
      request.log.info({ nonce: submission.nonce }, 'approval decisions signed');
      return submission;
    } catch (err) {
      if (isApprovalVerificationError(err)) {
        return sendFailure(reply, err);
      }
      if (err instanceof KeyManagerError && err.kind === 'locked') {
        return reply.status(503).send({ error: 'key_locked', message: err.message });
      }
      throw err;
    }
  });
}

function sendError(reply: FastifyReply, code: ApprovalErrorCode, message: string): FastifyReply {
  return sendFailure(reply, new ApprovalVerificationError(code, message));
}

function sendFailure(reply: FastifyReply, err: ApprovalVerificationError): FastifyReply {
  return reply.status(STATUS_BY_CODE[err.code]).send({
    error: err.code,
    message: formatApprovalFailure(err),
  });
}

function isOpen(envelope: Envelope, now: () => number = epochSeconds): boolean {
  return envelope.state === 'pending' && envelope.expiresAt > now();
}

function toPayload(envelope: Envelope): DeferredRequestPayload & { expires_at: number; signed: boolean } {
  return {
    nonce: envelope.nonce,
    plan_hash_prefix: envelope.planHash.slice(0, PLAN_HASH_PREFIX_LENGTH),
    requests: envelope.toolCalls,
    expires_at: envelope.expiresAt,
    signed: envelope.signed,
  };
}
