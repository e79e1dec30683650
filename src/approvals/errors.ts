/**
 * Stable failure codes for approval verification. Callers switch on `code`;
 * the set is closed so such switches can be exhaustive.
 */
export const APPROVAL_ERROR_CODES = [
  'unknown_nonce',
  'expired_or_consumed',
  'unknown_key_id',
  'invalid_signature',
  'bijection_mismatch',
  'context_drift',
  'invalid_submission',
  'scope_schema_unsupported',
  'tool_policy_violation',
] as const;

export type ApprovalErrorCode = (typeof APPROVAL_ERROR_CODES)[number];

export class ApprovalVerificationError extends Error {
  readonly code: ApprovalErrorCode;

  constructor(code: ApprovalErrorCode, message: string) {
    super(message);
    this.name = 'ApprovalVerificationError';
    this.code = code;
  }
}

export function isApprovalVerificationError(err: unknown): err is ApprovalVerificationError {
  return err instanceof ApprovalVerificationError;
}

/**
 * User-facing rendering. Never includes a stack.
 */
export function formatApprovalFailure(err: ApprovalVerificationError): string {
  return `Approval verification failed [${err.code}]: ${err.message}`;
}
