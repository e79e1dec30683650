export { ApprovalScope, computePlanHash, SCOPE_SCHEMA_VERSION, SIGNED_OBJECT_CONTEXT } from './approvals/scope.js';
export type { ApprovalScopeInit } from './approvals/scope.js';
export { ApprovalStore } from './approvals/store.js';
export type { ApprovalSigner, ApprovalStoreOptions, Envelope, IssuedEnvelope } from './approvals/store.js';
export {
  serializeDeferredRequests,
  signDecisions,
  resolveSubmission,
  DEFAULT_DENIAL_MESSAGE,
  DEFAULT_RESOLUTION_DENIAL,
} from './approvals/deferred.js';
export type { DecisionInput, DeferredDeps } from './approvals/deferred.js';
export {
  APPROVAL_ERROR_CODES,
  ApprovalVerificationError,
  formatApprovalFailure,
  isApprovalVerificationError,
} from './approvals/errors.js';
export type { ApprovalErrorCode } from './approvals/errors.js';
export { buildServer } from './app.js';
export type { ServerDeps } from './app.js';
export { AuditLogger } from './audit/logger.js';
export { ConfigError, config } from './config.js';
export { openDatabase, closeDatabase } from './db/client.js';
export type { DatabaseHandle } from './db/client.js';
export { ApprovalKeyManager } from './keys/manager.js';
export type { KeyPaths, RotationResult, UnlockResult } from './keys/manager.js';
export { DEFAULT_KDF_POLICY } from './keys/crypto.js';
export type { KdfPolicy } from './keys/crypto.js';
export { KeyManagerError } from './keys/errors.js';
export { ToolPolicyRegistry, loadToolPolicy } from './policy/toolPolicy.js';
export type { ToolClassification } from './policy/toolPolicy.js';
export { createAuditSink, JsonlAuditSink } from './providers/index.js';
export type { AuditSink } from './providers/index.js';
export { canonicalize } from './utils.js';
export type * from './types.js';
