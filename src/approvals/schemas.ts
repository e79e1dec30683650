import { z } from 'zod';
import type { JsonValue } from '../types.js';

/**
 * Zod schemas for every payload that crosses the approval boundary.
 * Anything that fails here is rejected before it reaches the store.
 */

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const DeferredToolCallSchema = z.object({
  tool_call_id: z.string().min(1, 'tool_call_id is required'),
  tool_name: z.string().min(1, 'tool_name is required'),
  args: JsonValueSchema,
});

export const SignedDecisionSchema = z.object({
  tool_call_id: z.string().min(1),
  approved: z.boolean(),
});

export const SubmittedDecisionSchema = z.object({
  tool_call_id: z.string().min(1, 'tool_call_id is required'),
  approved: z.boolean({ invalid_type_error: 'approved must be boolean' }),
  denial_message: z
    .string()
    .nullable()
    .optional()
    .transform((value) => value ?? null),
});

export const SubmissionSchema = z.object({
  nonce: z.string().min(1, 'nonce is required'),
  decisions: z.array(SubmittedDecisionSchema),
});

export const DeferredRequestPayloadSchema = z.object({
  nonce: z.string().min(1),
  plan_hash_prefix: z.string(),
  requests: z.array(DeferredToolCallSchema),
});

// Decisions stay raw here; the store compares them canonically against the submission
export const SignedObjectSchema = z.object({
  ctx: z.string(),
  nonce: z.string(),
  plan_hash: z.string(),
  key_id: z.string(),
  decisions: z.array(z.unknown()),
});

export const ScopeDictSchema = z.object({
  work_item_id: z.string().min(1, 'work_item_id is invalid'),
  scope_schema_version: z.number().int(),
  tool_call_ids: z.array(z.string()),
  workspace_root: z.string().min(1, 'workspace_root is invalid'),
  agent_name: z.string().min(1, 'agent_name is invalid'),
  toolset_mode: z.string().min(1, 'toolset_mode is invalid'),
  allowed_paths: z.array(z.string()).nullish(),
  max_cost_cents: z.number().int().nullish(),
  child_scope: z.boolean().nullish(),
  parent_envelope_id: z.string().nullish(),
  session_id: z.string().nullish(),
  scope_tags: z.array(z.string()).nullish(),
});

// HTTP body for POST /approvals/:nonce/decisions
export const DecisionsBodySchema = z.object({
  decisions: z.array(SubmittedDecisionSchema).min(1, 'At least one decision is required'),
});

/**
 * Flatten zod issues into one line, the way request validation errors are reported.
 */
export function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}
