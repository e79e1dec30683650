import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const envelopeStates = ['pending', 'consumed', 'expired'] as const;

/**
 * Approval envelopes: one row per batch of deferred tool calls.
 * Timestamps are epoch seconds. plan_hash is written once at issuance.
 */
export const approvalEnvelopes = sqliteTable('approval_envelopes', {
  envelopeId: text('envelope_id').primaryKey(),
  nonce: text('nonce').notNull().unique(),
  scopeJson: text('scope_json').notNull(),
  toolCallsJson: text('tool_calls_json').notNull(),
  planHash: text('plan_hash').notNull(),
  keyId: text('key_id').notNull(),
  signedObjectJson: text('signed_object_json'),
  signatureHex: text('signature_hex'),
  state: text('state', { enum: envelopeStates }).notNull(),
  issuedAt: integer('issued_at').notNull(),
  expiresAt: integer('expires_at').notNull(),
  consumedAt: integer('consumed_at'),
});

export type EnvelopeRow = typeof approvalEnvelopes.$inferSelect;
export type NewEnvelopeRow = typeof approvalEnvelopes.$inferInsert;
