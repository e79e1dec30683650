import type Database from 'better-sqlite3';
import { z } from 'zod';
import { envelopeStates, type NewEnvelopeRow } from './schema.js';
import { generateId } from '../utils.js';

const TABLE = 'approval_envelopes';
const LEGACY_TABLE = 'approval_envelopes_legacy';

export const EXPECTED_COLUMNS = [
  'envelope_id',
  'nonce',
  'scope_json',
  'tool_calls_json',
  'plan_hash',
  'key_id',
  'signed_object_json',
  'signature_hex',
  'state',
  'issued_at',
  'expires_at',
  'consumed_at',
] as const;

const CREATE_TABLE_SQL = `
  CREATE TABLE ${TABLE} (
    envelope_id TEXT PRIMARY KEY,
    nonce TEXT UNIQUE NOT NULL,
    scope_json TEXT NOT NULL,
    tool_calls_json TEXT NOT NULL,
    plan_hash TEXT NOT NULL,
    key_id TEXT NOT NULL,
    signed_object_json TEXT,
    signature_hex TEXT,
    state TEXT NOT NULL,
    issued_at INTEGER NOT NULL,
    expires_at INTEGER NOT NULL,
    consumed_at INTEGER
  )
`;

export class SchemaMigrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaMigrationError';
  }
}

const TimestampSchema = z.union([z.number(), z.string().min(1)]);

// Columns every legacy layout carried; anything else in the old table is dropped
const LegacyRowSchema = z.object({
  nonce: z.string().min(1),
  scope_json: z.string(),
  tool_calls_json: z.string(),
  plan_hash: z.string(),
  state: z.string(),
  issued_at: TimestampSchema,
  expires_at: TimestampSchema,
  consumed_at: TimestampSchema.nullish(),
});

export type LegacyEnvelopeRow = z.infer<typeof LegacyRowSchema>;

/**
 * Create the envelope table, or migrate it in place when its columns differ
 * from the current layout. Runs inside one immediate transaction, so the
 * check and the DDL hold the write lock.
 */
export function initSchema(sqlite: Database.Database, now: number): void {
  const run = sqlite.transaction(() => {
    if (!tableExists(sqlite, TABLE)) {
      sqlite.exec(CREATE_TABLE_SQL);
      return;
    }
    if (schemaIsCurrent(sqlite)) {
      return;
    }
    migrateLegacySchema(sqlite, now);
  });
  run.immediate();
}

function migrateLegacySchema(sqlite: Database.Database, now: number): void {
  sqlite.exec(`ALTER TABLE ${TABLE} RENAME TO ${LEGACY_TABLE}`);
  sqlite.exec(CREATE_TABLE_SQL);

  const insert = sqlite.prepare(`
    INSERT INTO ${TABLE} (
      envelope_id, nonce, scope_json, tool_calls_json, plan_hash, key_id,
      signed_object_json, signature_hex, state, issued_at, expires_at, consumed_at
    ) VALUES (
      @envelopeId, @nonce, @scopeJson, @toolCallsJson, @planHash, @keyId,
      @signedObjectJson, @signatureHex, @state, @issuedAt, @expiresAt, @consumedAt
    )
  `);

  const rows: unknown[] = sqlite.prepare(`SELECT * FROM ${LEGACY_TABLE}`).all();
  for (const raw of rows) {
    const parsed = LegacyRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SchemaMigrationError(
        `Cannot migrate legacy approval envelope row: ${parsed.error.errors[0]?.message ?? 'malformed row'}`
      );
    }
    const row = migrateLegacyRow(parsed.data, now);
    insert.run({
      envelopeId: row.envelopeId,
      nonce: row.nonce,
      scopeJson: row.scopeJson,
      toolCallsJson: row.toolCallsJson,
      planHash: row.planHash,
      keyId: row.keyId,
      signedObjectJson: row.signedObjectJson ?? null,
      signatureHex: row.signatureHex ?? null,
      state: row.state,
      issuedAt: row.issuedAt,
      expiresAt: row.expiresAt,
      consumedAt: row.consumedAt ?? null,
    });
  }

  sqlite.exec(`DROP TABLE ${LEGACY_TABLE}`);
}

/**
 * Map one legacy row onto the current layout.
 *
 * SECURITY: A row that was pending under an incompatible layout carries no
 * signature or key binding we can trust, so it is never resumable: pending
 * becomes expired, stamped with the migration time. States the current
 * machine does not know are treated the same way.
 */
export function migrateLegacyRow(row: LegacyEnvelopeRow, now: number): NewEnvelopeRow {
  const known = envelopeStates.find((state) => state === row.state);
  const state = known === undefined || known === 'pending' ? 'expired' : known;
  const wasTerminal = known === 'consumed' || known === 'expired';
  const consumedAt =
    wasTerminal && row.consumed_at !== null && row.consumed_at !== undefined
      ? toEpochSeconds(row.consumed_at)
      : wasTerminal
        ? null
        : now;

  return {
    envelopeId: generateId(),
    nonce: row.nonce,
    scopeJson: row.scope_json,
    toolCallsJson: row.tool_calls_json,
    planHash: row.plan_hash,
    keyId: '',
    signedObjectJson: null,
    signatureHex: null,
    state,
    issuedAt: toEpochSeconds(row.issued_at),
    expiresAt: toEpochSeconds(row.expires_at),
    consumedAt,
  };
}

/**
 * Older layouts stored ISO strings or milliseconds; normalize to epoch seconds.
 */
export function toEpochSeconds(value: number | string): number {
  if (typeof value === 'number') {
    return value > 1e12 ? Math.floor(value / 1000) : Math.floor(value);
  }
  if (/^\d+$/.test(value)) {
    return toEpochSeconds(parseInt(value, 10));
  }
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new SchemaMigrationError(`Cannot migrate legacy timestamp: ${value}`);
  }
  return Math.floor(parsed / 1000);
}

function tableExists(sqlite: Database.Database, name: string): boolean {
  const row: unknown = sqlite
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(name);
  return row !== undefined;
}

export function tableColumns(sqlite: Database.Database, table = TABLE): string[] {
  const rows: unknown[] = sqlite.prepare(`PRAGMA table_info(${table})`).all();
  return rows.flatMap((row) =>
    row !== null && typeof row === 'object' && 'name' in row && typeof row.name === 'string'
      ? [row.name]
      : []
  );
}

function schemaIsCurrent(sqlite: Database.Database): boolean {
  const columns = new Set(tableColumns(sqlite));
  return (
    columns.size === EXPECTED_COLUMNS.length && EXPECTED_COLUMNS.every((name) => columns.has(name))
  );
}
