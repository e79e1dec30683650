import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ApprovalVerificationError } from '../approvals/errors.js';
import { ConfigError } from '../config.js';
import { computeHash } from '../utils.js';
import type { DeferredToolCall } from '../types.js';

export type ToolClassification = 'read_only' | 'side_effecting';

// Filesystem and process inspection tools that never change state
export const DEFAULT_READ_ONLY_TOOLS = [
  'ls',
  'ls_info',
  'read',
  'read_file',
  'glob',
  'glob_info',
  'grep',
  'grep_raw',
  'process_list',
  'process_poll',
  'process_log',
] as const;

const ToolPolicyFileSchema = z.object({
  extends_defaults: z.boolean().default(true),
  read_only: z.array(z.string().min(1)).default([]),
  side_effecting: z.array(z.string().min(1)).default([]),
});

/**
 * Tool classification used to gate deferred approval.
 *
 * Read-only tools run without approval, so a deferred call naming one means the
 * agent layer is misconfigured and the whole batch is refused. Tools the
 * registry does not know are side-effecting.
 */
export class ToolPolicyRegistry {
  private readonly classifications: ReadonlyMap<string, ToolClassification>;
  readonly hash: string | null;

  constructor(classifications: Iterable<[string, ToolClassification]>, hash: string | null = null) {
    this.classifications = new Map(classifications);
    this.hash = hash;
  }

  static default(): ToolPolicyRegistry {
    return new ToolPolicyRegistry(DEFAULT_READ_ONLY_TOOLS.map((name) => [name, 'read_only']));
  }

  classify(toolName: string): ToolClassification {
    return this.classifications.get(toolName) ?? 'side_effecting';
  }

  isReadOnly(toolName: string): boolean {
    return this.classify(toolName) === 'read_only';
  }

  validateDeferredCalls(toolCalls: readonly DeferredToolCall[]): void {
    for (const call of toolCalls) {
      if (this.isReadOnly(call.tool_name)) {
        throw new ApprovalVerificationError(
          'tool_policy_violation',
          `Read-only tool '${call.tool_name}' must not require deferred approval.`
        );
      }
    }
  }

  readOnlyTools(): string[] {
    return [...this.classifications.entries()]
      .filter(([, classification]) => classification === 'read_only')
      .map(([name]) => name)
      .sort();
  }
}

/**
 * Load a tool policy YAML file:
 *
 *   extends_defaults: true   # start from the built-in read-only set
 *   read_only: [search_docs]
 *   side_effecting: [grep]   # force approval for a default read-only tool
 */
export function loadToolPolicy(policyPath: string): ToolPolicyRegistry {
  let content: string;
  try {
    content = readFileSync(policyPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read tool policy file ${policyPath}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content) ?? {};
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid tool policy file ${policyPath}: ${message}`);
  }

  const parsed = ToolPolicyFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new ConfigError(
      `Invalid tool policy file ${policyPath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid shape'}`
    );
  }

  const { extends_defaults, read_only, side_effecting } = parsed.data;
  const overlap = read_only.filter((name) => side_effecting.includes(name));
  if (overlap.length > 0) {
    throw new ConfigError(`Tool policy lists ${overlap.join(', ')} as both read_only and side_effecting.`);
  }

  const classifications = new Map<string, ToolClassification>();
  if (extends_defaults) {
    for (const name of DEFAULT_READ_ONLY_TOOLS) {
      classifications.set(name, 'read_only');
    }
  }
  for (const name of read_only) {
    classifications.set(name, 'read_only');
  }
  for (const name of side_effecting) {
    classifications.set(name, 'side_effecting');
  }

  return new ToolPolicyRegistry(classifications, 'sha256:' + computeHash(content));
}
