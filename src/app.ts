import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { registerApprovalRoutes } from './approvals/routes.js';
import type { ApprovalStore } from './approvals/store.js';
import { checkDbHealth } from './db/client.js';
import type { ApprovalKeyManager } from './keys/manager.js';
import type { ToolPolicyRegistry } from './policy/toolPolicy.js';

export interface ServerDeps {
  store: ApprovalStore;
  keyManager: ApprovalKeyManager;
  toolPolicy: ToolPolicyRegistry;
  version: string;
  now?: () => number;
}

export interface BuildServerOptions {
  logLevel?: string;
  logger?: boolean;
}

/**
 * Build the approval HTTP server without listening, so tests can use inject().
 */
export async function buildServer(
  deps: ServerDeps,
  options: BuildServerOptions = {}
): Promise<FastifyInstance> {
  const startTime = Date.now();

  const app = Fastify({
    logger: options.logger === false ? false : { level: options.logLevel ?? 'info' },
  });

  await app.register(cors, {
    origin: true,
  });

  // Health check endpoint
  app.get('/health', async () => {
    const dbHealth = checkDbHealth(deps.store.database);
    return {
      version: deps.version,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      keyId: deps.keyManager.isUnlocked() ? deps.keyManager.currentKeyId() : null,
      pendingApprovals: deps.store.countPending(),
      toolPolicyHash: deps.toolPolicy.hash,
      database: {
        healthy: dbHealth.ok,
        latencyMs: dbHealth.latencyMs,
      },
    };
  });

  registerApprovalRoutes(app, { store: deps.store, keyManager: deps.keyManager, now: deps.now });

  return app;
}
