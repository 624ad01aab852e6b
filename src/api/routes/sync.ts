import type { FastifyInstance } from 'fastify';
import type { SyncRunner } from '../../services/syncEngine.js';
import { requireApiToken } from '../auth.js';

export interface SyncRouteDeps {
  engine: SyncRunner;
  apiToken?: string;
}

export async function syncRoutes(app: FastifyInstance, deps: SyncRouteDeps) {
  // A failed cycle is still a 200: the trigger itself worked, the body carries the outcome
  app.post('/api/sync', { preHandler: requireApiToken(deps.apiToken) }, async (req) => {
    req.log.info('manual sync triggered via API');
    const result = await deps.engine.runOnce('api');
    if (result.outcome === 'success') {
      return {
        status: 'success',
        message: 'Secrets synced successfully',
        timestamp: result.timestamp,
      };
    }
    return {
      status: 'failure',
      message: `Sync failed: ${result.error?.message ?? 'unknown error'}`,
      code: result.error?.code,
      timestamp: result.timestamp,
    };
  });
}
