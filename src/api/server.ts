import Fastify from 'fastify';
import { getLogger } from '../utils/logging.js';
import { AuthRejectedError } from '../core/errors.js';
import { registry } from '../metrics/index.js';
import type { HealthTracker } from '../services/healthTracker.js';
import type { SyncScheduler } from '../services/scheduler.js';
import type { SyncRunner } from '../services/syncEngine.js';
import { healthRoutes } from './routes/health.js';
import { syncRoutes } from './routes/sync.js';

export interface ServerDeps {
  engine: SyncRunner;
  health: HealthTracker;
  scheduler?: SyncScheduler;
  apiToken?: string;
}

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({ logger: getLogger() });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  // Unified error handler (fallback); set before routes so encapsulated plugins inherit it
  app.setErrorHandler((error, _req, reply) => {
    if (error instanceof AuthRejectedError) {
      return reply.status(401).send({ error: { code: error.code, message: error.message } });
    }
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  await app.register(healthRoutes, { health: deps.health, scheduler: deps.scheduler });
  await app.register(syncRoutes, { engine: deps.engine, apiToken: deps.apiToken });

  return app;
}
