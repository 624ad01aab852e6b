import type { FastifyInstance } from 'fastify';
import type { HealthTracker } from '../../services/healthTracker.js';
import type { SyncScheduler } from '../../services/scheduler.js';

export interface HealthRouteDeps {
  health: HealthTracker;
  scheduler?: SyncScheduler;
}

export async function healthRoutes(app: FastifyInstance, deps: HealthRouteDeps) {
  app.get('/', async () => ({
    service: 'secret-sync',
    status: 'running',
    endpoints: { health: '/api/health', sync: '/api/sync', metrics: '/metrics' },
  }));

  // Reports last known state only; no calls to the backing stores
  app.get('/api/health', async () => {
    const snapshot = deps.health.report();
    return {
      status: deps.health.isHealthy() ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      checks: {
        gcp: snapshot.source,
        kubernetes: snapshot.sink,
      },
      lastSync: snapshot.lastSync,
      scheduler: deps.scheduler?.info() ?? null,
    };
  });
}
