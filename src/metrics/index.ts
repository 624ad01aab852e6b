import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const syncRunsTotal = new Counter({
  name: 'secret_sync_runs_total',
  help: 'Completed sync cycles',
  labelNames: ['trigger', 'outcome'] as const,
  registers: [registry],
});

export const syncFailuresTotal = new Counter({
  name: 'secret_sync_failures_total',
  help: 'Failed sync cycles by error code',
  labelNames: ['code'] as const,
  registers: [registry],
});

export const syncDurationSeconds = new Histogram({
  name: 'secret_sync_duration_seconds',
  help: 'Duration of a sync cycle from fetch to apply (seconds)',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

// Unix timestamp (seconds) of the last successful cycle
export const lastSuccessTimestampSeconds = new Gauge({
  name: 'secret_sync_last_success_timestamp_seconds',
  help: 'Unix timestamp (seconds) of the last successful sync',
  registers: [registry],
});

export const keysNormalizedTotal = new Counter({
  name: 'secret_sync_keys_normalized_total',
  help: 'Source keys rewritten by normalization',
  registers: [registry],
});

export const keyCollisionsTotal = new Counter({
  name: 'secret_sync_key_collisions_total',
  help: 'Source keys dropped because another key normalized to the same name',
  registers: [registry],
});

export const schedulerNextDelaySeconds = new Gauge({
  name: 'secret_sync_scheduler_next_delay_seconds',
  help: 'Delay before the next scheduled sync (seconds)',
  registers: [registry],
});
