import { loadConfig, type AppConfig } from './config/index.js';
import { errorMessage } from './core/errors.js';
import {
  GcpSecretSource,
  KubernetesSecretSink,
  type ISecretSink,
  type ISecretSource,
} from './adapters/index.js';
import { HealthTracker } from './services/healthTracker.js';
import { SyncEngine } from './services/syncEngine.js';
import { SyncScheduler } from './services/scheduler.js';
import { buildServer } from './api/server.js';
import { getLogger } from './utils/logging.js';

export type AppServer = Awaited<ReturnType<typeof buildServer>>;

export interface ServiceDeps {
  source?: ISecretSource;
  sink?: ISecretSink;
}

export interface Service {
  config: AppConfig;
  health: HealthTracker;
  engine: SyncEngine;
  scheduler: SyncScheduler;
  server: AppServer;
  stop(): Promise<void>;
}

/** Constructs both clients and marks them ready; a client that cannot be built aborts start-up. */
export function initClients(
  cfg: AppConfig,
  health: HealthTracker,
  deps: ServiceDeps = {},
): { source: ISecretSource; sink: ISecretSink } {
  const log = getLogger();
  let source: ISecretSource;
  try {
    source = deps.source ?? new GcpSecretSource({ credentialsPath: cfg.source.credentialsPath });
  } catch (err) {
    health.setSourceHealth({ ready: false, detail: errorMessage(err) });
    throw new Error(`GCP client initialization failed: ${errorMessage(err)}`, { cause: err });
  }
  health.setSourceHealth({ ready: true, detail: source.describe() });
  log.info('GCP Secret Manager client initialized');

  let sink: ISecretSink;
  try {
    sink = deps.sink ?? new KubernetesSecretSink(undefined, cfg.target.namespace);
  } catch (err) {
    health.setSinkHealth({ ready: false, detail: errorMessage(err) });
    throw new Error(`Kubernetes client initialization failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  health.setSinkHealth({ ready: true, detail: sink.describe() });
  log.info({ namespace: cfg.target.namespace }, 'Kubernetes client initialized');

  return { source, sink };
}

export function createEngine(
  cfg: AppConfig,
  health: HealthTracker,
  clients: { source: ISecretSource; sink: ISecretSink },
): SyncEngine {
  return new SyncEngine({
    ...clients,
    health,
    sourceRef: {
      projectId: cfg.source.projectId,
      secretName: cfg.source.secretName,
      version: cfg.source.version,
    },
    target: cfg.target,
    stepTimeoutMs: cfg.sync.stepTimeoutSeconds * 1000,
    concurrency: cfg.sync.concurrency,
  });
}

/** Wires the service without listening or starting the scheduler. */
export async function buildService(cfg: AppConfig = loadConfig(), deps: ServiceDeps = {}) {
  const health = new HealthTracker();
  const engine = createEngine(cfg, health, initClients(cfg, health, deps));
  const scheduler = new SyncScheduler(engine, {
    intervalMs: cfg.sync.intervalSeconds * 1000,
    retryBackoffMs: cfg.sync.retryBackoffSeconds * 1000,
  });
  const server = await buildServer({ engine, health, scheduler, apiToken: cfg.api.token });
  return { config: cfg, health, engine, scheduler, server };
}

export async function startService(
  cfg: AppConfig = loadConfig(),
  deps: ServiceDeps = {},
): Promise<Service> {
  const built = await buildService(cfg, deps);
  await built.server.listen({ port: cfg.api.port, host: cfg.api.host });
  built.scheduler.start();
  getLogger().info(
    { port: cfg.api.port, intervalSeconds: cfg.sync.intervalSeconds },
    'secret-sync started',
  );
  return {
    ...built,
    async stop() {
      built.scheduler.stop();
      await built.server.close();
    },
  };
}
