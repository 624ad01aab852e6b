#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig, redactConfig } from '../config/index.js';
import { createEngine, initClients, startService } from '../app.js';
import { HealthTracker } from '../services/healthTracker.js';
import { normalizeKey } from '../sync/normalizer.js';
import { configureLogger, getLogger } from '../utils/logging.js';
import { errorMessage } from '../core/errors.js';

const program = new Command();

program
  .name('secret-sync')
  .description('Sync a GCP Secret Manager secret into a Kubernetes Secret')
  .version('0.1.0')
  .option('-c, --config <path>', 'JSON config file merged over environment settings');

function configPath(): string | undefined {
  const opts = program.opts<{ config?: string }>();
  return opts.config;
}

program
  .command('serve')
  .description('Run the HTTP API and the periodic sync loop')
  .action(async () => {
    const cfg = loadConfig(configPath());
    configureLogger(cfg.logging);
    const service = await startService(cfg);
    const shutdown = () => {
      service
        .stop()
        .then(() => process.exit(0))
        .catch((err) => {
          getLogger().error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    };
    process.once('SIGTERM', shutdown);
    process.once('SIGINT', shutdown);
  });

program
  .command('sync')
  .description('Run a single sync cycle and print its result')
  .action(async () => {
    const cfg = loadConfig(configPath());
    configureLogger(cfg.logging);
    const health = new HealthTracker();
    const engine = createEngine(cfg, health, initClients(cfg, health));
    const result = await engine.runOnce('cli');
    console.log(JSON.stringify(result, null, 2));
    if (result.outcome === 'failure') process.exitCode = 1;
  });

program
  .command('normalize')
  .argument('<keys...>', 'Secret keys to normalize')
  .description('Show how keys would be renamed for Kubernetes')
  .action((keys: string[]) => {
    for (const key of keys) {
      const normalized = normalizeKey(key);
      console.log(normalized === key ? `${key} (unchanged)` : `${key} -> ${normalized}`);
    }
  });

program
  .command('trigger')
  .description('Ask a running service to sync now via POST /api/sync')
  .option('-u, --url <url>', 'Base URL of the service', process.env.API_BASE || 'http://localhost:8000')
  .option('-t, --token <token>', 'API token (defaults to API_TOKEN)', process.env.API_TOKEN)
  .action(async (opts: { url: string; token?: string }) => {
    const url = new URL('/api/sync', opts.url);
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: opts.token ? { authorization: `Bearer ${opts.token}` } : {},
      });
    } catch (err) {
      console.error(`Request to ${url.toString()} failed: ${errorMessage(err)}`);
      process.exitCode = 1;
      return;
    }
    const body: unknown = await res.json().catch(() => null);
    console.log(JSON.stringify(body, null, 2));
    const succeeded =
      res.ok &&
      typeof body === 'object' &&
      body !== null &&
      'status' in body &&
      body.status === 'success';
    if (!succeeded) process.exitCode = 1;
  });

program
  .command('config')
  .description('Print the effective configuration (token redacted)')
  .action(() => {
    const cfg = loadConfig(configPath());
    console.log(JSON.stringify(redactConfig(cfg), null, 2));
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(errorMessage(err));
  process.exit(1);
});
