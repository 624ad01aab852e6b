import { loadConfig } from './config/index.js';
import { startService } from './app.js';
import { configureLogger, getLogger } from './utils/logging.js';

async function main() {
  const cfg = loadConfig();
  configureLogger(cfg.logging);
  const service = await startService(cfg);

  const shutdown = (signal: NodeJS.Signals) => {
    getLogger().info({ signal }, 'Shutting down');
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
}

main().catch((err) => {
  getLogger().fatal({ err }, 'Start-up failed');
  process.exit(1);
});
