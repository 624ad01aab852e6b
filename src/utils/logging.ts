import pino, { type DestinationStream } from 'pino';
import { Writable } from 'stream';
import { loadLoggingConfig, type LoggingConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

function collectInto(logs: string[]): DestinationStream {
  return new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const cfg = loadLoggingConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      const logs: string[] = [];
      (globalThis as unknown as { __LOG_COLLECTOR__?: string[] }).__LOG_COLLECTOR__ = logs;
      loggerInstance = pino({ level: cfg.level }, collectInto(logs));
    } else {
      loggerInstance = pino({
        level: cfg.level,
        transport: cfg.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

/** Rebuilds the singleton from an explicit config, used once the full app config is loaded. */
export function configureLogger(cfg: LoggingConfig): pino.Logger {
  loggerInstance = pino({
    level: cfg.level,
    transport: cfg.json ? undefined : { target: 'pino-pretty' },
  });
  return loggerInstance;
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level: LoggingConfig['level'] = 'debug') {
  const logs: string[] = [];
  (globalThis as unknown as { __LOG_COLLECTOR__?: string[] }).__LOG_COLLECTOR__ = logs;
  loggerInstance = pino({ level }, collectInto(logs));
  return logs;
}
