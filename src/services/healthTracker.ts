import type { ClientHealth, HealthSnapshot, SyncResult } from '../core/types.js';

const NOT_INITIALIZED: ClientHealth = { ready: false, detail: 'not yet initialized' };

function copySyncResult(result: SyncResult): SyncResult {
  return { ...result, error: result.error ? { ...result.error } : undefined };
}

/**
 * Process-wide readiness and last-sync state, owned by the app and injected into the
 * engine and the HTTP layer. Every mutation is a synchronous overwrite, which the
 * single-threaded event loop serializes; nothing is kept beyond the latest values.
 */
export class HealthTracker {
  private source: ClientHealth = NOT_INITIALIZED;
  private sink: ClientHealth = NOT_INITIALIZED;
  private lastSync: SyncResult | null = null;

  setSourceHealth(health: ClientHealth): void {
    this.source = { ...health };
  }

  setSinkHealth(health: ClientHealth): void {
    this.sink = { ...health };
  }

  recordSync(result: SyncResult): void {
    this.lastSync = copySyncResult(result);
  }

  report(): HealthSnapshot {
    return {
      source: { ...this.source },
      sink: { ...this.sink },
      lastSync: this.lastSync ? copySyncResult(this.lastSync) : null,
    };
  }

  /** Healthy when both adapters are ready and the last cycle, if any, succeeded. */
  isHealthy(): boolean {
    return this.source.ready && this.sink.ready && this.lastSync?.outcome !== 'failure';
  }
}
