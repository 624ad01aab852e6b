import {
  AlreadyInProgressError,
  ParseError,
  SinkUnavailableError,
  SourceUnavailableError,
  SyncError,
  errorMessage,
} from '../core/errors.js';
import type {
  SecretRef,
  SecretTarget,
  SyncResult,
  SyncTrigger,
} from '../core/types.js';
import type { ISecretSource } from '../adapters/ISecretSource.js';
import type { ISecretSink } from '../adapters/ISecretSink.js';
import { parseSecretPayload } from '../sync/payload.js';
import { normalizePayload } from '../sync/normalizer.js';
import { withTimeout } from '../utils/timeout.js';
import { getLogger } from '../utils/logging.js';
import { HealthTracker } from './healthTracker.js';
import {
  keyCollisionsTotal,
  keysNormalizedTotal,
  lastSuccessTimestampSeconds,
  syncDurationSeconds,
  syncFailuresTotal,
  syncRunsTotal,
} from '../metrics/index.js';

/**
 * What a call does when a cycle is already running: `join` shares the in-flight
 * cycle's result, `reject` fails fast with ALREADY_IN_PROGRESS.
 */
export type ConcurrencyPolicy = 'join' | 'reject';

export interface SyncEngineOptions {
  source: ISecretSource;
  sink: ISecretSink;
  health: HealthTracker;
  sourceRef: SecretRef;
  target: SecretTarget;
  stepTimeoutMs: number;
  concurrency?: ConcurrencyPolicy;
}

/** Anything that can run one sync cycle; the scheduler and HTTP layer depend on this only. */
export interface SyncRunner {
  runOnce(trigger: SyncTrigger): Promise<SyncResult>;
}

export class SyncEngine implements SyncRunner {
  private inFlight: Promise<SyncResult> | null = null;
  private readonly concurrency: ConcurrencyPolicy;

  constructor(private readonly opts: SyncEngineOptions) {
    this.concurrency = opts.concurrency ?? 'join';
  }

  /**
   * Runs fetch, parse, normalize and apply once. Never rejects: every failure is
   * returned as a failure result and recorded on the health tracker. At most one
   * cycle executes at a time.
   */
  runOnce(trigger: SyncTrigger): Promise<SyncResult> {
    if (this.inFlight) {
      if (this.concurrency === 'join') {
        getLogger().debug({ trigger }, 'sync in progress, joining');
        return this.inFlight;
      }
      return Promise.resolve(this.alreadyInProgress(trigger));
    }
    // Check and assignment happen in the same synchronous turn, so no caller can slip between them
    const cycle = this.execute(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async execute(trigger: SyncTrigger): Promise<SyncResult> {
    const { source, sink, health, sourceRef, target, stepTimeoutMs } = this.opts;
    const log = getLogger();
    const start = process.hrtime.bigint();
    let result: SyncResult;

    log.info({ trigger, secret: sourceRef.secretName, target }, 'sync started');
    try {
      const raw = await this.step(
        () => source.fetch(sourceRef, { timeoutMs: stepTimeoutMs }),
        (msg, cause) => new SourceUnavailableError(msg, cause),
        'fetch',
      );
      health.setSourceHealth({ ready: true, detail: source.describe() });

      const payload = parseSecretPayload(raw);
      const normalized = normalizePayload(payload, log);
      keysNormalizedTotal.inc(normalized.renamed.length);
      keyCollisionsTotal.inc(normalized.collisions.length);

      await this.step(
        () => sink.apply(target.namespace, target.secretName, normalized.data),
        (msg, cause) => new SinkUnavailableError(msg, cause),
        'apply',
      );
      health.setSinkHealth({ ready: true, detail: sink.describe() });

      result = {
        outcome: 'success',
        trigger,
        timestamp: new Date().toISOString(),
        durationMs: elapsedMs(start),
        keyCount: Object.keys(normalized.data).length,
      };
      lastSuccessTimestampSeconds.set(Date.now() / 1000);
      log.info(
        { trigger, keyCount: result.keyCount, durationMs: result.durationMs },
        'sync completed',
      );
    } catch (err) {
      const failure = toSyncError(err);
      this.recordAdapterFailure(failure);
      result = {
        outcome: 'failure',
        trigger,
        timestamp: new Date().toISOString(),
        durationMs: elapsedMs(start),
        error: { code: failure.code, message: failure.message },
      };
      syncFailuresTotal.inc({ code: failure.code });
      log.error({ trigger, code: failure.code, err: failure }, 'sync failed');
    }

    health.recordSync(result);
    syncRunsTotal.inc({ trigger, outcome: result.outcome });
    syncDurationSeconds.observe(result.durationMs / 1000);
    return result;
  }

  // Bounds one adapter call and wraps anything that is not already a SyncError,
  // including a synchronous throw from the adapter
  private async step<T>(
    call: () => Promise<T>,
    wrap: (message: string, cause?: unknown) => SyncError,
    name: string,
  ): Promise<T> {
    const ms = this.opts.stepTimeoutMs;
    try {
      return await withTimeout(call(), ms, () => wrap(`${name} timed out after ${ms}ms`));
    } catch (err) {
      if (err instanceof SyncError) throw err;
      throw wrap(`${name} failed: ${errorMessage(err)}`, err);
    }
  }

  private recordAdapterFailure(err: SyncError) {
    const { health } = this.opts;
    switch (err.code) {
      case 'SOURCE_UNAVAILABLE':
      case 'SOURCE_NOT_FOUND':
        health.setSourceHealth({ ready: false, detail: err.message });
        break;
      case 'SINK_UNAVAILABLE':
      case 'SINK_REJECTED':
        health.setSinkHealth({ ready: false, detail: err.message });
        break;
      default:
        break;
    }
  }

  private alreadyInProgress(trigger: SyncTrigger): SyncResult {
    const err = new AlreadyInProgressError('sync already in progress');
    getLogger().info({ trigger }, err.message);
    return {
      outcome: 'failure',
      trigger,
      timestamp: new Date().toISOString(),
      durationMs: 0,
      error: { code: err.code, message: err.message },
    };
  }
}

function toSyncError(err: unknown): SyncError {
  if (err instanceof SyncError) return err;
  // Only parsing and normalization run outside step()
  return new ParseError(`unexpected error while decoding payload: ${errorMessage(err)}`, err);
}

function elapsedMs(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1e6;
}
