import type { SyncResult } from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';
import { schedulerNextDelaySeconds } from '../metrics/index.js';
import type { SyncRunner } from './syncEngine.js';

export interface SchedulerOptions {
  intervalMs: number;
  /** Delay after a failed cycle; capped at intervalMs. */
  retryBackoffMs: number;
}

export interface SchedulerInfo {
  running: boolean;
  lastTickAt: string | null;
  nextRunAt: string | null;
  nextDelayMs: number | null;
}

/**
 * Periodic driver for the sync engine. The first cycle starts immediately; later
 * cycles follow `intervalMs` after a success and the shorter backoff after a failure.
 * Each cycle is scheduled only after the previous one settles, so ticks never pile up;
 * concurrent on-demand syncs are coordinated by the engine, not here.
 */
export class SyncScheduler {
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private lastTickAt: Date | null = null;
  private nextRunAt: Date | null = null;
  private nextDelayMs: number | null = null;

  constructor(
    private readonly runner: SyncRunner,
    private readonly opts: SchedulerOptions,
  ) {}

  start() {
    if (this.running) return;
    this.running = true;
    getLogger().info(
      { intervalMs: this.opts.intervalMs, retryBackoffMs: this.backoffMs() },
      'sync scheduler started',
    );
    void this.tick();
  }

  stop() {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
    this.nextDelayMs = null;
  }

  info(): SchedulerInfo {
    return {
      running: this.running,
      lastTickAt: this.lastTickAt?.toISOString() || null,
      nextRunAt: this.nextRunAt?.toISOString() || null,
      nextDelayMs: this.nextDelayMs,
    };
  }

  private async tick() {
    if (!this.running) return;
    this.timer = null;
    this.lastTickAt = new Date();
    let outcome: SyncResult['outcome'];
    try {
      outcome = (await this.runner.runOnce('schedule')).outcome;
    } catch (err) {
      getLogger().error({ err: errorMessage(err) }, 'scheduled sync threw');
      outcome = 'failure';
    }
    if (!this.running) return;
    const delay = outcome === 'success' ? this.opts.intervalMs : this.backoffMs();
    this.scheduleNext(delay);
  }

  private scheduleNext(delayMs: number) {
    this.nextDelayMs = delayMs;
    this.nextRunAt = new Date(Date.now() + delayMs);
    schedulerNextDelaySeconds.set(delayMs / 1000);
    getLogger().debug({ delayMs }, 'next sync scheduled');
    this.timer = setTimeout(() => void this.tick(), delayMs);
  }

  private backoffMs() {
    return Math.min(this.opts.retryBackoffMs, this.opts.intervalMs);
  }
}
