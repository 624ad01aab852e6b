// Domain model shared by the sync pipeline, the scheduler and the HTTP surface

import type { SyncErrorCode } from './errors.js';

/** Decoded source payload, in source iteration order. */
export type SecretPayload = Map<string, string>;

export interface KeyRename {
  from: string;
  to: string;
}

export interface KeyCollision {
  key: string;
  kept: string;
  dropped: string;
}

export interface NormalizedPayload {
  data: Record<string, string>;
  renamed: KeyRename[];
  collisions: KeyCollision[];
}

export interface SecretRef {
  projectId: string;
  secretName: string;
  version: string;
}

export interface SecretTarget {
  namespace: string;
  secretName: string;
}

export type SyncTrigger = 'schedule' | 'api' | 'cli';
export type SyncOutcome = 'success' | 'failure';

export interface SyncResult {
  outcome: SyncOutcome;
  trigger: SyncTrigger;
  timestamp: string; // ISO-8601, cycle completion
  durationMs: number;
  keyCount?: number;
  error?: { code: SyncErrorCode; message: string };
}

export interface ClientHealth {
  ready: boolean;
  detail: string;
}

export interface HealthSnapshot {
  source: ClientHealth;
  sink: ClientHealth;
  lastSync: SyncResult | null;
}
