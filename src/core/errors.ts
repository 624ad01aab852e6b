export type SyncErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'SOURCE_NOT_FOUND'
  | 'PARSE_ERROR'
  | 'SINK_UNAVAILABLE'
  | 'SINK_REJECTED'
  | 'AUTH_REJECTED'
  | 'ALREADY_IN_PROGRESS';

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Transient source failure: network, auth, timeout or an empty payload. */
export class SourceUnavailableError extends SyncError {
  readonly code = 'SOURCE_UNAVAILABLE';
}

export class SourceNotFoundError extends SyncError {
  readonly code = 'SOURCE_NOT_FOUND';
}

export class ParseError extends SyncError {
  readonly code = 'PARSE_ERROR';
}

export class SinkUnavailableError extends SyncError {
  readonly code = 'SINK_UNAVAILABLE';
}

/** The cluster refused the object (validation); retrying unchanged data will not help. */
export class SinkRejectedError extends SyncError {
  readonly code = 'SINK_REJECTED';
}

export class AuthRejectedError extends SyncError {
  readonly code = 'AUTH_REJECTED';
}

export class AlreadyInProgressError extends SyncError {
  readonly code = 'ALREADY_IN_PROGRESS';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
