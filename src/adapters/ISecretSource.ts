/**
 * Secret source abstraction. Implementations talk to an external secret manager
 * and return the raw payload bytes of one secret version; they never cache.
 */

import type { SecretRef } from '../core/types.js';

export interface FetchOptions {
  /** Upper bound the implementation should pass on to its transport, in milliseconds. */
  timeoutMs?: number;
}

export interface ISecretSource {
  /**
   * @throws SourceNotFoundError when the secret or version does not exist
   * @throws SourceUnavailableError for any other failure
   */
  fetch(ref: SecretRef, opts?: FetchOptions): Promise<Uint8Array>;

  /** One-line description used as the readiness detail on the health endpoint. */
  describe(): string;
}
