import { SecretManagerServiceClient } from '@google-cloud/secret-manager';
import { SourceNotFoundError, SourceUnavailableError, errorMessage } from '../core/errors.js';
import type { SecretRef } from '../core/types.js';
import { getLogger } from '../utils/logging.js';
import type { FetchOptions, ISecretSource } from './ISecretSource.js';

// gRPC status code returned by Secret Manager for a missing secret or version
const GRPC_NOT_FOUND = 5;

/** Narrow view of `accessSecretVersion`, so tests can stand in for the gRPC client. */
export type AccessSecretVersion = (
  name: string,
  timeoutMs: number | undefined,
) => Promise<Uint8Array | string | null | undefined>;

export interface GcpSecretSourceOptions {
  /** Service account key file; Application Default Credentials are used when absent. */
  credentialsPath?: string;
  access?: AccessSecretVersion;
}

export function secretVersionName(ref: SecretRef): string {
  return `projects/${ref.projectId}/secrets/${ref.secretName}/versions/${ref.version}`;
}

function grpcCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

function clientAccessor(credentialsPath?: string): AccessSecretVersion {
  const client = new SecretManagerServiceClient(
    credentialsPath ? { keyFilename: credentialsPath } : {},
  );
  return async (name, timeoutMs) => {
    const [version] = await client.accessSecretVersion(
      { name },
      timeoutMs === undefined ? {} : { timeout: timeoutMs },
    );
    return version.payload?.data;
  };
}

export class GcpSecretSource implements ISecretSource {
  private readonly access: AccessSecretVersion;

  constructor(opts: GcpSecretSourceOptions = {}) {
    this.access = opts.access ?? clientAccessor(opts.credentialsPath);
  }

  async fetch(ref: SecretRef, opts: FetchOptions = {}): Promise<Uint8Array> {
    const name = secretVersionName(ref);
    getLogger().debug({ secret: name }, 'fetching secret version');
    let data: Uint8Array | string | null | undefined;
    try {
      data = await this.access(name, opts.timeoutMs);
    } catch (err) {
      if (grpcCode(err) === GRPC_NOT_FOUND) {
        throw new SourceNotFoundError(`secret version ${name} not found`, err);
      }
      throw new SourceUnavailableError(
        `failed to access secret version ${name}: ${errorMessage(err)}`,
        err,
      );
    }
    if (data === null || data === undefined) {
      throw new SourceUnavailableError(`secret version ${name} has no payload`);
    }
    return typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  }

  describe(): string {
    return 'GCP Secret Manager client initialized';
  }
}
