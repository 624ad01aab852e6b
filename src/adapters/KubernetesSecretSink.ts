import * as k8s from '@kubernetes/client-node';
import { SinkRejectedError, SinkUnavailableError, errorMessage } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';
import type { ISecretSink } from './ISecretSink.js';

export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const MANAGED_BY_VALUE = 'secret-sync';

/** The subset of `CoreV1Api` the sink needs; `CoreV1Api` satisfies it structurally. */
export interface CoreSecretsApi {
  readNamespacedSecret(param: { name: string; namespace: string }): Promise<k8s.V1Secret>;
  createNamespacedSecret(param: { namespace: string; body: k8s.V1Secret }): Promise<k8s.V1Secret>;
  replaceNamespacedSecret(param: {
    name: string;
    namespace: string;
    body: k8s.V1Secret;
  }): Promise<k8s.V1Secret>;
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

function classify(err: unknown, action: string): SinkRejectedError | SinkUnavailableError {
  const status = httpStatus(err);
  const detail = status === undefined ? errorMessage(err) : `HTTP ${status}: ${errorMessage(err)}`;
  if (status === 400 || status === 422) {
    return new SinkRejectedError(`kubernetes rejected ${action}: ${detail}`, err);
  }
  return new SinkUnavailableError(`kubernetes ${action} failed: ${detail}`, err);
}

// Object.fromEntries defines own properties, so a "__proto__" key stays a data key
function encode(data: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(data).map(([key, val]) => [key, Buffer.from(val, 'utf-8').toString('base64')]),
  );
}

/** In-cluster service account when running in a pod, otherwise the local kubeconfig. */
export function createCoreSecretsApi(): CoreSecretsApi {
  const kc = new k8s.KubeConfig();
  if (process.env.KUBERNETES_SERVICE_HOST) {
    kc.loadFromCluster();
  } else {
    kc.loadFromDefault();
  }
  return kc.makeApiClient(k8s.CoreV1Api);
}

export class KubernetesSecretSink implements ISecretSink {
  constructor(
    private readonly api: CoreSecretsApi = createCoreSecretsApi(),
    private readonly namespaceHint?: string,
  ) {}

  async apply(namespace: string, secretName: string, data: Record<string, string>): Promise<void> {
    const log = getLogger();
    const existing = await this.read(namespace, secretName);
    const encoded = encode(data);

    if (!existing) {
      const body: k8s.V1Secret = {
        apiVersion: 'v1',
        kind: 'Secret',
        type: 'Opaque',
        metadata: {
          name: secretName,
          namespace,
          labels: { [MANAGED_BY_LABEL]: MANAGED_BY_VALUE },
        },
        data: encoded,
      };
      try {
        await this.api.createNamespacedSecret({ namespace, body });
      } catch (err) {
        throw classify(err, `create of secret ${namespace}/${secretName}`);
      }
      log.info({ namespace, secret: secretName, keys: Object.keys(data) }, 'secret created');
      return;
    }

    // Full replace: existing data and stringData are dropped, so stale keys disappear
    const body: k8s.V1Secret = {
      ...existing,
      metadata: {
        ...existing.metadata,
        name: secretName,
        namespace,
        labels: { ...existing.metadata?.labels, [MANAGED_BY_LABEL]: MANAGED_BY_VALUE },
      },
      data: encoded,
      stringData: undefined,
    };
    try {
      await this.api.replaceNamespacedSecret({ name: secretName, namespace, body });
    } catch (err) {
      throw classify(err, `replace of secret ${namespace}/${secretName}`);
    }
    log.info({ namespace, secret: secretName, keys: Object.keys(data) }, 'secret updated');
  }

  describe(): string {
    return this.namespaceHint
      ? `Kubernetes client initialized (namespace: ${this.namespaceHint})`
      : 'Kubernetes client initialized';
  }

  private async read(namespace: string, secretName: string): Promise<k8s.V1Secret | null> {
    try {
      return await this.api.readNamespacedSecret({ name: secretName, namespace });
    } catch (err) {
      if (httpStatus(err) === 404) return null;
      throw classify(err, `read of secret ${namespace}/${secretName}`);
    }
  }
}
