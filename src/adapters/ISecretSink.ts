/**
 * Secret sink abstraction. `apply` creates the target secret when it is absent and
 * otherwise replaces its whole key set, so keys missing from `data` are removed.
 */

export interface ISecretSink {
  /**
   * @throws SinkRejectedError when the cluster refuses the object
   * @throws SinkUnavailableError for any other failure
   */
  apply(namespace: string, secretName: string, data: Record<string, string>): Promise<void>;

  describe(): string;
}
