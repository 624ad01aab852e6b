/**
 * Source and sink adapters. New backends implement ISecretSource / ISecretSink.
 */

export type { ISecretSource, FetchOptions } from './ISecretSource.js';
export type { ISecretSink } from './ISecretSink.js';
export { GcpSecretSource, secretVersionName } from './GcpSecretSource.js';
export type { AccessSecretVersion, GcpSecretSourceOptions } from './GcpSecretSource.js';
export { KubernetesSecretSink, createCoreSecretsApi } from './KubernetesSecretSink.js';
export type { CoreSecretsApi } from './KubernetesSecretSink.js';
