/**
 * Barrel export for all shared types.
 */
export type { KubeConfig, ClusterEntry, ClusterConfig, ClusterFields } from './kubeconfig.js';
export { IDENTITY_PROVIDERS } from './configmap.js';
export type { IdentityProvider, ConfigMapOptions, ConfigMapManifest } from './configmap.js';
export { DEFAULT_CONFIG, OUTPUT_FORMATS } from './config.js';
export type { ExtractConfig, LogLevel, OutputFormat } from './config.js';
