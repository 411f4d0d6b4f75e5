import type { IdentityProvider } from './configmap.js';

/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Output formats for extracted fields.
 */
export type OutputFormat = 'json' | 'yaml' | 'configmap';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml', 'configmap'];

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ExtractConfig {
    // Input
    kubeconfig?: string;

    // Output
    format: OutputFormat;
    out?: string;

    // ConfigMap
    name: string;
    namespace?: string;
    provider?: IdentityProvider;
    cluster?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ExtractConfig = {
    format: 'json',
    name: 'cluster-kubeconfig',
    logLevel: 'info',
    jsonLogs: false,
};
