import { cosmiconfig } from 'cosmiconfig';
import {
    DEFAULT_CONFIG,
    IDENTITY_PROVIDERS,
    OUTPUT_FORMATS,
    type ExtractConfig,
    type IdentityProvider,
    type LogLevel,
    type OutputFormat,
} from '../types/index.js';
import { firstKubeconfigPath } from '../input/read-input.js';
import { getLogger } from './logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
    return OUTPUT_FORMATS.some((format) => format === value);
}

export function isIdentityProvider(value: unknown): value is IdentityProvider {
    return IDENTITY_PROVIDERS.some((provider) => provider === value);
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Keep the recognized, well-typed keys of a config file; drop the rest.
 */
function sanitizeFileConfig(raw: unknown): Partial<ExtractConfig> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        getLogger().warn('Config file is not a JSON object, ignoring it');
        return {};
    }

    const entries = new Map(Object.entries(raw));
    const config: Partial<ExtractConfig> = {};

    const format = entries.get('format');
    if (isOutputFormat(format)) config.format = format;

    const logLevel = entries.get('logLevel');
    if (isLogLevel(logLevel)) config.logLevel = logLevel;

    const provider = entries.get('provider');
    if (isIdentityProvider(provider)) config.provider = provider;

    const jsonLogs = entries.get('jsonLogs');
    if (typeof jsonLogs === 'boolean') config.jsonLogs = jsonLogs;

    const name = optionalString(entries.get('name'));
    if (name) config.name = name;

    const namespace = optionalString(entries.get('namespace'));
    if (namespace) config.namespace = namespace;

    const cluster = optionalString(entries.get('cluster'));
    if (cluster) config.cluster = cluster;

    return config;
}

/**
 * Load configuration from kubeconfig-extract.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<ExtractConfig> | null> {
    const explorer = cosmiconfig('kubeconfig-extract', {
        searchPlaces: ['kubeconfig-extract.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return sanitizeFileConfig(result.config);
        }
    } catch (error) {
        getLogger().warn({ err: error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Log level requested through `KUBECONFIG_EXTRACT_LOG_LEVEL`, if valid.
 */
export function envLogLevel(env: NodeJS.ProcessEnv): LogLevel | undefined {
    const logLevel = env['KUBECONFIG_EXTRACT_LOG_LEVEL'];
    return isLogLevel(logLevel) ? logLevel : undefined;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): Partial<ExtractConfig> {
    const config: Partial<ExtractConfig> = {};

    const kubeconfig = firstKubeconfigPath(env['KUBECONFIG']);
    if (kubeconfig) config.kubeconfig = kubeconfig;

    const logLevel = envLogLevel(env);
    if (logLevel) config.logLevel = logLevel;

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<ExtractConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ExtractConfig> {
    const fileConfig = (await loadConfigFile(options.searchFrom)) ?? {};
    const envConfig = loadEnvVars(options.env ?? process.env);

    // Field by field so that an undefined CLI flag falls through to lower layers
    return {
        kubeconfig: cliFlags.kubeconfig ?? envConfig.kubeconfig,
        format: cliFlags.format ?? fileConfig.format ?? DEFAULT_CONFIG.format,
        out: cliFlags.out,
        name: cliFlags.name ?? fileConfig.name ?? DEFAULT_CONFIG.name,
        namespace: cliFlags.namespace ?? fileConfig.namespace,
        provider: cliFlags.provider ?? fileConfig.provider,
        cluster: cliFlags.cluster ?? fileConfig.cluster,
        logLevel: cliFlags.logLevel ?? envConfig.logLevel ?? fileConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? fileConfig.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
    };
}
