import { Command } from 'commander';
import { runExtract, type ExtractIo } from './run-extract.js';
import { envLogLevel, isIdentityProvider, isLogLevel, isOutputFormat, resolveConfig } from '../utils/config.js';
import { initLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { DEFAULT_CONFIG, OUTPUT_FORMATS, IDENTITY_PROVIDERS, type ExtractConfig } from '../types/index.js';

const VERSION = '0.1.0';

/**
 * Where the program looks for its environment, config file and streams.
 * Defaults to the running process.
 */
export interface ProgramOptions {
    env?: NodeJS.ProcessEnv;
    searchFrom?: string;
    io?: ExtractIo;
}

export function createProgram(options: ProgramOptions = {}): Command {
    const env = options.env ?? process.env;
    const program = new Command();

    program
        .name('kubeconfig-extract')
        .description('Extract the API server address and CA certificate from a kubeconfig for workload identity access.')
        .version(VERSION);

    // ─── EXTRACT command ──────────────────────────────────────

    program
        .command('extract')
        .description('Extract server and CA certificate from the first cluster of a kubeconfig')
        .option('-k, --kubeconfig <path>', 'Kubeconfig file (default: $KUBECONFIG, then stdin)')
        .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(' | ')}`)
        .option('--name <name>', 'ConfigMap name')
        .option('-n, --namespace <namespace>', 'ConfigMap namespace')
        .option('--provider <provider>', `Workload identity provider: ${IDENTITY_PROVIDERS.join(' | ')}`)
        .option('--cluster <id>', 'Cloud provider cluster resource identifier')
        .option('-o, --out <path>', 'Output file path (default: stdout)')
        .option('--log-level <level>', 'Log level: silent | debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs')
        .action(async (opts: Record<string, string | boolean | undefined>) => {
            const format = opts['format'];
            if (format !== undefined && !isOutputFormat(format)) {
                console.error(`Invalid format: ${String(format)}. Valid: ${OUTPUT_FORMATS.join(', ')}`);
                process.exitCode = 1;
                return;
            }

            const provider = opts['provider'];
            if (provider !== undefined && !isIdentityProvider(provider)) {
                console.error(`Invalid provider: ${String(provider)}. Valid: ${IDENTITY_PROVIDERS.join(', ')}`);
                process.exitCode = 1;
                return;
            }

            const logLevel = opts['logLevel'];
            if (logLevel !== undefined && !isLogLevel(logLevel)) {
                console.error(`Invalid log level: ${String(logLevel)}`);
                process.exitCode = 1;
                return;
            }

            const cliConfig: Partial<ExtractConfig> = {
                kubeconfig: stringOption(opts['kubeconfig']),
                format,
                name: stringOption(opts['name']),
                namespace: stringOption(opts['namespace']),
                provider,
                cluster: stringOption(opts['cluster']),
                out: stringOption(opts['out']),
                logLevel,
                jsonLogs: opts['jsonLogs'] === true ? true : undefined,
            };

            // Logger first, from flags and env, so config file diagnostics honor them
            const jsonLogs = cliConfig.jsonLogs ?? DEFAULT_CONFIG.jsonLogs;
            let logger = initLogger({
                level: logLevel ?? envLogLevel(env) ?? DEFAULT_CONFIG.logLevel,
                jsonLogs,
            });

            const config = await resolveConfig(cliConfig, { searchFrom: options.searchFrom, env });
            if (config.jsonLogs !== jsonLogs) {
                logger = initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
            } else {
                logger.level = config.logLevel;
            }

            logger.debug({ kubeconfig: config.kubeconfig ?? 'stdin', format: config.format }, 'Starting extract');

            try {
                await runExtract(config, options.io);
            } catch (error) {
                logger.error({ err: error }, `Extract failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });

    return program;
}

function stringOption(value: string | boolean | undefined): string | undefined {
    return typeof value === 'string' ? value : undefined;
}
