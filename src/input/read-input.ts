import { readFile } from 'node:fs/promises';
import { delimiter } from 'node:path';
import { KubeconfigError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';


/**
 * First path of a `KUBECONFIG`-style path list, if any.
 */
export function firstKubeconfigPath(value: string | undefined): string | undefined {
    if (!value) return undefined;
    return value.split(delimiter).find((p) => p.trim() !== '');
}

/**
 * Read kubeconfig YAML from a file, or from `stdin` when no path is given.
 */
export async function readKubeconfig(
    path?: string,
    stdin: AsyncIterable<string | Buffer> = process.stdin
): Promise<string> {
    if (path) {
        try {
            const content = await readFile(path, 'utf-8');
            getLogger().debug({ path, bytes: content.length }, 'Read kubeconfig file');
            return content;
        } catch (error) {
            throw new KubeconfigError(`failed to read kubeconfig ${path}: ${errorMessage(error)}`, 'INPUT', { cause: error });
        }
    }

    const chunks: Buffer[] = [];
    try {
        for await (const chunk of stdin) {
            chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
        }
    } catch (error) {
        throw new KubeconfigError(`failed to read kubeconfig from stdin: ${errorMessage(error)}`, 'INPUT', { cause: error });
    }
    getLogger().debug('Read kubeconfig from stdin');
    return Buffer.concat(chunks).toString('utf-8');
}
