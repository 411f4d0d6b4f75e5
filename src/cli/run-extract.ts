import { writeFile } from 'node:fs/promises';
import { renderOutput } from '../configmap/configmap.js';
import { readKubeconfig } from '../input/read-input.js';
import { extractClusterFields } from '../kubeconfig/extract.js';
import type { ExtractConfig } from '../types/index.js';
import { KubeconfigError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Where `runExtract` reads from and writes to when no file is configured.
 */
export interface ExtractIo {
    stdin: AsyncIterable<string | Buffer>;
    stdout: { write(chunk: string): unknown };
}

const processIo: ExtractIo = {
    stdin: process.stdin,
    stdout: process.stdout,
};

/**
 * Read the kubeconfig, extract the cluster fields and write them out in
 * the configured format. Returns the rendered output.
 */
export async function runExtract(config: ExtractConfig, io: ExtractIo = processIo): Promise<string> {
    const logger = getLogger();

    const kubeconfigYaml = await readKubeconfig(config.kubeconfig, io.stdin);
    const fields = extractClusterFields(kubeconfigYaml);

    const output = renderOutput(fields, config.format, {
        name: config.name,
        namespace: config.namespace,
        provider: config.provider,
        cluster: config.cluster,
    });

    if (config.out) {
        try {
            await writeFile(config.out, output, 'utf-8');
        } catch (error) {
            throw new KubeconfigError(`failed to write ${config.out}: ${errorMessage(error)}`, 'INPUT', { cause: error });
        }
        logger.info({ out: config.out, format: config.format }, 'Wrote cluster fields');
    } else {
        io.stdout.write(output);
    }

    return output;
}
