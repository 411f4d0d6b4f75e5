import type { ClusterFields } from '../types/index.js';
import { KubeconfigError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { decodeBase64Strict } from './base64.js';
import { parseKubeConfig } from './parser.js';


const PEM_CERTIFICATE_MARKER = '-----BEGIN CERTIFICATE-----';

/**
 * Extract the API server address and CA certificate from a kubeconfig.
 *
 * Only the first cluster entry is read; any further entries are ignored.
 * The CA certificate is base64-decoded from `certificate-authority-data`
 * and returned as PEM text.
 *
 * @throws KubeconfigError when the document cannot be parsed, holds no
 *   clusters, misses `server` or `certificate-authority-data`, or the
 *   CA data is not valid base64
 */
export function extractClusterFields(kubeconfigYaml: string): ClusterFields {
    const logger = getLogger();
    const config = parseKubeConfig(kubeconfigYaml);

    const [first] = config.clusters;
    if (!first) {
        throw new KubeconfigError('no clusters found in kubeconfig', 'NO_CLUSTERS');
    }

    if (config.clusters.length > 1) {
        logger.debug(
            { using: first.name, ignored: config.clusters.slice(1).map((c) => c.name) },
            'Multiple clusters in kubeconfig, using the first'
        );
    }

    const { server, certificateAuthorityData } = first.cluster;

    if (server === '') {
        throw new KubeconfigError('server field is empty in kubeconfig cluster', 'EMPTY_SERVER');
    }

    if (certificateAuthorityData === '') {
        throw new KubeconfigError(
            'certificate-authority-data field is empty in kubeconfig cluster',
            'EMPTY_CA_DATA'
        );
    }

    let caCert: string;
    try {
        caCert = decodeBase64Strict(certificateAuthorityData);
    } catch (error) {
        throw new KubeconfigError(
            `failed to decode certificate-authority-data: ${errorMessage(error)}`,
            'INVALID_CA_DATA',
            { cause: error }
        );
    }

    if (!caCert.includes(PEM_CERTIFICATE_MARKER)) {
        logger.warn({ cluster: first.name }, 'Decoded certificate-authority-data is not a PEM certificate');
    }

    logger.debug({ cluster: first.name, server }, 'Extracted cluster fields');
    return { server, caCert };
}
