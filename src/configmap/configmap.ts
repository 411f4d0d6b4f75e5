import { stringify } from 'yaml';
import type {
    ClusterFields,
    ConfigMapManifest,
    ConfigMapOptions,
    OutputFormat,
} from '../types/index.js';
import { KubeconfigError } from '../utils/errors.js';

// ─── Name validation ─────────────────────────────────────

const DNS1123_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const DNS1123_SUBDOMAIN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;

function assertSubdomain(value: string, field: string): void {
    if (value.length === 0 || value.length > 253 || !DNS1123_SUBDOMAIN.test(value)) {
        throw new KubeconfigError(`invalid ConfigMap ${field} "${value}": must be a DNS-1123 subdomain`, 'INVALID_OPTION');
    }
}

function assertLabel(value: string, field: string): void {
    if (value.length === 0 || value.length > 63 || !DNS1123_LABEL.test(value)) {
        throw new KubeconfigError(`invalid ConfigMap ${field} "${value}": must be a DNS-1123 label`, 'INVALID_OPTION');
    }
}

// ─── Manifest ────────────────────────────────────────────

/**
 * Build the credential-free ConfigMap that points a workload identity
 * client at the cluster: `address` and `ca.crt`, plus the provider hints
 * when set.
 */
export function buildClusterConfigMap(fields: ClusterFields, options: ConfigMapOptions): ConfigMapManifest {
    assertSubdomain(options.name, 'name');
    if (options.namespace !== undefined) {
        assertLabel(options.namespace, 'namespace');
    }

    const data: Record<string, string> = {
        address: fields.server,
        'ca.crt': fields.caCert,
    };
    if (options.provider) data['provider'] = options.provider;
    if (options.cluster) data['cluster'] = options.cluster;

    return {
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: {
            name: options.name,
            ...(options.namespace !== undefined ? { namespace: options.namespace } : {}),
        },
        data,
    };
}

// ─── Rendering ───────────────────────────────────────────

/**
 * Serialize extracted fields in the requested format.
 * `options` is only read for the `configmap` format.
 */
export function renderOutput(fields: ClusterFields, format: OutputFormat, options: ConfigMapOptions): string {
    switch (format) {
        case 'json':
            return `${JSON.stringify({ server: fields.server, caCert: fields.caCert }, null, 2)}\n`;
        case 'yaml':
            return stringify({ server: fields.server, caCert: fields.caCert });
        case 'configmap':
            return stringify(buildClusterConfigMap(fields, options));
    }
}
