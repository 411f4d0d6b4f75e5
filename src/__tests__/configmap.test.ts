import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { buildClusterConfigMap, renderOutput } from '../configmap/configmap.js';
import { KubeconfigError } from '../utils/errors.js';
import type { ClusterFields } from '../types/index.js';

const FIELDS: ClusterFields = {
    server: 'https://10.0.0.1:6443',
    caCert: '-----BEGIN CERTIFICATE-----\nMIIB\n-----END CERTIFICATE-----',
};

describe('buildClusterConfigMap', () => {
    it('should map server to address and CA to ca.crt', () => {
        const manifest = buildClusterConfigMap(FIELDS, { name: 'staging-kubeconfig', namespace: 'flux-system' });
        expect(manifest).toEqual({
            apiVersion: 'v1',
            kind: 'ConfigMap',
            metadata: { name: 'staging-kubeconfig', namespace: 'flux-system' },
            data: {
                address: 'https://10.0.0.1:6443',
                'ca.crt': '-----BEGIN CERTIFICATE-----\nMIIB\n-----END CERTIFICATE-----',
            },
        });
    });

    it('should append provider and cluster after the connection keys', () => {
        const manifest = buildClusterConfigMap(FIELDS, {
            name: 'prod',
            provider: 'gcp',
            cluster: 'projects/demo/locations/europe-west1/clusters/prod',
        });
        expect(Object.keys(manifest.data)).toEqual(['address', 'ca.crt', 'provider', 'cluster']);
        expect(manifest.data['provider']).toBe('gcp');
        expect(manifest.data['cluster']).toBe('projects/demo/locations/europe-west1/clusters/prod');
    });

    it('should leave namespace out of metadata when not given', () => {
        const manifest = buildClusterConfigMap(FIELDS, { name: 'prod' });
        expect('namespace' in manifest.metadata).toBe(false);
    });

    it('should never write credential keys', () => {
        const manifest = buildClusterConfigMap(FIELDS, { name: 'prod', provider: 'aws' });
        expect(Object.keys(manifest.data)).toEqual(['address', 'ca.crt', 'provider']);
    });

    it('should accept dotted subdomain names', () => {
        expect(buildClusterConfigMap(FIELDS, { name: 'prod.eu-1' }).metadata.name).toBe('prod.eu-1');
    });

    it('should reject a name that is not a DNS-1123 subdomain', () => {
        expect(() => buildClusterConfigMap(FIELDS, { name: 'Prod_Cluster' })).toThrow(KubeconfigError);
        expect(() => buildClusterConfigMap(FIELDS, { name: 'Prod_Cluster' })).toThrow(
            'invalid ConfigMap name "Prod_Cluster": must be a DNS-1123 subdomain'
        );
    });

    it('should reject an empty name', () => {
        expect(() => buildClusterConfigMap(FIELDS, { name: '' })).toThrow(
            'invalid ConfigMap name "": must be a DNS-1123 subdomain'
        );
    });

    it('should reject a namespace that is not a DNS-1123 label', () => {
        expect(() => buildClusterConfigMap(FIELDS, { name: 'prod', namespace: 'flux.system' })).toThrow(
            'invalid ConfigMap namespace "flux.system": must be a DNS-1123 label'
        );
        expect(() => buildClusterConfigMap(FIELDS, { name: 'prod', namespace: 'a'.repeat(64) })).toThrow(
            KubeconfigError
        );
    });
});

describe('renderOutput', () => {
    it('should render pretty JSON with a trailing newline', () => {
        expect(renderOutput(FIELDS, 'json', { name: 'unused' })).toBe(
            '{\n' +
                '  "server": "https://10.0.0.1:6443",\n' +
                '  "caCert": "-----BEGIN CERTIFICATE-----\\nMIIB\\n-----END CERTIFICATE-----"\n' +
                '}\n'
        );
    });

    it('should render YAML that reads back to the same fields', () => {
        const output = renderOutput(FIELDS, 'yaml', { name: 'unused' });
        expect(output.startsWith('server: https://10.0.0.1:6443\n')).toBe(true);
        expect(parse(output)).toEqual({
            server: 'https://10.0.0.1:6443',
            caCert: '-----BEGIN CERTIFICATE-----\nMIIB\n-----END CERTIFICATE-----',
        });
    });

    it('should render a ConfigMap manifest', () => {
        const output = renderOutput(FIELDS, 'configmap', { name: 'staging', namespace: 'flux-system', provider: 'azure' });
        expect(output.startsWith('apiVersion: v1\nkind: ConfigMap\n')).toBe(true);
        expect(parse(output)).toEqual({
            apiVersion: 'v1',
            kind: 'ConfigMap',
            metadata: { name: 'staging', namespace: 'flux-system' },
            data: {
                address: 'https://10.0.0.1:6443',
                'ca.crt': '-----BEGIN CERTIFICATE-----\nMIIB\n-----END CERTIFICATE-----',
                provider: 'azure',
            },
        });
    });

    it('should validate ConfigMap options only for the configmap format', () => {
        expect(() => renderOutput(FIELDS, 'json', { name: 'Not Valid' })).not.toThrow();
        expect(() => renderOutput(FIELDS, 'configmap', { name: 'Not Valid' })).toThrow(KubeconfigError);
    });
});
