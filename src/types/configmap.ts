/**
 * Workload identity providers understood by the ConfigMap consumer.
 */
export type IdentityProvider = 'aws' | 'azure' | 'gcp' | 'generic';

export const IDENTITY_PROVIDERS: readonly IdentityProvider[] = ['aws', 'azure', 'gcp', 'generic'];

export interface ConfigMapOptions {
    name: string;
    namespace?: string;
    provider?: IdentityProvider;
    /** Cloud provider's cluster resource identifier. */
    cluster?: string;
}

/**
 * Credential-free ConfigMap manifest.
 */
export interface ConfigMapManifest {
    apiVersion: 'v1';
    kind: 'ConfigMap';
    metadata: {
        name: string;
        namespace?: string;
    };
    data: Record<string, string>;
}
