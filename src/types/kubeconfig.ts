/**
 * Minimal kubeconfig schema: only what is needed to reach a cluster's API
 * server without credentials. Contexts, users and preferences are ignored.
 */
export interface KubeConfig {
    clusters: ClusterEntry[];
}

/**
 * A named entry of the `clusters` list.
 */
export interface ClusterEntry {
    name: string;
    cluster: ClusterConfig;
}

/**
 * Connection details of a cluster entry.
 * `certificateAuthorityData` maps to the `certificate-authority-data` key.
 */
export interface ClusterConfig {
    server: string;
    certificateAuthorityData: string;
}

/**
 * Values extracted from the first cluster entry.
 */
export interface ClusterFields {
    /** API server endpoint, verbatim. */
    server: string;
    /** CA certificate decoded from base64 (PEM text). */
    caCert: string;
}
