import { parseAllDocuments } from 'yaml';
import type { ClusterConfig, ClusterEntry, KubeConfig } from '../types/index.js';
import { KubeconfigError, errorMessage } from '../utils/errors.js';

const PARSE_ERROR_PREFIX = 'failed to parse kubeconfig YAML';

type Mapping = Record<string, unknown>;

/**
 * Shape mismatch found while mapping the parsed YAML onto the schema.
 */
class SchemaError extends Error {
    constructor(path: string, expected: string) {
        super(`${path}: expected ${expected}`);
        this.name = 'SchemaError';
    }
}

function isMapping(value: unknown): value is Mapping {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readMapping(value: unknown, path: string): Mapping {
    if (value === null || value === undefined) return {};
    if (!isMapping(value)) throw new SchemaError(path, 'a mapping');
    return value;
}

/**
 * Read a string field. Absent or null reads as ''. Numbers and booleans
 * are accepted in their string form; lists and mappings are rejected.
 * Integers arrive as bigint (see `parseFirstDocument`) so long ones keep every digit.
 */
function readString(parent: Mapping, key: string, path: string): string {
    const value = parent[key];
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return String(value);
    }
    throw new SchemaError(`${path}.${key}`, 'a string');
}

function readClusterConfig(value: unknown, path: string): ClusterConfig {
    const cluster = readMapping(value, path);
    return {
        server: readString(cluster, 'server', path),
        certificateAuthorityData: readString(cluster, 'certificate-authority-data', path),
    };
}

function readClusterEntry(value: unknown, path: string): ClusterEntry {
    const entry = readMapping(value, path);
    return {
        name: readString(entry, 'name', path),
        cluster: readClusterConfig(entry['cluster'], `${path}.cluster`),
    };
}

function readClusters(value: unknown): ClusterEntry[] {
    if (value === null || value === undefined) return [];
    if (!Array.isArray(value)) throw new SchemaError('clusters', 'a list');
    return value.map((entry: unknown, index) => readClusterEntry(entry, `clusters[${index}]`));
}

/**
 * Plain value of the first document in the stream; later documents are
 * ignored. An empty stream is null.
 */
function parseFirstDocument(source: string): unknown {
    const [first] = parseAllDocuments(source, { intAsBigInt: true });
    if (!first) return null;

    const [error] = first.errors;
    if (error) throw error;

    return first.toJS();
}

/**
 * Parse a kubeconfig YAML document into the minimal cluster schema.
 *
 * Keys outside `clusters[].name` and `clusters[].cluster.{server,certificate-authority-data}`
 * are ignored. An empty document yields no clusters.
 *
 * @throws KubeconfigError with code `PARSE` on invalid YAML or a shape mismatch
 */
export function parseKubeConfig(kubeconfigYaml: string): KubeConfig {
    let document: unknown;
    try {
        document = parseFirstDocument(kubeconfigYaml);
    } catch (error) {
        throw new KubeconfigError(`${PARSE_ERROR_PREFIX}: ${errorMessage(error)}`, 'PARSE', { cause: error });
    }

    try {
        const root = readMapping(document, 'kubeconfig');
        return { clusters: readClusters(root['clusters']) };
    } catch (error) {
        throw new KubeconfigError(`${PARSE_ERROR_PREFIX}: ${errorMessage(error)}`, 'PARSE', { cause: error });
    }
}
