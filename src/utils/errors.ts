/**
 * Failure classes raised while extracting cluster fields.
 */
export type KubeconfigErrorCode =
    | 'PARSE'
    | 'NO_CLUSTERS'
    | 'EMPTY_SERVER'
    | 'EMPTY_CA_DATA'
    | 'INVALID_CA_DATA'
    | 'INVALID_OPTION'
    | 'INPUT';

/**
 * Error with classification. The underlying parser/decoder/fs error,
 * when there is one, is kept as `cause`.
 */
export class KubeconfigError extends Error {
    constructor(
        message: string,
        public readonly code: KubeconfigErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'KubeconfigError';
    }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
