const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode standard, padded base64 into a UTF-8 string.
 *
 * `Buffer.from(..., 'base64')` skips characters it does not know, so the
 * input is checked first. CR and LF are ignored, as in wrapped PEM bundles.
 *
 * @throws Error describing the first problem found
 */
export function decodeBase64Strict(encoded: string): string {
    const compact = encoded.replace(/[\r\n]/g, '');

    const illegal = compact.search(/[^A-Za-z0-9+/=]/);
    if (illegal !== -1) {
        throw new Error(`illegal base64 data at input byte ${illegal}`);
    }
    if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
        throw new Error('malformed base64 padding');
    }

    return Buffer.from(compact, 'base64').toString('utf-8');
}
