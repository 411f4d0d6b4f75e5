export { parseKubeConfig } from './parser.js';
export { extractClusterFields } from './extract.js';
export { decodeBase64Strict } from './base64.js';
