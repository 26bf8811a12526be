export { normalizeText, normalizeVendorName, tokenize } from './normalize.js';
