export { FingerprintCache } from './fingerprint-cache.js';
export type { FingerprintEntry, CacheStats } from './types.js';
