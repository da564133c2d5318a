export { collectManifest, comparePaths, sortManifest } from './collect.js';
export type { CollectManifestOptions } from './collect.js';
export { EMPTY_SHA256, hashFile, hashLinkTarget, hashStream, sha256Hex } from './fingerprint.js';
export { parseManifest, readManifestJson, serializeManifest, writeManifestJson } from './json.js';
export { verifyManifest } from './verify.js';
export { ManifestError } from './errors.js';
export type { ManifestErrorCode } from './errors.js';
export type { ManifestEntry, ManifestItem } from './types.js';
