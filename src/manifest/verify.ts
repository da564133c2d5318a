import { comparePaths } from './collect.js';
import { ManifestError } from './errors.js';
import type { ManifestEntry } from './types.js';

/**
 * Check `actual` against `expected`: every expected path must be present with
 * the same digest and kind, and unless `relaxed`, nothing else may appear.
 * Throws on the first difference, in path order.
 */
export function verifyManifest(
  expected: readonly ManifestEntry[],
  actual: readonly ManifestEntry[],
  relaxed = false
): void {
  const actualByPath = new Map(actual.map((entry) => [entry.path, entry]));
  const expectedPaths = new Set(expected.map((entry) => entry.path));

  for (const want of [...expected].sort((a, b) => comparePaths(a.path, b.path))) {
    const have = actualByPath.get(want.path);
    if (!have) {
      throw new ManifestError('MANIFEST_MISSING_ENTRY', `manifest entry missing: ${want.path}`, { path: want.path });
    }
    if (have.sha256 !== want.sha256 || have.kind !== want.kind) {
      throw new ManifestError(
        'MANIFEST_MISMATCH',
        `manifest mismatch for ${want.path}: expected ${want.sha256}, found ${have.sha256}`,
        {
          path: want.path,
          expected: want.sha256,
          actual: have.sha256,
          context: { expectedKind: want.kind, actualKind: have.kind }
        }
      );
    }
  }

  if (relaxed) return;
  for (const have of [...actual].sort((a, b) => comparePaths(a.path, b.path))) {
    if (!expectedPaths.has(have.path)) {
      throw new ManifestError('MANIFEST_UNEXPECTED_ENTRY', `unexpected entry not in manifest: ${have.path}`, {
        path: have.path
      });
    }
  }
}
