import { U64_MAX, type PolicyLimits } from '../limits.js';
import { PolicyError } from './errors.js';
import { SEPARATOR } from './paths.js';
import type { ValidatedPath } from './types.js';

/**
 * Running totals for one operation. Counters only grow, and only for
 * accepted entries: every check runs before anything is committed.
 */
export class UsageTracker {
  private files = 0;
  private bytes = 0n;
  private deepest = 0;

  constructor(private readonly limits: Readonly<PolicyLimits>) {}

  get filesSeen(): number {
    return this.files;
  }

  get totalBytes(): bigint {
    return this.bytes;
  }

  get maxDepthObserved(): number {
    return this.deepest;
  }

  /** Account one entry; throws the first limit it breaks. */
  observe(path: ValidatedPath, size: bigint): void {
    const depth = depthOf(path.rel);
    if (size > this.limits.maxSingleFile) {
      throw new PolicyError('POLICY_SINGLE_FILE_TOO_LARGE', `file too large: ${path.rel} (limit ${this.limits.maxSingleFile}, actual ${size})`, {
        path: path.rel,
        limit: this.limits.maxSingleFile,
        actual: size
      });
    }
    if (depth > this.limits.maxDepth) {
      throw new PolicyError('POLICY_DEPTH_EXCEEDED', `path too deep: ${path.rel} (limit ${this.limits.maxDepth}, actual ${depth})`, {
        path: path.rel,
        limit: this.limits.maxDepth,
        actual: depth
      });
    }

    const files = Math.min(this.files + 1, Number.MAX_SAFE_INTEGER);
    if (files > this.limits.maxFiles) {
      throw new PolicyError('POLICY_FILE_COUNT_EXCEEDED', `file count exceeded (limit ${this.limits.maxFiles}, actual ${files})`, {
        path: path.rel,
        limit: this.limits.maxFiles,
        actual: files
      });
    }

    const sum = this.bytes + size;
    const bytes = sum > U64_MAX ? U64_MAX : sum;
    if (bytes > this.limits.maxTotalBytes) {
      throw new PolicyError('POLICY_TOTAL_BYTES_EXCEEDED', `total bytes exceeded (limit ${this.limits.maxTotalBytes}, actual ${bytes})`, {
        path: path.rel,
        limit: this.limits.maxTotalBytes,
        actual: bytes
      });
    }

    this.files = files;
    this.bytes = bytes;
    this.deepest = Math.max(this.deepest, depth);
  }
}

/** Count normal components; ".." cannot appear in a validated path. */
export function depthOf(rel: string): number {
  let depth = 0;
  for (const part of rel.split(SEPARATOR)) {
    if (part === '' || part === '.') continue;
    if (part === '..') {
      throw new PolicyError('POLICY_PARENT_TRAVERSAL', `path contains parent traversal: ${rel}`, { path: rel });
    }
    depth += 1;
  }
  return depth;
}
