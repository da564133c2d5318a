import { UserInputError } from '../errors.js';
import { DEFAULT_POLICY_LIMITS, resolvePolicyLimits, type PolicyLimits } from '../limits.js';
import { PolicyError } from './errors.js';
import {
  cleanPath,
  hasInvalidText,
  hasParentComponent,
  isAbsolutePath,
  isWithinRoot,
  joinPath,
  relativeToRoot
} from './paths.js';
import type { LinkKind, PolicyFlags, SecurityPolicyOptions, ValidatedPath } from './types.js';
import { UsageTracker } from './UsageTracker.js';

const DEFAULT_FLAGS = Object.freeze({
  allowAbsolute: false,
  allowParentComponents: false,
  followSymlinks: false,
  allowSymlinkOutsideRoot: false,
  allowHardlinkOutsideRoot: false
} satisfies PolicyFlags);

/**
 * Immutable safety configuration for one operation. Builders return new
 * instances, so a policy can be shared freely once constructed.
 */
export class SecurityPolicy {
  readonly limits: Readonly<PolicyLimits>;
  readonly flags: Readonly<PolicyFlags>;

  private constructor(limits: Readonly<PolicyLimits>, flags: Readonly<PolicyFlags>) {
    this.limits = Object.freeze({ ...limits });
    this.flags = Object.freeze({ ...flags });
    Object.freeze(this);
  }

  /** Default limits with every permissive flag off. */
  static create(options?: SecurityPolicyOptions): SecurityPolicy {
    const { limits, ...flags } = options ?? {};
    return new SecurityPolicy(resolvePolicyLimits(limits, DEFAULT_POLICY_LIMITS), { ...DEFAULT_FLAGS, ...flags });
  }

  withLimits(limits: Partial<PolicyLimits>): SecurityPolicy {
    return new SecurityPolicy(resolvePolicyLimits(limits, this.limits), this.flags);
  }

  /** Replace the file ceiling; `undefined` keeps the current value. */
  withMaxFiles(value?: number): SecurityPolicy {
    return value === undefined ? this : this.withLimits({ maxFiles: value });
  }

  withMaxTotalBytes(value?: bigint): SecurityPolicy {
    return value === undefined ? this : this.withLimits({ maxTotalBytes: value });
  }

  withMaxSingleFile(value?: bigint): SecurityPolicy {
    return value === undefined ? this : this.withLimits({ maxSingleFile: value });
  }

  withMaxDepth(value?: number): SecurityPolicy {
    return value === undefined ? this : this.withLimits({ maxDepth: value });
  }

  withFlags(flags: Partial<PolicyFlags>): SecurityPolicy {
    return new SecurityPolicy(this.limits, { ...this.flags, ...flags });
  }

  /** Fresh quota tracker seeded with this policy's limits. */
  usage(): UsageTracker {
    return new UsageTracker(this.limits);
  }

  /**
   * Validate an entry path against an absolute root and return its confined
   * absolute form. Purely lexical: the filesystem is never consulted.
   */
  normalizeAndValidate(path: string, root: string): ValidatedPath {
    const cleanRoot = requireAbsoluteRoot(root);
    if (path.length === 0) {
      throw new PolicyError('POLICY_EMPTY_PATH', 'path is empty');
    }
    if (hasInvalidText(path)) {
      throw new PolicyError('POLICY_INVALID_UTF8', `path is not valid UTF-8 text: ${JSON.stringify(path)}`, { path });
    }
    const absolute = isAbsolutePath(path);
    if (absolute && !this.flags.allowAbsolute) {
      throw new PolicyError('POLICY_ABSOLUTE_PATH', `absolute path rejected: ${path}`, { path });
    }
    if (!this.flags.allowParentComponents && hasParentComponent(path)) {
      throw new PolicyError('POLICY_PARENT_TRAVERSAL', `path contains parent traversal: ${path}`, { path });
    }
    const cleaned = cleanPath(absolute ? path : joinPath(cleanRoot, path));
    if (!isWithinRoot(cleaned, cleanRoot)) {
      throw new PolicyError('POLICY_ROOT_ESCAPE', `path escapes archive root: ${path}`, { path });
    }
    return { rel: relativeToRoot(cleaned, cleanRoot), abs: cleaned };
  }

  /**
   * Confine a link target to the root. Callers resolve relative symlink
   * targets against the link's parent before calling.
   */
  enforceLinkPolicy(target: string, root: string, kind: LinkKind): void {
    const allowOutside = kind === 'symlink' ? this.flags.allowSymlinkOutsideRoot : this.flags.allowHardlinkOutsideRoot;
    if (allowOutside) return;
    if (isAbsolutePath(target)) {
      if (!isWithinRoot(cleanPath(target), requireAbsoluteRoot(root))) {
        throw linkOutsideRoot(target, kind);
      }
      return;
    }
    try {
      this.normalizeAndValidate(target, root);
    } catch (err) {
      if (err instanceof PolicyError) throw linkOutsideRoot(target, kind, err);
      throw err;
    }
  }
}

function linkOutsideRoot(target: string, kind: LinkKind, cause?: PolicyError): PolicyError {
  return new PolicyError('POLICY_LINK_OUTSIDE_ROOT', `link target escapes root: ${target}`, {
    path: target,
    context: { linkKind: kind },
    ...(cause ? { cause } : {})
  });
}

function requireAbsoluteRoot(root: string): string {
  if (!isAbsolutePath(root)) {
    throw new UserInputError('INPUT_INVALID_PATH', `policy root must be absolute: ${root}`, { path: root });
  }
  return cleanPath(root);
}
