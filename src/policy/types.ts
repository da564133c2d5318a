import type { PolicyLimits } from '../limits.js';

/** A path that passed normalization: `abs` lies inside the root, `rel` is `abs` minus the root. */
export type ValidatedPath = {
  readonly rel: string;
  readonly abs: string;
};

/** Behaviour toggles; every one defaults to false. */
export type PolicyFlags = {
  allowAbsolute: boolean;
  allowParentComponents: boolean;
  followSymlinks: boolean;
  allowSymlinkOutsideRoot: boolean;
  allowHardlinkOutsideRoot: boolean;
};

/** Link flavours with their own "outside root" toggle. */
export type LinkKind = 'symlink' | 'hardlink';

/** Options accepted by SecurityPolicy.create(). */
export type SecurityPolicyOptions = Partial<PolicyFlags> & {
  limits?: Partial<PolicyLimits>;
};
