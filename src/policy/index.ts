export { SecurityPolicy } from './SecurityPolicy.js';
export { UsageTracker, depthOf } from './UsageTracker.js';
export { PolicyError } from './errors.js';
export type { PolicyErrorCode } from './errors.js';
export { cleanPath, isWithinRoot, relativeToRoot } from './paths.js';
export type { LinkKind, PolicyFlags, SecurityPolicyOptions, ValidatedPath } from './types.js';
