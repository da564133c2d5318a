import { UserInputError } from './errors.js';

/** Resource ceilings applied to one create or extract operation. */
export type PolicyLimits = {
  maxFiles: number;
  maxTotalBytes: bigint;
  maxSingleFile: bigint;
  maxDepth: number;
};

/** Partial limit overrides, as collected from flags or callers. */
export type PolicyLimitOverrides = {
  maxFiles?: number | bigint | undefined;
  maxTotalBytes?: number | bigint | undefined;
  maxSingleFile?: number | bigint | undefined;
  maxDepth?: number | bigint | undefined;
};

const DEFAULT_LIMITS = Object.freeze({
  maxFiles: 200_000,
  maxTotalBytes: 8n * 1024n * 1024n * 1024n,
  maxSingleFile: 2n * 1024n * 1024n * 1024n,
  maxDepth: 64
} satisfies PolicyLimits);

export const DEFAULT_POLICY_LIMITS: Readonly<PolicyLimits> = DEFAULT_LIMITS;

/** Largest value a 64-bit unsigned counter holds; byte totals saturate here. */
export const U64_MAX = (1n << 64n) - 1n;

/** Merge overrides onto the defaults, rejecting negative or fractional values. */
export function resolvePolicyLimits(
  overrides?: PolicyLimitOverrides,
  defaults: Readonly<PolicyLimits> = DEFAULT_LIMITS
): Readonly<PolicyLimits> {
  return Object.freeze({
    maxFiles: toCount('maxFiles', overrides?.maxFiles) ?? defaults.maxFiles,
    maxTotalBytes: toByteCount('maxTotalBytes', overrides?.maxTotalBytes) ?? defaults.maxTotalBytes,
    maxSingleFile: toByteCount('maxSingleFile', overrides?.maxSingleFile) ?? defaults.maxSingleFile,
    maxDepth: toCount('maxDepth', overrides?.maxDepth) ?? defaults.maxDepth
  });
}

function toCount(name: string, value: number | bigint | undefined): number | undefined {
  if (value === undefined) return undefined;
  const asBig = toByteCount(name, value);
  if (asBig === undefined) return undefined;
  if (asBig > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new UserInputError('INPUT_INVALID_OPTION', `${name} is too large: ${value}`);
  }
  return Number(asBig);
}

function toByteCount(name: string, value: number | bigint | undefined): bigint | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new UserInputError('INPUT_INVALID_OPTION', `${name} must be a whole number: ${value}`);
  }
  const big = BigInt(value);
  if (big < 0n || big > U64_MAX) {
    throw new UserInputError('INPUT_INVALID_OPTION', `${name} is out of range: ${value}`);
  }
  return big;
}
