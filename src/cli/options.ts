import { InvalidArgumentError, type Command } from 'commander';
import { SecurityPolicy } from '../policy/SecurityPolicy.js';

/** Flags every archive-touching command shares for policy limits. */
export type LimitOptions = {
  maxFiles?: number;
  maxTotalBytes?: bigint;
  maxSingleFile?: bigint;
  maxDepth?: number;
};

/** Output switches shared by every command. */
export type OutputOptions = {
  verbose?: boolean;
  quiet?: boolean;
};

const DIGITS = /^\d+$/;

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!DIGITS.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseByteCount(value: string): bigint {
  if (!DIGITS.test(value)) {
    throw new InvalidArgumentError('Expected a byte count.');
  }
  return BigInt(value);
}

/** Accumulate a repeatable option into an array. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function addLimitOptions(command: Command): Command {
  return command
    .option('--max-files <count>', 'Maximum number of entries', parseCount)
    .option('--max-total-bytes <bytes>', 'Maximum total payload bytes', parseByteCount)
    .option('--max-single-file <bytes>', 'Maximum size of one entry', parseByteCount)
    .option('--max-depth <count>', 'Maximum path depth', parseCount);
}

export function addOutputOptions(command: Command): Command {
  return command.option('-v, --verbose', 'Print each entry').option('-q, --quiet', 'Print errors only');
}

/** Default policy with the limit flags applied. */
export function policyFromOptions(options: LimitOptions): SecurityPolicy {
  return SecurityPolicy.create()
    .withMaxFiles(options.maxFiles)
    .withMaxTotalBytes(options.maxTotalBytes)
    .withMaxSingleFile(options.maxSingleFile)
    .withMaxDepth(options.maxDepth);
}
