import { readFile } from 'node:fs/promises';
import picomatch from 'picomatch';
import { errnoCode, IoError, UserInputError } from '../errors.js';

/** Returns true for relative paths that must be left out. */
export type ExcludeMatcher = (relative: string) => boolean;

/**
 * Compile exclude globs. Patterns without a slash match the basename at any
 * depth, so "*.log" excludes "nested/skip.log"; patterns with a slash match
 * the whole relative path. Dotfiles are matched too.
 */
export function compileExcludes(patterns: readonly string[]): ExcludeMatcher {
  const active = patterns.map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0);
  if (active.length === 0) return () => false;
  const matchers: picomatch.Matcher[] = [];
  try {
    const basenames = active.filter((pattern) => !pattern.includes('/'));
    const paths = active.filter((pattern) => pattern.includes('/'));
    if (basenames.length > 0) matchers.push(picomatch(basenames, { dot: true, basename: true }));
    if (paths.length > 0) matchers.push(picomatch(paths, { dot: true }));
  } catch (err) {
    throw new UserInputError('INPUT_INVALID_OPTION', `invalid exclude pattern: ${active.join(', ')}`, { cause: err });
  }
  return (relative) => relative.length > 0 && matchers.some((isMatch) => isMatch(relative));
}

/** Parse an exclude file: one pattern per line, blank lines and "#" comments ignored. */
export function parseExcludeFile(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/** Read every exclude file in order; files that do not exist contribute nothing. */
export async function loadExcludePatterns(files: readonly string[]): Promise<string[]> {
  const patterns: string[] = [];
  for (const file of files) {
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') continue;
      throw new IoError('IO_FAILED', 'read exclude file', file, { cause: err });
    }
    patterns.push(...parseExcludeFile(text));
  }
  return patterns;
}
