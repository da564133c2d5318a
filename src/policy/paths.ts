/** POSIX separator; a backslash is an ordinary name character. */
export const SEPARATOR = '/';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function isAbsolutePath(value: string): boolean {
  return value.startsWith(SEPARATOR);
}

/** True when the string cannot round-trip through UTF-8 or carries NUL. */
export function hasInvalidText(value: string): boolean {
  return value.includes('\u0000') || LONE_SURROGATE.test(value);
}

/** Split into components, dropping empty and "." segments. */
export function pathComponents(value: string): string[] {
  return value.split(SEPARATOR).filter((part) => part !== '' && part !== '.');
}

export function hasParentComponent(value: string): boolean {
  return value.split(SEPARATOR).includes('..');
}

/**
 * Lexically clean a path: collapse separators, drop ".", resolve ".." against
 * the preceding component. Absolute paths never climb above "/"; relative
 * paths keep leading ".." components. No filesystem access.
 */
export function cleanPath(value: string): string {
  const absolute = isAbsolutePath(value);
  const out: string[] = [];
  for (const part of value.split(SEPARATOR)) {
    if (part === '' || part === '.') continue;
    if (part === '..') {
      const last = out[out.length - 1];
      if (last !== undefined && last !== '..') {
        out.pop();
      } else if (!absolute) {
        out.push('..');
      }
      continue;
    }
    out.push(part);
  }
  const joined = out.join(SEPARATOR);
  if (absolute) return `${SEPARATOR}${joined}`;
  return joined.length > 0 ? joined : '.';
}

export function joinPath(base: string, child: string): string {
  if (child.length === 0) return base;
  if (base.endsWith(SEPARATOR)) return `${base}${child}`;
  return `${base}${SEPARATOR}${child}`;
}

/** Component-wise prefix test: "/a/bc" is not within "/a/b". */
export function isWithinRoot(path: string, root: string): boolean {
  if (path === root) return true;
  const prefix = root.endsWith(SEPARATOR) ? root : `${root}${SEPARATOR}`;
  return path.startsWith(prefix);
}

/** Strip the root prefix; the root itself maps to "". */
export function relativeToRoot(path: string, root: string): string {
  if (path === root) return '';
  const prefix = root.endsWith(SEPARATOR) ? root : `${root}${SEPARATOR}`;
  return path.slice(prefix.length);
}

export function parentPath(path: string): string {
  const cleaned = cleanPath(path);
  const index = cleaned.lastIndexOf(SEPARATOR);
  if (index < 0) return '.';
  if (index === 0) return SEPARATOR;
  return cleaned.slice(0, index);
}
