/**
 * Path utilities for repo-context
 */

import path from 'node:path';

/**
 * Convert path to POSIX format (forward slashes)
 */
export function toPosix(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Make path relative to the root, in POSIX form
 */
export function makeRelativeToRoot(absolutePath: string, root: string): string {
  return toPosix(path.relative(root, absolutePath));
}

/**
 * Whether `candidate` is `root` itself or lies below it.
 * Both paths are resolved first, so `..` segments are taken into account.
 */
export function isInsideRoot(candidate: string, root: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(candidate));
  if (relative === '') return true;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Lower-cased extension including the dot, or '' when there is none
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Split text into lines, keeping each line's terminator
 */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}
