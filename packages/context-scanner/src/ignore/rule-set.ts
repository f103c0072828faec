/**
 * Rule file parsing and pattern compilation
 */

import path from 'node:path';
import picomatch from 'picomatch';
import { getLogger, toPosix } from '@repo-context/core';

const logger = getLogger('repo-context:scanner:rules');

const GLOB_SPECIAL = /[*?[\]{}()!+@]/g;

export type PathTest = (posixPath: string) => boolean;

/**
 * Extract patterns from rule file text: blank lines and comments are dropped,
 * negations are not supported and are skipped.
 */
export function parseRulePatterns(content: string): string[] {
  const patterns: string[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    if (line.startsWith('!')) {
      logger.debug('Skipping unsupported negation pattern', { pattern: line });
      continue;
    }
    patterns.push(line);
  }
  return patterns;
}

/**
 * Resolve a raw pattern against its declaring directory.
 *
 * `dir/` becomes `dir/**`; a pattern without an inner separator matches at
 * any depth below the declaring directory.
 */
export function resolvePattern(directory: string, pattern: string): string {
  const withWildcard = pattern.endsWith('/') ? `${pattern}**` : pattern;
  const stem = pattern.replace(/\/+$/, '');
  const anchored = stem.includes('/');
  const base = toPosix(directory).replace(GLOB_SPECIAL, '\\$&');
  return path.posix.join(base, anchored ? withWildcard : `**/${withWildcard}`);
}

/**
 * Compile every pattern of a rule set into one path test
 */
export function compilePatterns(directory: string, patterns: readonly string[]): PathTest {
  if (patterns.length === 0) {
    return () => false;
  }
  const globs = patterns.map((pattern) => resolvePattern(directory, pattern));
  return picomatch(globs, { dot: true });
}
