/**
 * Depth-first repository walker
 */

import { readdirSync, statSync, type Dirent } from 'node:fs';
import path from 'node:path';
import { errorMessage, extensionOf, getLogger, makeRelativeToRoot } from '@repo-context/core';
import type { IgnoreMatcher } from '../ignore/matcher.js';
import type { ScannedFile, WalkOptions } from '../types/index.js';

const logger = getLogger('repo-context:scanner:walker');

type EntryType = 'file' | 'directory' | 'other';

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Symlinked files are followed; symlinked directories are not descended into.
 * A link that cannot be resolved (loop, permissions) counts as 'other'.
 */
function entryType(entry: Dirent, fullPath: string): EntryType {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  if (!entry.isSymbolicLink()) return 'other';

  try {
    return statSync(fullPath, { throwIfNoEntry: false })?.isFile() ? 'file' : 'other';
  } catch (error) {
    logger.warn('Skipping unresolvable link', { path: fullPath, error: errorMessage(error) });
    return 'other';
  }
}

/**
 * Walk `root` depth-first. Entering a directory reports it through
 * `onDirectory` and registers its rule set with the matcher, then yields the
 * directory's surviving files, then visits its subdirectories, each one
 * checked for pruning only when its turn comes.
 */
export function* walkRepository(
  root: string,
  matcher: IgnoreMatcher,
  options: WalkOptions = {}
): Generator<ScannedFile> {
  const resolvedRoot = path.resolve(root);

  function* visit(directory: string): Generator<ScannedFile> {
    if (directory !== resolvedRoot) {
      options.onDirectory?.({
        absolutePath: directory,
        relativePath: makeRelativeToRoot(directory, resolvedRoot),
      });
    }

    let entries: Dirent[];
    try {
      entries = readdirSync(directory, { withFileTypes: true });
    } catch (error) {
      logger.warn('Skipping unreadable directory', { directory, error: errorMessage(error) });
      return;
    }
    if (options.sort) {
      entries = [...entries].sort(byName);
    }

    matcher.discover(directory);

    const subdirectories: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      const type = entryType(entry, fullPath);

      if (type === 'directory') {
        subdirectories.push(fullPath);
        continue;
      }
      if (type !== 'file' || matcher.isExcluded(fullPath)) {
        continue;
      }

      const relatedRoot = matcher.relatedRootOf(fullPath);
      yield {
        absolutePath: fullPath,
        relativePath: makeRelativeToRoot(fullPath, resolvedRoot),
        name: entry.name,
        extension: extensionOf(entry.name),
        scope: relatedRoot === undefined ? 'primary' : 'related',
        ...(relatedRoot === undefined ? {} : { relatedRoot }),
      };
    }

    for (const subdirectory of subdirectories) {
      if (matcher.isPruned(subdirectory)) {
        continue;
      }
      yield* visit(subdirectory);
    }
  }

  yield* visit(resolvedRoot);
}
