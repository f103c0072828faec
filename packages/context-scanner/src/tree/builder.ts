/**
 * Directory tree construction
 */

import path from 'node:path';
import { IgnoreMatcher } from '../ignore/matcher.js';
import { walkRepository } from '../walk/walker.js';
import type { ScannedFile, TreeEntry, TreeNode, WalkOptions } from '../types/index.js';

type MutableTree = Map<string, MutableTree | null>;

/**
 * Key used for the root of the tree
 */
export function rootName(root: string): string {
  const resolved = path.resolve(root);
  return path.basename(resolved) || resolved;
}

/**
 * Build the tree from entries that already survived a walk, keyed by the root
 * name. Insertion order follows the order of `entries`; a directory entry
 * adds its node even when nothing is ever placed under it.
 */
export function buildTreeFromFiles(name: string, entries: Iterable<TreeEntry>): TreeNode {
  const top: MutableTree = new Map();
  const rootNode: MutableTree = new Map();
  top.set(name, rootNode);

  for (const entry of entries) {
    const segments = entry.relativePath.split('/').filter(Boolean);
    const leaf = entry.directory ? undefined : segments.pop();
    if (segments.length === 0 && leaf === undefined) continue;

    let current = rootNode;
    for (const segment of segments) {
      let next = current.get(segment);
      if (!next) {
        next = new Map();
        current.set(segment, next);
      }
      current = next;
    }
    if (leaf !== undefined) {
      current.set(leaf, null);
    }
  }

  return top;
}

/**
 * Walk `root` once, keeping the surviving files and the tree entries of every
 * visited directory and file in walk order
 */
export function walkForTree(
  root: string,
  matcher: IgnoreMatcher,
  options: WalkOptions = {}
): { files: ScannedFile[]; entries: TreeEntry[] } {
  const files: ScannedFile[] = [];
  const entries: TreeEntry[] = [];
  const walkOptions: WalkOptions = {
    ...options,
    onDirectory: (directory) => {
      entries.push({ relativePath: directory.relativePath, directory: true });
      options.onDirectory?.(directory);
    },
  };

  for (const file of walkRepository(root, matcher, walkOptions)) {
    files.push(file);
    entries.push(file);
  }
  return { files, entries };
}

/**
 * Walk `root` with `matcher` and build its tree
 */
export function buildTree(
  root: string,
  matcher: IgnoreMatcher = new IgnoreMatcher({ root }),
  options: WalkOptions = {}
): TreeNode {
  return buildTreeFromFiles(rootName(root), walkForTree(root, matcher, options).entries);
}
