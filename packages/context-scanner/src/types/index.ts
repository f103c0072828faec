/**
 * Types for repo-context scanner
 */

import type { FileScope } from '@repo-context/core';

/**
 * Exclusion rule set declared by one directory
 */
export interface RuleSet {
  /** Absolute path of the declaring directory */
  directory: string;
  /** Raw patterns, in file order, relative to `directory` */
  patterns: string[];
  /** First rule set discovered is primary, later ones start related trees */
  scope: FileScope;
  /** Discovery order, starting at 0 */
  order: number;
}

export interface MatcherOptions {
  /** Scan root; deny-list paths and ancestor checks are relative to it */
  root: string;
  /** Include hidden files and rule-matched paths */
  includeIgnored?: boolean;
  /** Base names or root-relative paths that are always excluded */
  exclude?: readonly string[];
  ruleFileName?: string;
}

/**
 * A file that survived the walk
 */
export interface ScannedFile {
  absolutePath: string;
  /** POSIX path relative to the scan root */
  relativePath: string;
  name: string;
  /** Lower-cased extension with the dot, '' when none */
  extension: string;
  scope: FileScope;
  /** Directory of the related rule set the file lies under */
  relatedRoot?: string;
}

export interface WalkOptions {
  /**
   * Sort each directory listing by name. Without it the platform listing
   * order drives both the tree order and which rule sets are known when a
   * path is tested.
   */
  sort?: boolean;
  /** Called for every directory the walk enters below the root, before its files */
  onDirectory?: (directory: ScannedDirectory) => void;
}

export interface ScannedDirectory {
  absolutePath: string;
  /** POSIX path relative to the scan root */
  relativePath: string;
}

/**
 * Entry placed in the tree; `directory` marks a directory node
 */
export interface TreeEntry {
  relativePath: string;
  directory?: boolean;
}

/**
 * Directory tree: a name maps to a subtree (directory) or null (file)
 */
export type TreeNode = ReadonlyMap<string, TreeNode | null>;
