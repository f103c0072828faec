/**
 * @repo-context/scanner
 * Ignore-aware repository walker and tree rendering
 */

export { IgnoreMatcher } from './ignore/matcher.js';
export { compilePatterns, parseRulePatterns, resolvePattern } from './ignore/rule-set.js';
export { walkRepository } from './walk/walker.js';
export { buildTree, buildTreeFromFiles, rootName, walkForTree } from './tree/builder.js';
export { formatTree, DIRECTORY_MARKER, TREE_CONNECTOR, TREE_INDENT } from './tree/format.js';
export type {
  MatcherOptions,
  RuleSet,
  ScannedDirectory,
  ScannedFile,
  TreeEntry,
  TreeNode,
  WalkOptions,
} from './types/index.js';
