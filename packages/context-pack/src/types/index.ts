/**
 * Types for repo-context pack
 */

import type { AssemblyPolicyInput, ContentMode, FileScope, TokenEstimator } from '@repo-context/core';
import type { SummarizerRegistry } from '@repo-context/summarizer';

/**
 * One file section of the assembled document
 */
export interface AssembledFile {
  /** Root-relative POSIX path, used as the section label */
  path: string;
  absolutePath: string;
  scope: FileScope;
  mode: ContentMode;
  /** Estimated tokens of the emitted content; 0 for read errors */
  tokens: number;
}

export interface AssembleResult {
  text: string;
  tokenCount: number;
  files: AssembledFile[];
  /** Files that could not be read, as emitted placeholders */
  warnings: string[];
}

export interface AssembleOptions {
  /** Summarizers to use; defaults to Python and TypeScript */
  registry?: SummarizerRegistry;
  /** Token estimator; defaults to counting word runs */
  estimator?: TokenEstimator;
}

export type { AssemblyPolicyInput };
