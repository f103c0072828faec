/**
 * Shared types for repo-context
 */

export interface TokenEstimator {
  estimate(text: string): number;
}

/**
 * Which tree a file belongs to: the first rule-set directory found marks the
 * primary tree, every later one starts a related (nested) tree.
 */
export type FileScope = 'primary' | 'related';

/**
 * How a file's content made it into the document
 */
export type ContentMode = 'full' | 'truncated' | 'summarized' | 'error';

export interface ContextTemplate {
  /** Text placed before the repository structure block */
  preamble: string;
  taskOpen: string;
  taskClose: string;
}
