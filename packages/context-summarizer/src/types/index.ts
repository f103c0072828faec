/**
 * Types for repo-context summarizer
 */

/**
 * One source language able to reduce a file to its declaration digest:
 * signatures, base types, fields and documentation, bodies left out.
 */
export interface Summarizer {
  readonly id: string;
  readonly language: string;
  /** Lower-cased extensions with the dot */
  readonly extensions: readonly string[];

  /**
   * Produce the digest. Never throws: a source that cannot be parsed yields
   * a single comment-style line naming the failure.
   */
  summarize(source: string, fileName?: string): string;
}

export interface SummarizerOptions {
  /** Drop an implicit leading `self` parameter from Python signatures */
  stripSelf?: boolean;
}
