/**
 * Token estimation utilities for repo-context
 */

import type { TokenEstimator } from '../types/index.js';

/**
 * Word-run token estimator
 * Counts maximal runs of letters, digits and underscores. A size signal for
 * the operator, not a model tokenizer.
 */
export class WordRunTokenEstimator implements TokenEstimator {
  private readonly wordRun = /[\p{L}\p{N}_]+/gu;

  estimate(text: string): number {
    if (!text) return 0;
    return text.match(this.wordRun)?.length ?? 0;
  }
}

/**
 * Default token estimator instance
 */
export const defaultTokenEstimator: TokenEstimator = new WordRunTokenEstimator();

/**
 * Estimate tokens using default strategy
 */
export function estimateTokens(text: string): number {
  return defaultTokenEstimator.estimate(text);
}
