/**
 * Decide how each walked file is emitted
 */

import type { AssemblyPolicy, ContentMode } from '@repo-context/core';
import type { ScannedFile } from '@repo-context/scanner';
import type { SummarizerRegistry } from '@repo-context/summarizer';

export type ContentDecision = Exclude<ContentMode, 'error'> | 'skip';

/**
 * Rules, first match wins:
 * 1. related and skipRelated: skipped unless the extension is kept, then truncated
 * 2. related source: summarized
 * 3. non-source: truncated
 * 4. primary source: full
 */
export function decideContent(
  file: Pick<ScannedFile, 'scope' | 'extension' | 'relativePath'>,
  policy: Pick<AssemblyPolicy, 'skipRelated' | 'relatedKeepExtensions'>,
  registry: SummarizerRegistry
): ContentDecision {
  const isSource = registry.isSource(file.relativePath);

  if (file.scope === 'related' && policy.skipRelated) {
    return policy.relatedKeepExtensions.includes(file.extension) ? 'truncated' : 'skip';
  }
  if (file.scope === 'related' && isSource) {
    return 'summarized';
  }
  if (!isSource) {
    return 'truncated';
  }
  return 'full';
}
