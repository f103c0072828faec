/**
 * Summarizer registry keyed by file extension
 */

import { extensionOf } from '@repo-context/core';
import { PythonSummarizer } from './python/python-summarizer.js';
import { TypeScriptSummarizer } from './typescript/ts-summarizer.js';
import type { Summarizer, SummarizerOptions } from './types/index.js';

export class SummarizerRegistry {
  private readonly byExtension = new Map<string, Summarizer>();

  constructor(summarizers: Iterable<Summarizer> = []) {
    for (const summarizer of summarizers) {
      this.register(summarizer);
    }
  }

  /**
   * Register `summarizer` for its extensions; a later registration wins
   */
  register(summarizer: Summarizer): this {
    for (const extension of summarizer.extensions) {
      this.byExtension.set(extension.toLowerCase(), summarizer);
    }
    return this;
  }

  forPath(filePath: string): Summarizer | undefined {
    return this.byExtension.get(extensionOf(filePath));
  }

  /**
   * Source files are the ones some summarizer understands
   */
  isSource(filePath: string): boolean {
    return this.forPath(filePath) !== undefined;
  }

  get extensions(): string[] {
    return [...this.byExtension.keys()];
  }
}

export function createDefaultRegistry(options: SummarizerOptions = {}): SummarizerRegistry {
  return new SummarizerRegistry([new PythonSummarizer(options), new TypeScriptSummarizer()]);
}
