import { describe, it, expect } from 'vitest';
import { createDefaultRegistry } from '@repo-context/summarizer';
import { decideContent } from '../policy/content-policy.js';

const registry = createDefaultRegistry();
const policy = { skipRelated: false, relatedKeepExtensions: ['.md'] };

describe('decideContent', () => {
  it('should keep primary sources in full and truncate other primary files', () => {
    expect(decideContent({ scope: 'primary', extension: '.py', relativePath: 'a.py' }, policy, registry)).toBe('full');
    expect(decideContent({ scope: 'primary', extension: '.txt', relativePath: 'a.txt' }, policy, registry)).toBe('truncated');
  });

  it('should summarize related sources', () => {
    expect(decideContent({ scope: 'related', extension: '.ts', relativePath: 'lib/x.ts' }, policy, registry)).toBe('summarized');
    expect(decideContent({ scope: 'related', extension: '.json', relativePath: 'lib/x.json' }, policy, registry)).toBe('truncated');
  });

  it('should skip related files unless their extension is kept', () => {
    const skipping = { ...policy, skipRelated: true };
    expect(decideContent({ scope: 'related', extension: '.py', relativePath: 'lib/x.py' }, skipping, registry)).toBe('skip');
    expect(decideContent({ scope: 'related', extension: '.md', relativePath: 'lib/README.md' }, skipping, registry)).toBe('truncated');
  });
});
