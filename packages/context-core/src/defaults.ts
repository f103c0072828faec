/**
 * Default configuration for repo-context
 */

import type { ContextTemplate } from './types/index.js';

/**
 * Lines kept from files emitted as truncated prefixes
 */
export const DEFAULT_MAX_LINES = 500;

/**
 * File whose presence makes a directory declare an exclusion rule set
 */
export const DEFAULT_RULE_FILE = '.gitignore';

/**
 * Names starting with this prefix are hidden
 */
export const HIDDEN_PREFIX = '.';

/**
 * Non-source extensions still emitted from related trees when they are skipped
 */
export const DEFAULT_RELATED_KEEP_EXTENSIONS: readonly string[] = ['.md'];

export const DEFAULT_PREAMBLE = `You are an experienced software engineer. Below is a repository given as context:
its directory structure followed by the contents of its files.

The main part of the repository is included in full. Related repositories nested
inside it are reduced to declaration digests: signatures, base types, fields and
documentation, with bodies left out. Large non-source files are cut to their first lines.

Use the repository to:
1. Understand the existing architecture before proposing changes.
2. Reuse the functions and classes it already provides.
3. Write code that fits its conventions and integrates with it directly.

Then carry out the task given after the repository.

<input>`;

/**
 * Default document template
 */
export const DEFAULT_TEMPLATE: ContextTemplate = {
  preamble: DEFAULT_PREAMBLE,
  taskOpen: '<task>',
  taskClose: '</task>',
};

