/**
 * @repo-context/summarizer
 * Declaration digests for source files
 */

export * from './types/index.js';
export * from './registry.js';
export { PythonSummarizer, PYTHON_PARSE_ERROR_PREFIX } from './python/python-summarizer.js';
export { cleanDocstring, docstringValue } from './python/docstring.js';
export { TypeScriptSummarizer, TS_PARSE_ERROR_PREFIX } from './typescript/ts-summarizer.js';
