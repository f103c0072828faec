/**
 * @repo-context/pack
 * Context document assembly
 */

export { assembleContext, resolveAllowList } from './api/assemble.js';
export { decideContent, type ContentDecision } from './policy/content-policy.js';
export { readText, truncateLines } from './read/read-file.js';
export {
  renderDocument,
  renderFileSection,
  stripMarker,
  FILES_CLOSE,
  FILES_OPEN,
  INPUT_CLOSE,
  STRUCTURE_CLOSE,
  STRUCTURE_OPEN,
  type DocumentParts,
  type DocumentSection,
} from './formatter/document.js';
export type * from './types/index.js';
