/**
 * Selection Module
 * Selected-file resolution for selected-set deployments
 */

export { FileIndex, buildFileIndex } from './fileIndex.js';
export { markFilesDirty } from './forceDirty.js';
export type { SelectionResolution } from './fileIndex.js';
