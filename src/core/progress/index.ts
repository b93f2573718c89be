/**
 * Progress Module
 */

export { createProgressHandle } from './progressReporter.js';
export type { ProgressHandle, ProgressBackend, ProgressSink } from './progressReporter.js';
