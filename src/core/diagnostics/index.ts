/**
 * Diagnostics Module
 * Failure extraction and per-file diagnostics
 */

export {
  extractFailureRecords,
  mergeFailureRecord,
  toDiagnostic,
  toDiagnostics,
  countDiagnostics,
} from './extractor.js';
export { DiagnosticsStore, diagnosticsStore, JsonFileDiagnosticSink } from './store.js';

export type {
  FailureRecord,
  FailureRecordMap,
  DiagnosticRecord,
  DiagnosticSeverity,
  DiagnosticMap,
  DiagnosticSink,
} from './diagnostics.types.js';
