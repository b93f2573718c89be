/**
 * Classification Domain Types
 */

import type { FailureRecordMap } from '../diagnostics/diagnostics.types.js';

/**
 * Outcome of one deploy invocation. Exactly one variant holds for any
 * (stdout, exit code) pair.
 */
export type ClassifiedResult =
  | { kind: 'success'; payload: unknown }
  | { kind: 'source_conflict'; message: string }
  | { kind: 'component_failures'; records: FailureRecordMap; payload: unknown }
  | { kind: 'process_failure'; exitCode: number }
  | { kind: 'parse_failure' };

export type ClassifiedResultKind = ClassifiedResult['kind'];
