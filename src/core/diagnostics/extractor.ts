/**
 * Diagnostic Extractor
 *
 * Turns the component failures of a failed deploy into per-file diagnostics.
 */

import { basename } from 'path';
import type { ComponentFailure, DeployFile } from '../classification/deployResponse.schema.js';
import type {
  DiagnosticMap,
  DiagnosticRecord,
  FailureRecord,
  FailureRecordMap,
} from './diagnostics.types.js';
import {
  DEFAULT_ERROR_POSITION,
  DIAGNOSTIC_END_COLUMN,
  DIAGNOSTIC_SOURCE,
  ERROR_PROBLEM_TYPE,
} from '../../utils/constants.js';

const MERGED_FIELDS = [
  'fileName',
  'filePath',
  'errorLine',
  'errorColumn',
  'errorType',
  'componentType',
  'errorMessage',
  'problem',
] as const;

/**
 * Keep-biased merge: every field already set on `existing` wins; `incoming`
 * only fills fields that are still undefined. `fullName` never changes.
 */
export function mergeFailureRecord(
  existing: FailureRecord | undefined,
  incoming: FailureRecord
): FailureRecord {
  if (!existing) {
    return { ...incoming };
  }

  const merged: FailureRecord = { ...existing };
  for (const field of MERGED_FIELDS) {
    if (merged[field] === undefined && incoming[field] !== undefined) {
      assignField(merged, field, incoming);
    }
  }
  return merged;
}

function assignField<K extends (typeof MERGED_FIELDS)[number]>(
  target: FailureRecord,
  field: K,
  source: FailureRecord
): void {
  target[field] = source[field];
}

function upsert(records: FailureRecordMap, incoming: FailureRecord): void {
  records.set(incoming.fullName, mergeFailureRecord(records.get(incoming.fullName), incoming));
}

/**
 * Build one failure record per component full name
 */
export function extractFailureRecords(
  componentFailures: readonly ComponentFailure[],
  files: readonly DeployFile[]
): FailureRecordMap {
  const records: FailureRecordMap = new Map();

  for (const failure of componentFailures) {
    upsert(records, {
      fullName: failure.fullName,
      fileName: failure.fileName,
      errorLine: failure.lineNumber,
      errorColumn: failure.columnNumber,
      errorType: failure.problemType,
      componentType: failure.componentType,
      problem: failure.problem,
    });
  }

  for (const file of files) {
    if (!file.error) continue;
    upsert(records, {
      fullName: file.fullName,
      filePath: file.filePath,
      errorMessage: file.error,
    });
  }

  return records;
}

function owningFileName(record: FailureRecord): string {
  const location = record.filePath ?? record.fileName;
  return location ? basename(location) : record.fullName;
}

export function toDiagnostic(record: FailureRecord): DiagnosticRecord {
  const line = record.errorLine ?? DEFAULT_ERROR_POSITION;
  const column = record.errorColumn ?? DEFAULT_ERROR_POSITION;

  return {
    severity: 'error',
    message: record.errorMessage ?? record.problem ?? `${record.fullName} failed to deploy`,
    line: line - 1,
    column: column - 1,
    endColumn: DIAGNOSTIC_END_COLUMN,
    fileName: owningFileName(record),
    source: DIAGNOSTIC_SOURCE,
  };
}

/**
 * Group "Error" records into diagnostics by file name. Records of any other
 * problem type are skipped one by one; later records are still processed.
 */
export function toDiagnostics(records: FailureRecordMap): DiagnosticMap {
  const diagnostics: DiagnosticMap = new Map();

  for (const record of records.values()) {
    if (record.errorType !== ERROR_PROBLEM_TYPE) continue;

    const diagnostic = toDiagnostic(record);
    const existing = diagnostics.get(diagnostic.fileName);
    if (existing) {
      existing.push(diagnostic);
    } else {
      diagnostics.set(diagnostic.fileName, [diagnostic]);
    }
  }

  return diagnostics;
}

export function countDiagnostics(diagnostics: DiagnosticMap): number {
  let total = 0;
  for (const list of diagnostics.values()) {
    total += list.length;
  }
  return total;
}
