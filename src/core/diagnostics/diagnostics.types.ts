/**
 * Diagnostics Domain Types
 */

/**
 * One component's deploy failure, merged from the component-level entry
 * (`result.details.componentFailures`) and the file-level entry
 * (`result.files`) sharing its full name.
 */
export interface FailureRecord {
  fullName: string;
  fileName?: string;
  filePath?: string;
  /** 1-based; treated as 1 when absent */
  errorLine?: number;
  /** 1-based; treated as 1 when absent */
  errorColumn?: number;
  /** "Error" or "Warning" */
  errorType?: string;
  componentType?: string;
  /** File-level error text */
  errorMessage?: string;
  /** Component-level problem text */
  problem?: string;
}

export type FailureRecordMap = Map<string, FailureRecord>;

export type DiagnosticSeverity = 'error' | 'warning' | 'info' | 'hint';

export interface DiagnosticRecord {
  severity: DiagnosticSeverity;
  message: string;
  /** 0-based */
  line: number;
  /** 0-based */
  column: number;
  endColumn: number;
  /** Base name of the owning file, which is how editors match buffers */
  fileName: string;
  source: string;
}

/** Diagnostics keyed by file name */
export type DiagnosticMap = Map<string, DiagnosticRecord[]>;

/**
 * Receives the stored diagnostics, e.g. an editor bridge or a JSON file
 */
export interface DiagnosticSink {
  publish(diagnostics: DiagnosticMap): Promise<void>;
  clear(): Promise<void>;
}
