/**
 * Diagnostics Store
 *
 * Holds the diagnostics of the last deployment, keyed by file name, until the
 * next deployment clears them.
 */

import { writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { DiagnosticMap, DiagnosticRecord, DiagnosticSink } from './diagnostics.types.js';

export class DiagnosticsStore {
  private entries: DiagnosticMap = new Map();

  clear(): void {
    this.entries = new Map();
  }

  /**
   * Append diagnostics per file; earlier entries for the same file are kept
   */
  add(diagnostics: DiagnosticMap): void {
    for (const [fileName, records] of diagnostics) {
      const existing = this.entries.get(fileName) ?? [];
      this.entries.set(fileName, [...existing, ...records]);
    }
  }

  get(fileName: string): readonly DiagnosticRecord[] {
    return this.entries.get(fileName) ?? [];
  }

  /**
   * Copy of the stored diagnostics, safe to hand to a sink
   */
  snapshot(): DiagnosticMap {
    const copy: DiagnosticMap = new Map();
    for (const [fileName, records] of this.entries) {
      copy.set(fileName, records.map((record) => ({ ...record })));
    }
    return copy;
  }

  /** Number of files with diagnostics */
  get size(): number {
    return this.entries.size;
  }
}

// Singleton instance
export const diagnosticsStore = new DiagnosticsStore();

/**
 * Writes diagnostics as `{ "<file name>": DiagnosticRecord[] }` for an editor
 * to pick up
 */
export class JsonFileDiagnosticSink implements DiagnosticSink {
  constructor(private readonly filePath: string) {}

  async publish(diagnostics: DiagnosticMap): Promise<void> {
    await this.write(Object.fromEntries(diagnostics));
  }

  async clear(): Promise<void> {
    await this.write({});
  }

  private async write(content: Record<string, DiagnosticRecord[]>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(content, null, 2), 'utf-8');
  }
}
