import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DiagnosticsStore,
  JsonFileDiagnosticSink,
  countDiagnostics,
  extractFailureRecords,
  mergeFailureRecord,
  toDiagnostic,
  toDiagnostics,
} from '../core/diagnostics/index.js';
import type { DiagnosticMap, DiagnosticRecord, FailureRecordMap } from '../core/diagnostics/index.js';

function diagnostic(fileName: string, message: string, line = 0): DiagnosticRecord {
  return { severity: 'error', message, line, column: 0, endColumn: 255, fileName, source: 'sf' };
}

describe('Diagnostic Extractor', () => {
  describe('mergeFailureRecord', () => {
    it('should copy the incoming record when there is nothing to merge into', () => {
      const merged = mergeFailureRecord(undefined, { fullName: 'Foo', errorLine: 5 });
      assert.deepStrictEqual(merged, { fullName: 'Foo', errorLine: 5 });
    });

    it('should never overwrite a populated field', () => {
      const merged = mergeFailureRecord(
        { fullName: 'Foo', errorLine: 5, errorMessage: 'first' },
        { fullName: 'Foo', errorLine: 8, errorMessage: 'second', filePath: 'classes/Foo.cls' }
      );
      assert.deepStrictEqual(merged, {
        fullName: 'Foo',
        errorLine: 5,
        errorMessage: 'first',
        filePath: 'classes/Foo.cls',
      });
    });

    it('should fill fields that are explicitly undefined', () => {
      const merged = mergeFailureRecord(
        { fullName: 'Foo', filePath: undefined },
        { fullName: 'Foo', filePath: 'classes/Foo.cls' }
      );
      assert.strictEqual(merged.filePath, 'classes/Foo.cls');
    });
  });

  describe('extractFailureRecords', () => {
    it('should combine the line of a component failure with the message of a file entry', () => {
      const records = extractFailureRecords(
        [{ fullName: 'Foo', lineNumber: 5 }],
        [{ fullName: 'Foo', error: 'bad thing' }]
      );

      assert.strictEqual(records.size, 1);
      const record = records.get('Foo');
      assert.ok(record);
      assert.strictEqual(record.errorLine, 5);
      assert.strictEqual(record.errorMessage, 'bad thing');
    });

    it('should keep the first component failure when a name repeats', () => {
      const records = extractFailureRecords(
        [
          { fullName: 'Foo', lineNumber: 3, problemType: 'Error' },
          { fullName: 'Foo', lineNumber: 9, problemType: 'Warning' },
        ],
        []
      );
      const record = records.get('Foo');
      assert.ok(record);
      assert.strictEqual(record.errorLine, 3);
      assert.strictEqual(record.errorType, 'Error');
    });

    it('should skip file entries without an error', () => {
      const records = extractFailureRecords(
        [],
        [
          { fullName: 'Clean', filePath: 'classes/Clean.cls', error: '' },
          { fullName: 'Quiet', filePath: 'classes/Quiet.cls' },
        ]
      );
      assert.strictEqual(records.size, 0);
    });
  });

  describe('toDiagnostics', () => {
    it('should default missing line and column to the first position', () => {
      const result = toDiagnostic({
        fullName: 'Foo',
        errorType: 'Error',
        filePath: 'classes/Foo.cls',
        errorMessage: 'bad thing',
      });
      assert.strictEqual(result.line, 0);
      assert.strictEqual(result.column, 0);
      assert.strictEqual(result.endColumn, 255);
    });

    it('should skip non-Error records without dropping the ones after them', () => {
      const records: FailureRecordMap = new Map([
        ['Warned', { fullName: 'Warned', errorType: 'Warning', filePath: 'classes/Warned.cls' }],
        [
          'Broken',
          { fullName: 'Broken', errorType: 'Error', filePath: 'classes/Broken.cls', errorLine: 2 },
        ],
      ]);

      const diagnostics = toDiagnostics(records);
      assert.deepStrictEqual([...diagnostics.keys()], ['Broken.cls']);
      assert.strictEqual(diagnostics.get('Broken.cls')?.[0]?.line, 1);
    });

    it('should group diagnostics for the same file name', () => {
      const records: FailureRecordMap = new Map([
        ['A', { fullName: 'A', errorType: 'Error', filePath: 'one/Shared.cls', errorMessage: 'a' }],
        ['B', { fullName: 'B', errorType: 'Error', filePath: 'two/Shared.cls', errorMessage: 'b' }],
      ]);

      const diagnostics = toDiagnostics(records);
      assert.strictEqual(diagnostics.size, 1);
      assert.deepStrictEqual(
        diagnostics.get('Shared.cls')?.map((d) => d.message),
        ['a', 'b']
      );
      assert.strictEqual(countDiagnostics(diagnostics), 2);
    });

    it('should fall back to the component file name, then the full name', () => {
      const fromFileName = toDiagnostic({
        fullName: 'Acct',
        errorType: 'Error',
        fileName: 'classes/Acct.cls',
        problem: 'Unexpected token',
      });
      assert.strictEqual(fromFileName.fileName, 'Acct.cls');
      assert.strictEqual(fromFileName.message, 'Unexpected token');

      const fromFullName = toDiagnostic({ fullName: 'Acct', errorType: 'Error' });
      assert.strictEqual(fromFullName.fileName, 'Acct');
      assert.strictEqual(fromFullName.message, 'Acct failed to deploy');
    });
  });
});

describe('DiagnosticsStore', () => {
  it('should stay empty when cleared twice in a row', () => {
    const store = new DiagnosticsStore();
    store.add(new Map([['Foo.cls', [diagnostic('Foo.cls', 'bad')]]]));

    store.clear();
    assert.strictEqual(store.size, 0);
    store.clear();
    assert.strictEqual(store.size, 0);
    assert.deepStrictEqual(store.get('Foo.cls'), []);
  });

  it('should append diagnostics for a file already in the store', () => {
    const store = new DiagnosticsStore();
    store.add(new Map([['Foo.cls', [diagnostic('Foo.cls', 'first')]]]));
    store.add(new Map([['Foo.cls', [diagnostic('Foo.cls', 'second', 4)]]]));

    assert.deepStrictEqual(
      store.get('Foo.cls').map((d) => d.message),
      ['first', 'second']
    );
  });

  it('should hand out snapshots that do not alias the store', () => {
    const store = new DiagnosticsStore();
    store.add(new Map([['Foo.cls', [diagnostic('Foo.cls', 'original')]]]));

    const snapshot = store.snapshot();
    const copied = snapshot.get('Foo.cls')?.[0];
    assert.ok(copied);
    copied.message = 'changed';

    assert.strictEqual(store.get('Foo.cls')[0]?.message, 'original');
  });
});

describe('JsonFileDiagnosticSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'metadeploy-sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write diagnostics keyed by file name', async () => {
    const filePath = join(dir, 'nested', 'diagnostics.json');
    const sink = new JsonFileDiagnosticSink(filePath);
    const diagnostics: DiagnosticMap = new Map([['Foo.cls', [diagnostic('Foo.cls', 'bad', 3)]]]);

    await sink.publish(diagnostics);

    const written: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    assert.deepStrictEqual(written, {
      'Foo.cls': [
        {
          severity: 'error',
          message: 'bad',
          line: 3,
          column: 0,
          endColumn: 255,
          fileName: 'Foo.cls',
          source: 'sf',
        },
      ],
    });
  });

  it('should write an empty object on clear', async () => {
    const filePath = join(dir, 'diagnostics.json');
    const sink = new JsonFileDiagnosticSink(filePath);

    await sink.clear();

    assert.strictEqual(await readFile(filePath, 'utf-8'), '{}');
  });
});
