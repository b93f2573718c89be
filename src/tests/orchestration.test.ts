import { describe, it } from 'node:test';
import assert from 'node:assert';
import { join } from 'path';
import {
  SingleFlight,
  buildApexTestArgs,
  buildDeltaArgs,
  buildManifestDeployArgs,
  buildSingleFileDeployArgs,
} from '../core/orchestration/index.js';
import { createProgressHandle } from '../core/progress/index.js';
import type { ProgressBackend } from '../core/progress/index.js';
import { DEFAULT_CONFIG, resolveOptions } from '../config.js';
import type { MetadeployConfig } from '../config.js';

describe('SingleFlight', () => {
  it('should admit one owner at a time', () => {
    const guard = new SingleFlight<string>();

    assert.strictEqual(guard.tryAcquire('first'), true);
    assert.strictEqual(guard.tryAcquire('second'), false);
    assert.strictEqual(guard.current(), 'first');
    assert.strictEqual(guard.isHeld, true);
  });

  it('should only be released by its owner', () => {
    const guard = new SingleFlight<string>();
    guard.tryAcquire('first');

    guard.release('second');
    assert.strictEqual(guard.isHeld, true);

    guard.release('first');
    assert.strictEqual(guard.isHeld, false);
    assert.strictEqual(guard.tryAcquire('second'), true);
  });
});

describe('Progress Reporter', () => {
  function recordingBackend() {
    const events: string[] = [];
    const backend: ProgressBackend = {
      start: (title) => {
        events.push(`start ${title}`);
        return {
          update: (message, percentage) => events.push(`${percentage} ${message}`),
          stop: () => events.push('stop'),
        };
      },
    };
    return { events, backend };
  }

  it('should ignore reports and finishes after the first finish', () => {
    const { events, backend } = recordingBackend();
    const handle = createProgressHandle('Acct.cls', backend);

    handle.report('Deploying...', 50);
    handle.finish();
    handle.report('late', 90);
    handle.finish();

    assert.deepStrictEqual(events, ['start Acct.cls', '50 Deploying...', 'stop']);
    assert.strictEqual(handle.finished, true);
  });

  it('should clamp percentages into 0..100', () => {
    const { events, backend } = recordingBackend();
    const handle = createProgressHandle('t', backend);

    handle.report('low', -5);
    handle.report('high', 140);
    handle.report('fraction', 33.6);

    assert.deepStrictEqual(events, ['start t', '0 low', '100 high', '34 fraction']);
  });

  it('should be a no-op without a backend', () => {
    const handle = createProgressHandle('t');

    handle.report('anything', 10);
    handle.finish();

    assert.strictEqual(handle.finished, true);
  });
});

describe('sf CLI arguments', () => {
  it('should build a single-file deploy', () => {
    assert.deepStrictEqual(buildSingleFileDeployArgs('/p/A.cls', '60.0', false), [
      'project',
      'deploy',
      'start',
      '-d',
      '/p/A.cls',
      '--json',
      '--api-version',
      '60.0',
    ]);
  });

  it('should build a manifest deploy ignoring conflicts', () => {
    assert.deepStrictEqual(buildManifestDeployArgs('/c/package.xml', '65.0', true), [
      'project',
      'deploy',
      'start',
      '--manifest',
      '/c/package.xml',
      '--json',
      '--api-version',
      '65.0',
      '--ignore-conflicts',
    ]);
  });

  it('should build a class test run', () => {
    assert.deepStrictEqual(buildApexTestArgs('AccountTest', undefined, false), [
      'apex',
      'run',
      'test',
      '--synchronous',
      '--class-names',
      'AccountTest',
      '--json',
    ]);
  });

  it('should build a method test run with coverage', () => {
    assert.deepStrictEqual(buildApexTestArgs('AccountTest', 'createsOwner', true), [
      'apex',
      'run',
      'test',
      '--synchronous',
      '--tests',
      'AccountTest.createsOwner',
      '--json',
      '--code-coverage',
    ]);
  });

  it('should build the delta command', () => {
    assert.deepStrictEqual(buildDeltaArgs('origin/main', '/c/delta'), [
      'sgd',
      'source',
      'delta',
      '-c',
      '--from',
      'origin/main',
      '--output-dir',
      '/c/delta',
    ]);
  });
});

describe('resolveOptions', () => {
  const base: MetadeployConfig = { ...DEFAULT_CONFIG };

  it('should derive absolute cache paths from the working directory', () => {
    const cwd = join('/work', 'project');
    const options = resolveOptions({}, base, cwd);
    const cachePath = join(cwd, '.sf', 'metadeploy');

    assert.deepStrictEqual(options, {
      sfCliPath: 'sf',
      apiVersion: '65.0',
      cachePath,
      deployFilePath: join(cachePath, 'deploy.json'),
      diagnosticsFilePath: join(cachePath, 'diagnostics.json'),
      deltaPath: join(cachePath, 'delta'),
      deltaManifestPath: join(cachePath, 'delta', 'package', 'package.xml'),
      deltaFrom: 'HEAD',
      testResultsFilePath: join(cachePath, 'test.json'),
      coverageResultsFilePath: join(cachePath, 'coverage.json'),
      sourceDir: join(cwd, 'force-app'),
      debug: false,
    });
  });

  it('should let overrides win and ignore undefined ones', () => {
    const options = resolveOptions(
      { apiVersion: '61.0', cachePath: '/tmp/cache', deltaFrom: undefined },
      base,
      '/work'
    );

    assert.strictEqual(options.apiVersion, '61.0');
    assert.strictEqual(options.deployFilePath, join('/tmp/cache', 'deploy.json'));
    assert.strictEqual(options.deltaFrom, 'HEAD');
  });
});
