import dotenv from 'dotenv';
import { join, resolve } from 'path';
import type { DeploymentSettings } from './core/orchestration/index.js';
import type { TestRunSettings } from './core/testing/index.js';
import { DELTA_MANIFEST_SEGMENTS } from './utils/constants.js';

// Load environment variables from .env file (if it exists)
dotenv.config();

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  // sf CLI
  sfCliPath: 'sf', // on Windows this is usually "sf.cmd"
  apiVersion: '65.0',

  // Cache layout
  cachePath: join('.sf', 'metadeploy'),
  deployFile: 'deploy.json',
  diagnosticsFile: 'diagnostics.json',
  deltaDir: 'delta',
  testResultsFile: 'test.json',
  coverageResultsFile: 'coverage.json',

  // Project layout
  sourceDir: 'force-app',
  deltaFrom: 'HEAD',

  debug: false,
} as const;

/**
 * Get a string from an environment variable, falling back to a default
 */
function envString(envKey: string, defaultValue: string): string {
  const envValue = process.env[envKey];
  return envValue === undefined || envValue === '' ? defaultValue : envValue;
}

function envBoolean(envKey: string, defaultValue: boolean): boolean {
  const envValue = process.env[envKey];
  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }
  return envValue.toLowerCase() === 'true';
}

/**
 * Configuration before derived paths are resolved
 */
export interface MetadeployConfig {
  sfCliPath: string;
  apiVersion: string;
  cachePath: string;
  deployFile: string;
  diagnosticsFile: string;
  deltaDir: string;
  testResultsFile: string;
  coverageResultsFile: string;
  sourceDir: string;
  deltaFrom: string;
  debug: boolean;
}

/**
 * Application configuration loaded from environment variables
 */
export const config: MetadeployConfig = {
  sfCliPath: envString('SF_CLI_PATH', DEFAULT_CONFIG.sfCliPath),
  apiVersion: envString('SF_API_VERSION', DEFAULT_CONFIG.apiVersion),
  cachePath: envString('METADEPLOY_CACHE_PATH', DEFAULT_CONFIG.cachePath),
  deployFile: envString('METADEPLOY_DEPLOY_FILE', DEFAULT_CONFIG.deployFile),
  diagnosticsFile: envString('METADEPLOY_DIAGNOSTICS_FILE', DEFAULT_CONFIG.diagnosticsFile),
  deltaDir: envString('METADEPLOY_DELTA_DIR', DEFAULT_CONFIG.deltaDir),
  testResultsFile: envString('METADEPLOY_TEST_RESULTS_FILE', DEFAULT_CONFIG.testResultsFile),
  coverageResultsFile: envString(
    'METADEPLOY_COVERAGE_RESULTS_FILE',
    DEFAULT_CONFIG.coverageResultsFile
  ),
  sourceDir: envString('METADEPLOY_SOURCE_DIR', DEFAULT_CONFIG.sourceDir),
  deltaFrom: envString('METADEPLOY_DELTA_FROM', DEFAULT_CONFIG.deltaFrom),
  debug: envBoolean('METADEPLOY_DEBUG', DEFAULT_CONFIG.debug),
};

/**
 * Fully resolved options: every path absolute
 */
export interface ResolvedOptions extends DeploymentSettings, TestRunSettings {
  diagnosticsFilePath: string;
  sourceDir: string;
  debug: boolean;
}

/**
 * Overlay `overrides` on the loaded configuration and derive absolute paths
 */
export function resolveOptions(
  overrides: Partial<MetadeployConfig> = {},
  base: MetadeployConfig = config,
  cwd: string = process.cwd()
): ResolvedOptions {
  const merged: MetadeployConfig = {
    sfCliPath: overrides.sfCliPath ?? base.sfCliPath,
    apiVersion: overrides.apiVersion ?? base.apiVersion,
    cachePath: overrides.cachePath ?? base.cachePath,
    deployFile: overrides.deployFile ?? base.deployFile,
    diagnosticsFile: overrides.diagnosticsFile ?? base.diagnosticsFile,
    deltaDir: overrides.deltaDir ?? base.deltaDir,
    testResultsFile: overrides.testResultsFile ?? base.testResultsFile,
    coverageResultsFile: overrides.coverageResultsFile ?? base.coverageResultsFile,
    sourceDir: overrides.sourceDir ?? base.sourceDir,
    deltaFrom: overrides.deltaFrom ?? base.deltaFrom,
    debug: overrides.debug ?? base.debug,
  };

  const cachePath = resolve(cwd, merged.cachePath);
  const deltaPath = join(cachePath, merged.deltaDir);

  return {
    sfCliPath: merged.sfCliPath,
    apiVersion: merged.apiVersion,
    cachePath,
    deployFilePath: join(cachePath, merged.deployFile),
    diagnosticsFilePath: join(cachePath, merged.diagnosticsFile),
    deltaPath,
    deltaManifestPath: join(deltaPath, ...DELTA_MANIFEST_SEGMENTS),
    deltaFrom: merged.deltaFrom,
    testResultsFilePath: join(cachePath, merged.testResultsFile),
    coverageResultsFilePath: join(cachePath, merged.coverageResultsFile),
    sourceDir: resolve(cwd, merged.sourceDir),
    debug: merged.debug,
  };
}
