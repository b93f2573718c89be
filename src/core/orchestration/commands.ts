/**
 * Argument lists for the sf CLI invocations
 */

import { SF_CLI } from '../../utils/constants.js';

function deployArgs(
  target: readonly [string, string],
  apiVersion: string,
  ignoreConflicts: boolean
): string[] {
  const args: string[] = [
    ...SF_CLI.DEPLOY.CMD,
    ...target,
    SF_CLI.DEPLOY.JSON,
    SF_CLI.DEPLOY.API_VERSION,
    apiVersion,
  ];
  if (ignoreConflicts) {
    args.push(SF_CLI.DEPLOY.IGNORE_CONFLICTS);
  }
  return args;
}

/** sf project deploy start -d <file> --json --api-version <v> [--ignore-conflicts] */
export function buildSingleFileDeployArgs(
  filePath: string,
  apiVersion: string,
  ignoreConflicts: boolean
): string[] {
  return deployArgs([SF_CLI.DEPLOY.SOURCE_DIR, filePath], apiVersion, ignoreConflicts);
}

/** sf project deploy start --manifest <package.xml> --json --api-version <v> [--ignore-conflicts] */
export function buildManifestDeployArgs(
  manifestPath: string,
  apiVersion: string,
  ignoreConflicts: boolean
): string[] {
  return deployArgs([SF_CLI.DEPLOY.MANIFEST, manifestPath], apiVersion, ignoreConflicts);
}

/** sf sgd source delta -c --from <ref> --output-dir <dir> */
export function buildDeltaArgs(fromRef: string, outputDir: string): string[] {
  return [
    ...SF_CLI.DELTA.CMD,
    SF_CLI.DELTA.COMPARE,
    SF_CLI.DELTA.FROM,
    fromRef,
    SF_CLI.DELTA.OUTPUT_DIR,
    outputDir,
  ];
}

/** sf apex run test --synchronous (--class-names <C> | --tests <C.m>) --json [--code-coverage] */
export function buildApexTestArgs(
  className: string,
  methodName: string | undefined,
  coverage: boolean
): string[] {
  const selector: string[] = methodName
    ? [SF_CLI.APEX_TEST.TESTS, `${className}.${methodName}`]
    : [SF_CLI.APEX_TEST.CLASS_NAMES, className];
  const args: string[] = [
    ...SF_CLI.APEX_TEST.CMD,
    SF_CLI.APEX_TEST.SYNCHRONOUS,
    ...selector,
    SF_CLI.APEX_TEST.JSON,
  ];
  if (coverage) {
    args.push(SF_CLI.APEX_TEST.CODE_COVERAGE);
  }
  return args;
}
