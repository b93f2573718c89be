/**
 * Shared constants across the application
 */

// ============================================================================
// SF CLI commands
// ============================================================================

/**
 * Subcommands and flags of the `sf` CLI this tool drives:
 * - sf project deploy start -d <path> --json --api-version <v> [--ignore-conflicts]
 * - sf project deploy start --manifest <package.xml> --json --api-version <v>
 * - sf sgd source delta -c --from <ref> --output-dir <dir>
 * - sf apex run test --synchronous (--class-names <C> | --tests <C.m>) --json [--code-coverage]
 */
export const SF_CLI = {
  DEPLOY: {
    CMD: ['project', 'deploy', 'start'],
    SOURCE_DIR: '-d',
    MANIFEST: '--manifest',
    JSON: '--json',
    API_VERSION: '--api-version',
    IGNORE_CONFLICTS: '--ignore-conflicts',
  },
  DELTA: {
    CMD: ['sgd', 'source', 'delta'],
    COMPARE: '-c',
    FROM: '--from',
    OUTPUT_DIR: '--output-dir',
  },
  APEX_TEST: {
    CMD: ['apex', 'run', 'test'],
    SYNCHRONOUS: '--synchronous',
    CLASS_NAMES: '--class-names',
    TESTS: '--tests',
    JSON: '--json',
    CODE_COVERAGE: '--code-coverage',
  },
} as const;

// ============================================================================
// Apex test runs
// ============================================================================

/** `sf apex run test` exits 100 when the tests ran and some failed */
export const TEST_FAILURES_EXIT_CODE = 100;
export const TEST_FAILURE_OUTCOMES: readonly string[] = ['Fail', 'CompileFail'];

// ============================================================================
// Deploy response
// ============================================================================

export const SOURCE_CONFLICT_ERROR = 'SourceConflictError';
export const DEPLOY_SUCCEEDED_STATUS = 'Succeeded';
export const ERROR_PROBLEM_TYPE = 'Error';

// ============================================================================
// Diagnostics
// ============================================================================

/** The CLI never reports an end column; diagnostics run to end of line. */
export const DIAGNOSTIC_END_COLUMN = 255;
export const DIAGNOSTIC_SOURCE = 'sf';
export const DEFAULT_ERROR_POSITION = 1;

// ============================================================================
// Files
// ============================================================================

export const DELTA_MANIFEST_SEGMENTS = ['package', 'package.xml'] as const;
export const LOGS_DIR_NAME = 'logs';
export const SPAWN_FAILURE_EXIT_CODE = -1;

// ============================================================================
// Messages
// ============================================================================

export const MESSAGES = {
  CLI_NOT_FOUND: 'SF CLI not found. Please install it.',
  ALREADY_RUNNING: 'A deployment is already in progress. Please wait for it to finish.',
  NO_SELECTED_FILES: 'No valid, indexed files found in the selection list.',
  MISSING_INDEX_ENTRIES: 'Could not find index entry for: ',
  STARTING: 'Starting deployment...',
  PREPARING_MANIFEST: 'Preparing manifest...',
  MANIFEST_PREPARED: 'Manifest prepared',
  MANIFEST_SUCCESS: 'Manifest prepared successfully',
  MANIFEST_FAILURE: 'Failed to prepare manifest',
  DEPLOYING: 'Deploying...',
  DEPLOYING_SELECTED: 'Deploying selected files...',
  CHECKING_RESULT: 'Checking deployment result...',
  DEPLOY_SUCCESS: 'Deployment successful',
  DEPLOY_FAILURE: 'Deployment failed',
  PARSE_FAILURE: 'Failed to parse deployment result',
  SOURCE_CONFLICT: 'Source conflicts detected',
  DEFAULT_CONFLICT_MESSAGE: 'Source conflict detected',
} as const;

export const TEST_MESSAGES = {
  ALREADY_RUNNING: 'A deployment or test run is already in progress. Please wait for it to finish.',
  NO_CLASS_NAME: 'No test class name provided',
  NO_METHOD_NAME: 'Class name and method name are required',
  STARTING: 'Starting test execution...',
  STARTING_COVERAGE: 'Starting test execution with coverage...',
  EXECUTING: 'Executing tests...',
  EXECUTING_METHOD: 'Executing test method...',
  PROCESSING: 'Processing test results...',
  PASSED: 'Tests completed successfully',
  FAILED: 'Tests completed with failures',
  EXECUTION_FAILED: 'Test execution failed',
  PARSE_FAILURE: 'Failed to parse test results',
  NO_SUMMARY: 'No test summary found in results',
  NO_SAVED_RESULTS: 'No saved test results found',
} as const;
