/**
 * Result Classifier
 *
 * Maps the stdout and exit code of `sf project deploy start --json` to a
 * ClassifiedResult. Pure: no I/O, no logging.
 */

import { extractFailureRecords } from '../diagnostics/extractor.js';
import {
  componentFailureListSchema,
  deployFailureDetailsSchema,
  deployFileListSchema,
  deploySucceededSchema,
  sourceConflictSchema,
} from './deployResponse.schema.js';
import type { ClassifiedResult } from './classification.types.js';
import { MESSAGES } from '../../utils/constants.js';

type DecodeResult = { ok: true; value: unknown } | { ok: false };

function decodeJson(text: string): DecodeResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

export function classifyDeployResult(stdout: string, exitCode: number): ClassifiedResult {
  const decoded = decodeJson(stdout);
  if (!decoded.ok) {
    return { kind: 'parse_failure' };
  }
  const payload = decoded.value;

  // A conflict payload must be recognised before anything reads `result`.
  const conflict = sourceConflictSchema.safeParse(payload);
  if (conflict.success) {
    return {
      kind: 'source_conflict',
      message: conflict.data.message ?? MESSAGES.DEFAULT_CONFLICT_MESSAGE,
    };
  }

  if (deploySucceededSchema.safeParse(payload).success) {
    return { kind: 'success', payload };
  }

  const failure = deployFailureDetailsSchema.safeParse(payload);
  if (failure.success) {
    const { details, files } = failure.data.result;
    const records = extractFailureRecords(
      componentFailureListSchema.parse(details?.componentFailures),
      deployFileListSchema.parse(files)
    );
    return { kind: 'component_failures', records, payload };
  }

  if (exitCode !== 0) {
    return { kind: 'process_failure', exitCode };
  }

  // Exit 0 yet not succeeded and nothing to attribute the failure to
  return { kind: 'component_failures', records: new Map(), payload };
}

/**
 * Classify the line-split stdout of a finished job
 */
export function classifyJobOutput(stdoutLines: readonly string[], exitCode: number): ClassifiedResult {
  return classifyDeployResult(stdoutLines.join('\n'), exitCode);
}
