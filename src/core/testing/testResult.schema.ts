/**
 * Schemas for the JSON printed by `sf apex run test --json`
 */

import { z } from 'zod';
import { lenientList, optionalText } from '../classification/deployResponse.schema.js';

/** Counts arrive as numbers or numeric strings; anything else counts as 0. */
const count = z.unknown().transform((value): number => {
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : Number.NaN;
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : 0;
});

export const testSummarySchema = z.object({
  outcome: optionalText,
  testsRan: count,
  passing: count,
  failing: count,
  skipped: count,
  passRate: optionalText,
  failRate: optionalText,
  testExecutionTime: optionalText,
});

export const testMethodResultSchema = z.object({
  Outcome: optionalText,
  FullName: optionalText,
  MethodName: optionalText,
  Message: optionalText,
  StackTrace: optionalText,
  ApexClass: z.object({ Name: z.string() }).optional().catch(undefined),
});

/**
 * Only requires `result`; a missing summary is reported separately
 */
export const testRunEnvelopeSchema = z.object({
  result: z.object({
    summary: z.unknown().optional(),
    tests: lenientList(testMethodResultSchema),
  }),
});

export type TestMethodResult = z.output<typeof testMethodResultSchema>;
