/**
 * Schemas for the JSON printed by `sf project deploy start --json`
 *
 * Only the fields the classifier reads are modelled. The raw payload is kept
 * separately for callers that need the rest.
 */

import { z } from 'zod';
import { DEPLOY_SUCCEEDED_STATUS, SOURCE_CONFLICT_ERROR } from '../../utils/constants.js';

/**
 * Accepts an array, a lone object (the CLI collapses one-element lists) or
 * nothing, and keeps only the entries that match `item`.
 */
export function lenientList<T extends z.ZodTypeAny>(item: T) {
  return z
    .unknown()
    .transform((value): unknown[] => {
      if (value === undefined || value === null) return [];
      return Array.isArray(value) ? value : [value];
    })
    .transform((entries) =>
      entries.flatMap((entry): z.output<T>[] => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      })
    );
}

/** Line and column arrive as numbers or numeric strings. */
const position = z
  .unknown()
  .transform((value): number | undefined => {
    if (typeof value !== 'number' && typeof value !== 'string') return undefined;
    if (typeof value === 'string' && value.trim() === '') return undefined;
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
  });

export const optionalText = z
  .unknown()
  .transform((value) => (typeof value === 'string' ? value : undefined));

export const componentFailureSchema = z.object({
  fullName: z.string(),
  fileName: optionalText,
  lineNumber: position,
  columnNumber: position,
  problemType: optionalText,
  componentType: optionalText,
  problem: optionalText,
});

export const deployFileSchema = z.object({
  fullName: z.string(),
  filePath: optionalText,
  error: optionalText,
});

export const sourceConflictSchema = z.object({
  name: z.literal(SOURCE_CONFLICT_ERROR),
  message: optionalText,
});

export const deploySucceededSchema = z.object({
  result: z.object({
    status: z.literal(DEPLOY_SUCCEEDED_STATUS),
    success: z.literal(true),
  }),
});

export const componentFailureListSchema = lenientList(componentFailureSchema);
export const deployFileListSchema = lenientList(deployFileSchema);

const isPresent = (value: unknown) => value !== undefined && value !== null;

/**
 * A failed deploy worth attributing: component failures, or at least one
 * file entry that carries an error
 */
export const deployFailureDetailsSchema = z.object({
  result: z
    .object({
      details: z.object({ componentFailures: z.unknown().optional() }).optional(),
      files: z.unknown().optional(),
    })
    .refine(
      ({ details, files }) =>
        isPresent(details?.componentFailures) ||
        deployFileListSchema.parse(files).some((file) => Boolean(file.error)),
      { message: 'No component failures or file errors' }
    ),
});

export type ComponentFailure = z.output<typeof componentFailureSchema>;
export type DeployFile = z.output<typeof deployFileSchema>;
