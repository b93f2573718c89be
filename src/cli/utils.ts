/**
 * CLI Utility Functions
 * Shared helpers for CLI commands
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { wrapError } from '../utils/errors.js';

// ============================================================================
// Constants
// ============================================================================

export const CLI_CONSTANTS = {
  // Display formatting
  DIVIDER_LENGTH: 70,
  LOCATION_MAX_LENGTH: 40,

  // Selection list files
  COMMENT_PREFIX: '#',
} as const;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Parse a selection list: one file name or path per line, blank lines and
 * `#` comments ignored
 */
export function parseSelectionList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith(CLI_CONSTANTS.COMMENT_PREFIX));
}

export async function readSelectionList(listPath: string): Promise<string[]> {
  const resolvedPath = resolve(listPath);
  try {
    return parseSelectionList(await readFile(resolvedPath, 'utf-8'));
  } catch (error) {
    throw wrapError(`Failed to read selection list ${resolvedPath}`, error);
  }
}

/**
 * Pad or truncate text to a fixed width, keeping its tail
 */
export function fitToWidth(text: string, width: number): string {
  if (text.length <= width) {
    return text.padEnd(width);
  }
  return '…' + text.slice(text.length - width + 1);
}
