import { appendFile } from 'fs/promises';
import { wrapError } from '../../utils/errors.js';

/**
 * Append a trailing newline to each file so the change-detection tool sees
 * them as modified even when they have no real edits. Kept in one place so it
 * can go away if the delta tool ever accepts an explicit file list.
 */
export async function markFilesDirty(files: readonly string[]): Promise<void> {
  for (const file of files) {
    try {
      await appendFile(file, '\n', 'utf-8');
    } catch (error) {
      throw wrapError(`Failed to open file for modification: ${file}`, error);
    }
  }
}
