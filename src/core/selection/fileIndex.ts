/**
 * File Index
 *
 * Maps bare file names to full paths under the project source directory.
 * Editors and selection lists refer to metadata files by name
 * (`AccountService.cls`), the deploy tooling needs paths.
 */

import { readdir } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('index');

export interface SelectionResolution {
  /** Full paths, deduplicated, in selection order */
  found: string[];
  /** File names with no index entry, deduplicated */
  missing: string[];
}

export class FileIndex {
  private readonly entries: Map<string, string>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    this.entries = new Map(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  get(fileName: string): string | undefined {
    return this.entries.get(fileName);
  }

  set(fileName: string, fullPath: string): void {
    this.entries.set(fileName, fullPath);
  }

  /**
   * Resolve selection entries (names or paths) by their base name
   */
  resolveSelection(selection: readonly string[]): SelectionResolution {
    const found: string[] = [];
    const missing: string[] = [];

    for (const entry of selection) {
      const trimmed = entry.trim();
      if (trimmed === '') continue;

      const fileName = basename(trimmed);
      const fullPath = this.entries.get(fileName);
      if (fullPath) {
        if (!found.includes(fullPath)) found.push(fullPath);
      } else if (!missing.includes(fileName)) {
        missing.push(fileName);
      }
    }

    return { found, missing };
  }
}

/**
 * Recursively index every file under `rootDir`. When two files share a name,
 * the one visited last wins.
 */
export async function buildFileIndex(rootDir: string): Promise<FileIndex> {
  const index = new FileIndex();
  const root = resolve(rootDir);

  async function scan(dir: string): Promise<void> {
    const dirents = await readdir(dir, { withFileTypes: true });
    for (const dirent of dirents) {
      const fullPath = join(dir, dirent.name);
      if (dirent.isDirectory()) {
        await scan(fullPath);
      } else if (dirent.isFile()) {
        index.set(dirent.name, fullPath);
      }
    }
  }

  await scan(root);
  log.debug(`Indexed ${index.size} files in ${root}`);
  return index;
}
