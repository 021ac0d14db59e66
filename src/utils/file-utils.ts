/**
 * File Utilities
 *
 * Utility functions for file system operations.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FILE_EXTENSIONS } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { UsdErrorFactory } from '../errors';

/**
 * Check if a path is a directory
 */
export function isDirectory(filePath: string): boolean {
  try {
    const stats = fs.statSync(filePath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if path exists
 */
export function pathExists(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively list files under a directory whose names pass the filter.
 * Directories starting with '.' or '_' are skipped. Results are sorted
 * so a batch always sees its files in the same order.
 */
export function findFiles(dirPath: string, filter: (fileName: string) => boolean): string[] {
  if (!isDirectory(dirPath)) {
    return [];
  }

  const found: string[] = [];
  const walk = (dir: string): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.') && !entry.name.startsWith('_')) {
          walk(fullPath);
        }
      } else if (entry.isFile() && filter(entry.name)) {
        found.push(fullPath);
      }
    }
  };

  walk(dirPath);
  return found;
}

/**
 * Writes a file through a temporary sibling that is renamed over the target,
 * so readers only ever see the previous content or the complete new content.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}${FILE_EXTENSIONS.TEMP}`;

  try {
    await fs.promises.writeFile(tempPath, content, 'utf8');
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw UsdErrorFactory.fileSystemError(
      `${ERROR_MESSAGES.WRITE_FAILED}: ${filePath}`,
      filePath,
      'write',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
}
