/**
 * File system utilities
 */

import { unlink } from 'fs/promises';
import { toError } from './errors.js';
import { createChildLogger } from './logger.js';

const logger = createChildLogger({ service: 'fs' });

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Safely delete a file. A missing file is not an error; other failures are logged.
 *
 * @param filePath - Path to the file to delete
 * @returns Whether the file was removed
 */
export async function safeUnlink(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (error) {
    if (!isMissingFileError(error)) {
      logger.warn({ filePath, error: toError(error).message }, 'Failed to delete file');
    }
    return false;
  }
}
