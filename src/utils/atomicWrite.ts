import fs from 'fs-extra';
import path from 'path';
import { ErrorCode, FileSystemError } from '../errors/index.js';
import { getErrorMessage, toError } from './errorHandling.js';
import { logger } from './logging.js';

/**
 * Replace a file's contents via a sibling temp file and rename, so readers
 * see either the old document or the new one.
 */
export async function writeFileAtomically(file: string, content: string, service: string): Promise<void> {
  const tempFile = `${file}.${process.pid}.tmp`;
  try {
    await fs.ensureDir(path.dirname(file));
    await fs.writeFile(tempFile, content, 'utf8');
    await fs.move(tempFile, file, { overwrite: true });
  } catch (error) {
    await fs.remove(tempFile).catch((cleanupError: unknown) => {
      logger.debug('Could not remove temp file', { tempFile, error: getErrorMessage(cleanupError) });
    });
    throw new FileSystemError(
      `Failed to write ${file}: ${getErrorMessage(error)}`,
      ErrorCode.FS_WRITE_FAILED,
      file,
      { service, operation: 'writeFileAtomically' },
      toError(error)
    );
  }
}

/**
 * Read a JSON file. Returns undefined when it does not exist; an empty file reads as `{}`.
 */
export async function readJsonFile(file: string, service: string): Promise<unknown> {
  if (!(await fs.pathExists(file))) {
    return undefined;
  }

  try {
    const content = await fs.readFile(file, 'utf8');
    return content.trim() === '' ? {} : JSON.parse(content);
  } catch (error) {
    throw new FileSystemError(
      `Failed to read ${file}: ${getErrorMessage(error)}`,
      ErrorCode.FS_READ_FAILED,
      file,
      { service, operation: 'readJsonFile' },
      toError(error)
    );
  }
}
