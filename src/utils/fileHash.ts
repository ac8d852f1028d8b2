/**
 * Content hashing for asset writes. An asset whose downloaded bytes hash the
 * same as the file already on disk is left untouched.
 */

import crypto from 'crypto';
import fs from 'fs/promises';
import { getErrorCode } from './errorHandling.js';

export function md5Buffer(content: Buffer): string {
  return crypto.createHash('md5').update(content).digest('hex');
}

/**
 * MD5 of a file, or null when it does not exist
 *
 * @example
 * await md5File('/assets/Movies/Dune (2021)/poster.jpg') // "9e107d9d372bb6826bd81d3542a419d6"
 */
export async function md5File(filePath: string): Promise<string | null> {
  try {
    return md5Buffer(await fs.readFile(filePath));
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
