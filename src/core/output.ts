/**
 * Output file writing
 */

import { writeFile, rename, rm } from 'node:fs/promises';
import { dirname, basename, join } from 'node:path';
import { shortHash } from './hash';

/**
 * Write `data` to `filePath` so that the destination only ever holds a
 * complete file: the bytes go to a temporary sibling which is then renamed
 * over the destination. The temporary file is removed if either step fails.
 */
export async function writeDocumentAtomic(filePath: string, data: Uint8Array): Promise<void> {
  const token = shortHash(`${filePath}:${process.pid}:${Date.now()}:${Math.random()}`);
  const tempPath = join(dirname(filePath), `.${basename(filePath)}.${token}.tmp`);

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}
