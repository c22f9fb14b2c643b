import { rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { WriteError } from '../errors.js';

/**
 * Write through a temp file in the target directory, then rename over the
 * target. A failed write leaves any previous file untouched.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tmpPath = join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, path);
  } catch (err) {
    try {
      await rm(tmpPath, { force: true });
    } catch {
      // The temp file may be left behind; the write failure is what gets reported.
    }
    throw new WriteError(path, { cause: err });
  }
}
