import { join, basename } from 'node:path';
import type { MigratedEntry } from '../types/argocd.js';
import { entriesToJson } from '../utils/json.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { WriteError } from '../errors.js';

/**
 * Sanitize an application name into a file name that cannot escape the output directory.
 */
export function sanitizeFilename(name: string): string {
  return basename(name).replace(/[^a-zA-Z0-9._-]/g, '-');
}

/**
 * Write each entry as its own `<name>.json` object.
 *
 * Fails with WriteError before writing anything when two names map to the
 * same file.
 */
export async function writePerApplicationOutput(
  entries: MigratedEntry[],
  outputDir: string,
): Promise<string[]> {
  const owners = new Map<string, string>();
  const targets = entries.map((entry) => {
    const name = entry.metadata.name;
    const filePath = join(outputDir, `${sanitizeFilename(name)}.json`);
    const owner = owners.get(filePath);
    if (owner !== undefined) {
      throw new WriteError(filePath, {
        cause: new Error(`applications "${owner}" and "${name}" map to the same file`),
      });
    }
    owners.set(filePath, name);
    return { entry, filePath };
  });

  const writtenFiles: string[] = [];
  for (const { entry, filePath } of targets) {
    await writeFileAtomic(filePath, entriesToJson(entry));
    writtenFiles.push(filePath);
  }

  return writtenFiles;
}
