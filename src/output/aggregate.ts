import { join } from 'node:path';
import type { MigratedEntry } from '../types/argocd.js';
import { entriesToJson } from '../utils/json.js';
import { writeFileAtomic } from '../utils/atomic-write.js';

/**
 * Write all entries as one JSON array.
 */
export async function writeAggregateOutput(
  entries: MigratedEntry[],
  outputDir: string,
  outputFile: string,
): Promise<string[]> {
  const filePath = join(outputDir, outputFile);
  await writeFileAtomic(filePath, entriesToJson(entries));
  return [filePath];
}
