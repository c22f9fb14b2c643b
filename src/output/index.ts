import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { MigratedEntry } from '../types/argocd.js';
import type { OutputFormat } from '../types/config.js';
import { WriteError } from '../errors.js';
import { writeAggregateOutput } from './aggregate.js';
import { writePerApplicationOutput } from './per-application.js';

export interface WriteOutputOptions {
  outputDir: string;
  outputFile: string;
  format: OutputFormat;
}

/**
 * Write validated entries to disk in the configured layout.
 */
export async function writeOutput(
  entries: MigratedEntry[],
  options: WriteOutputOptions,
): Promise<string[]> {
  const outputDir = resolve(options.outputDir);
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new WriteError(outputDir, { cause: err });
  }

  if (options.format === 'per-application') {
    return writePerApplicationOutput(entries, outputDir);
  }
  return writeAggregateOutput(entries, outputDir, options.outputFile);
}
