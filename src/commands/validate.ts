import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as p from '@clack/prompts';
import chalk from 'chalk';
import { validateEntries } from '../validator/index.js';
import { loadEntrySchema, type EntrySchema } from '../validator/schema.js';
import { errorMessage } from '../errors.js';

export interface ValidateOptions {
  file?: string;
  schema?: string;
}

/**
 * Check an existing output file against the schema. A single-object file
 * (per-application layout) is checked as a one-entry array.
 */
export async function validate(options: ValidateOptions): Promise<void> {
  const file = resolve(options.file ?? 'applicationset.json');

  let data: unknown;
  try {
    data = JSON.parse(await readFile(file, 'utf-8'));
  } catch (err) {
    p.log.error(`Cannot read ${file}: ${errorMessage(err)}`);
    process.exit(1);
  }

  let schema: EntrySchema;
  try {
    schema = await loadEntrySchema(options.schema ? resolve(options.schema) : undefined);
  } catch (err) {
    p.log.error(errorMessage(err));
    process.exit(1);
  }

  const entries: unknown[] = Array.isArray(data) ? data : [data];
  const result = validateEntries(entries, schema);

  console.log('');
  if (result.valid) {
    console.log(chalk.green(`All ${entries.length} entries in ${file} are valid.`));
    return;
  }

  for (const v of result.violations) {
    p.log.error(`${v.pointer || '(root)'}: ${v.message}`);
  }
  console.log(chalk.yellow(`${result.violations.length} schema violation(s) in ${file}.`));
  process.exit(1);
}
