import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { SchemaLoadError } from '../errors.js';

export const DEFAULT_SCHEMA_PATH = fileURLToPath(
  new URL('../../schemas/applicationset-entries.schema.json', import.meta.url),
);

const schemaDocumentSchema = z
  .object({
    $schema: z.string().optional(),
    $id: z.string().optional(),
  })
  .passthrough();

export type EntrySchema = z.infer<typeof schemaDocumentSchema>;

/**
 * Load the JSON Schema that migrated entries are checked against.
 */
export async function loadEntrySchema(path: string = DEFAULT_SCHEMA_PATH): Promise<EntrySchema> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new SchemaLoadError(path, 'cannot be read', { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SchemaLoadError(path, 'is not valid JSON', { cause: err });
  }

  const result = schemaDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new SchemaLoadError(path, 'is not a JSON Schema object');
  }
  return result.data;
}
