import AjvModule from 'ajv';
import type { ErrorObject } from 'ajv';
import type { SchemaViolation, ValidationResult } from '../types/pipeline.js';
import type { EntrySchema } from './schema.js';

// ajv is CommonJS; under ESM its class is the `default` property.
const Ajv = AjvModule.default;

export type EntryValidator = (entries: unknown) => ValidationResult;

function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

function toViolation(error: ErrorObject): SchemaViolation {
  let pointer = error.instancePath;
  const missing: unknown = error.params.missingProperty;
  const extra: unknown = error.params.additionalProperty;
  if (error.keyword === 'required' && typeof missing === 'string') {
    pointer = `${pointer}/${escapePointerToken(missing)}`;
  } else if (error.keyword === 'additionalProperties' && typeof extra === 'string') {
    pointer = `${pointer}/${escapePointerToken(extra)}`;
  }

  return {
    pointer,
    message: error.message ?? `failed ${error.keyword} check`,
    keyword: error.keyword,
  };
}

function entryName(entry: unknown): string | undefined {
  if (!entry || typeof entry !== 'object' || !('metadata' in entry)) return undefined;
  const metadata = entry.metadata;
  if (!metadata || typeof metadata !== 'object' || !('name' in metadata)) return undefined;
  return typeof metadata.name === 'string' ? metadata.name : undefined;
}

/**
 * Names must be unique across the array: the generator keys Applications by name.
 */
function findDuplicateNames(entries: unknown): SchemaViolation[] {
  if (!Array.isArray(entries)) return [];

  const violations: SchemaViolation[] = [];
  const firstSeen = new Map<string, number>();
  entries.forEach((entry: unknown, index) => {
    const name = entryName(entry);
    if (name === undefined) return;
    const first = firstSeen.get(name);
    if (first === undefined) {
      firstSeen.set(name, index);
      return;
    }
    violations.push({
      pointer: `/${index}/metadata/name`,
      message: `duplicate application name "${name}" (first defined at /${first})`,
      keyword: 'uniqueName',
    });
  });
  return violations;
}

/**
 * Compile a Draft-7 schema into a validator for whole entry arrays.
 */
export function createEntryValidator(schema: EntrySchema): EntryValidator {
  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile(schema);

  return (entries) => {
    const violations: SchemaViolation[] = [];
    if (!validate(entries)) {
      violations.push(...(validate.errors ?? []).map(toViolation));
    }
    violations.push(...findDuplicateNames(entries));
    return { valid: violations.length === 0, violations };
  };
}

export function validateEntries(entries: unknown, schema: EntrySchema): ValidationResult {
  return createEntryValidator(schema)(entries);
}
