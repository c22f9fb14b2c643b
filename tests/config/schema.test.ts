import { describe, it, expect } from 'vitest';
import { configFileSchema } from '../../src/config/schema.js';

describe('configFileSchema', () => {
  it('parses empty object with defaults', () => {
    const result = configFileSchema.parse({});
    expect(result).toEqual({
      recursive: false,
      dryRun: false,
      outputFile: 'applicationset.json',
      format: 'aggregate',
      directoryRecurse: true,
    });
  });

  it('parses full config correctly', () => {
    const result = configFileSchema.parse({
      inputDir: './apps',
      outputDir: './out',
      recursive: true,
      dryRun: true,
      outputFile: 'generator.json',
      format: 'per-application',
      directoryRecurse: false,
      schema: './schema.json',
    });

    expect(result.inputDir).toBe('./apps');
    expect(result.format).toBe('per-application');
    expect(result.directoryRecurse).toBe(false);
    expect(result.schema).toBe('./schema.json');
  });

  it('rejects unknown formats', () => {
    expect(() => configFileSchema.parse({ format: 'yaml' })).toThrow();
  });

  it('rejects output file names with directories', () => {
    expect(() => configFileSchema.parse({ outputFile: '../apps.json' })).toThrow();
    expect(() => configFileSchema.parse({ outputFile: 'apps.yaml' })).toThrow();
  });
});
