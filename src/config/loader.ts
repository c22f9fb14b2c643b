import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { MigratorError } from '../errors.js';
import type { MigrationConfig, OutputFormat } from '../types/config.js';
import { configFileSchema, type ConfigFile } from './schema.js';

export interface ConfigOverrides {
  inputDir?: string;
  outputDir?: string;
  recursive?: boolean;
  dryRun?: boolean;
  outputFile?: string;
  format?: OutputFormat;
  directoryRecurse?: boolean;
  schema?: string;
}

/**
 * Load a config file. Relative paths inside it are resolved against the
 * directory the file lives in.
 */
export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  const raw = await readFile(configPath, 'utf-8');
  const parsed: unknown = parseYaml(raw);
  const config = configFileSchema.parse(parsed ?? {});

  const baseDir = dirname(resolve(configPath));
  return {
    ...config,
    ...(config.inputDir ? { inputDir: resolve(baseDir, config.inputDir) } : {}),
    ...(config.outputDir ? { outputDir: resolve(baseDir, config.outputDir) } : {}),
    ...(config.schema ? { schema: resolve(baseDir, config.schema) } : {}),
  };
}

/**
 * Merge CLI overrides over file values and fill in what is still missing.
 * CLI paths are resolved against `cwd`, which is also the default output dir.
 */
export function resolveMigrationConfig(
  overrides: ConfigOverrides,
  fileConfig?: ConfigFile,
  cwd: string = process.cwd(),
): MigrationConfig {
  const given = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const merged = configFileSchema.parse({ ...fileConfig, ...given });

  if (!merged.inputDir) {
    throw new MigratorError(
      'No input directory given. Use --input-dir or set inputDir in the config file.',
    );
  }

  return {
    inputDir: resolve(cwd, merged.inputDir),
    outputDir: resolve(cwd, merged.outputDir ?? '.'),
    recursive: merged.recursive,
    dryRun: merged.dryRun,
    outputFile: merged.outputFile,
    format: merged.format,
    directoryRecurse: merged.directoryRecurse,
    ...(merged.schema ? { schemaPath: resolve(cwd, merged.schema) } : {}),
  };
}
