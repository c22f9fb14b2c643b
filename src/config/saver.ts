import type { MigrationConfig } from '../types/config.js';
import type { ConfigFile } from './schema.js';
import { toYaml } from '../utils/yaml.js';
import { writeFileAtomic } from '../utils/atomic-write.js';

/**
 * Convert a resolved MigrationConfig back to the config file format (round-trip compatible).
 */
export function migrationConfigToConfigFile(config: MigrationConfig): ConfigFile {
  return {
    inputDir: config.inputDir,
    outputDir: config.outputDir,
    recursive: config.recursive,
    dryRun: config.dryRun,
    outputFile: config.outputFile,
    format: config.format,
    directoryRecurse: config.directoryRecurse,
    ...(config.schemaPath ? { schema: config.schemaPath } : {}),
  };
}

/**
 * Save a MigrationConfig as a YAML config file. Fails with WriteError.
 */
export async function saveConfigFile(config: MigrationConfig, path: string): Promise<void> {
  await writeFileAtomic(path, toYaml(migrationConfigToConfigFile(config)));
}
