export type OutputFormat = 'aggregate' | 'per-application';

/**
 * Everything a migration run needs. Built from the config file and CLI flags.
 */
export interface MigrationConfig {
  inputDir: string;
  outputDir: string;
  recursive: boolean;
  dryRun: boolean;
  outputFile: string;
  format: OutputFormat;
  /** Default for source.directory.recurse when a manifest leaves it unset. */
  directoryRecurse: boolean;
  schemaPath?: string;
  /** Checked between files; aborting it stops the run. */
  signal?: AbortSignal;
}
