import { relative } from 'node:path';
import * as p from '@clack/prompts';
import chalk from 'chalk';
import { loadConfigFile, resolveMigrationConfig } from '../config/loader.js';
import { saveConfigFile } from '../config/saver.js';
import { runMigration, type PipelineHooks } from '../pipeline/index.js';
import { rejectionCategory } from '../parser/application.js';
import { entriesToJson } from '../utils/json.js';
import { errorMessage } from '../errors.js';
import type { ConfigFile } from '../config/schema.js';
import type { MigrationConfig, OutputFormat } from '../types/config.js';
import type { MigrationOutcome, MigrationResult, PipelineStage } from '../types/pipeline.js';

export interface MigrateCommandOptions {
  inputDir?: string;
  outputDir?: string;
  recursive?: boolean;
  dryRun?: boolean;
  config?: string;
  format?: OutputFormat;
  outputFile?: string;
  directoryRecurse?: boolean;
  schema?: string;
  saveConfig?: string;
}

const STAGE_LABELS: Record<PipelineStage, string> = {
  scanning: '[1/5] Scanning for manifests...',
  parsing: '[2/5] Parsing Applications...',
  migrating: '[3/5] Migrating entries...',
  validating: '[4/5] Validating against schema...',
  writing: '[5/5] Writing files...',
  reporting: '[5/5] Rendering output...',
};

function describeStage(stage: PipelineStage, count: number): string {
  switch (stage) {
    case 'scanning':
      return `Found ${count} YAML file(s)`;
    case 'parsing':
      return `Accepted ${count} Application(s)`;
    case 'migrating':
      return `Migrated ${count} entr${count === 1 ? 'y' : 'ies'}`;
    case 'validating':
      return count === 0 ? 'Schema validation passed' : `Schema validation found ${count} violation(s)`;
    case 'writing':
      return `Wrote ${count} file(s)`;
    case 'reporting':
      return 'Output rendered';
  }
}

export async function migrate(options: MigrateCommandOptions): Promise<void> {
  p.intro(chalk.bold('argocd-app-migrator — Application → ApplicationSet'));

  let config: MigrationConfig;
  try {
    let fileConfig: ConfigFile | undefined;
    if (options.config) {
      fileConfig = await loadConfigFile(options.config);
    }
    config = resolveMigrationConfig(
      {
        inputDir: options.inputDir,
        outputDir: options.outputDir,
        recursive: options.recursive,
        dryRun: options.dryRun,
        outputFile: options.outputFile,
        format: options.format,
        directoryRecurse: options.directoryRecurse,
        schema: options.schema,
      },
      fileConfig,
    );
  } catch (err) {
    p.log.error(`Invalid configuration: ${errorMessage(err)}`);
    process.exit(1);
  }

  p.log.info(
    [
      `Input directory:  ${chalk.cyan(config.inputDir)}`,
      `Recursive scan:   ${chalk.cyan(String(config.recursive))}`,
      `Dry run:          ${chalk.cyan(String(config.dryRun))}`,
      `Output directory: ${chalk.cyan(config.outputDir)}`,
      `Output format:    ${chalk.cyan(config.format)}`,
    ].join('\n'),
  );

  if (options.saveConfig) {
    try {
      await saveConfigFile(config, options.saveConfig);
    } catch (err) {
      p.log.error(`Failed to save configuration: ${errorMessage(err)}`);
      process.exit(1);
    }
    p.log.success(`Saved configuration to ${options.saveConfig}`);
  }

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  const s = p.spinner();
  const hooks: PipelineHooks = {
    onStageStart: (stage) => s.start(STAGE_LABELS[stage]),
    onStageEnd: (stage, count) => s.stop(describeStage(stage, count)),
  };

  let outcome: MigrationOutcome;
  try {
    outcome = await runMigration({ ...config, signal: controller.signal }, hooks);
  } finally {
    process.off('SIGINT', onSigint);
  }

  if (outcome.status === 'aborted') {
    s.stop(`Migration aborted while ${outcome.stage}`);
    p.log.error(outcome.error.message);
    process.exit(1);
  }

  const { result } = outcome;
  reportSkips(result, config.inputDir);
  reportValidation(result);

  const { output } = result;
  if (output.written) {
    console.log('');
    console.log(chalk.green('Migration complete!'));
    console.log('');
    console.log('Generated files:');
    for (const f of output.files) {
      console.log(`  ${chalk.cyan(f)}`);
    }
  } else if (output.reason === 'dry-run') {
    console.log('');
    if (!result.validation.valid) {
      console.log(chalk.red('Output is INVALID against the schema (shown for inspection only):'));
    }
    console.log(entriesToJson(result.entries));
    console.log(chalk.yellow('Dry run: no files written.'));
  } else if (output.reason === 'no-entries') {
    p.log.warn('No valid ArgoCD Applications found; nothing written.');
  }

  const { scanned, accepted, skipped } = result.stats;
  p.outro(`Scanned ${scanned}, accepted ${accepted}, skipped ${skipped}.`);

  if (!output.written && output.reason === 'validation-failed') {
    process.exit(1);
  }
}

function reportSkips(result: MigrationResult, inputDir: string): void {
  for (const skip of result.skips) {
    p.log.warn(
      `Skipped ${relative(inputDir, skip.file)} [${rejectionCategory(skip)}/${skip.kind}]: ${skip.message}`,
    );
  }
}

function reportValidation(result: MigrationResult): void {
  if (result.validation.valid) return;
  for (const v of result.validation.violations) {
    p.log.error(`${v.pointer || '(root)'}: ${v.message}`);
  }
  if (result.output.written === false && result.output.reason === 'validation-failed') {
    p.log.error('Output does not match the ApplicationSet schema; no files were written.');
  }
}
