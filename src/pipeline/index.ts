import { scanManifests } from '../scanner/scan.js';
import { parseApplicationFile } from '../parser/application.js';
import { migrateApplications } from '../migrator/entry.js';
import { createEntryValidator, type EntryValidator } from '../validator/index.js';
import { loadEntrySchema } from '../validator/schema.js';
import { writeOutput } from '../output/index.js';
import {
  InterruptedError,
  PathError,
  SchemaLoadError,
  WriteError,
  errorMessage,
} from '../errors.js';
import type { ArgoApplication } from '../types/argocd.js';
import type { MigrationConfig } from '../types/config.js';
import type {
  MigrationOutcome,
  MigrationResult,
  OutputReport,
  ParseRejection,
  PipelineStage,
} from '../types/pipeline.js';

export interface PipelineHooks {
  onStageStart?: (stage: PipelineStage) => void;
  /**
   * `count` is what the stage produced: files found, applications accepted,
   * entries migrated, violations found, or files written.
   */
  onStageEnd?: (stage: PipelineStage, count: number) => void;
}

function throwIfInterrupted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new InterruptedError();
}

function aborted(
  stage: PipelineStage,
  error: PathError | SchemaLoadError | WriteError | InterruptedError,
): MigrationOutcome {
  return { status: 'aborted', stage, error };
}

/**
 * Run scan → parse → migrate → validate → write (or report, in dry-run mode).
 *
 * Problems with individual files are collected as skips. Only an unusable
 * input root, an unreadable schema, a failed write or an interruption abort
 * the run.
 */
export async function runMigration(
  config: MigrationConfig,
  hooks: PipelineHooks = {},
): Promise<MigrationOutcome> {
  const { signal } = config;

  // Scanning
  hooks.onStageStart?.('scanning');
  const files: string[] = [];
  const skips: ParseRejection[] = [];
  const onUnreadable = (path: string, err: unknown): void => {
    skips.push({
      file: path,
      kind: 'decode',
      message: `Cannot read entry: ${errorMessage(err)}`,
      fields: [],
    });
  };
  try {
    const scan = scanManifests(config.inputDir, { recursive: config.recursive, onUnreadable });
    for await (const file of scan) {
      throwIfInterrupted(signal);
      files.push(file);
    }
  } catch (err) {
    if (err instanceof PathError || err instanceof InterruptedError) {
      return aborted('scanning', err);
    }
    throw err;
  }
  hooks.onStageEnd?.('scanning', files.length);

  // Parsing
  hooks.onStageStart?.('parsing');
  const applications: ArgoApplication[] = [];
  for (const file of files) {
    if (signal?.aborted) return aborted('parsing', new InterruptedError());
    const outcome = await parseApplicationFile(file);
    if (outcome.status === 'accepted') {
      applications.push(outcome.application);
    } else {
      skips.push(outcome.rejection);
    }
  }
  hooks.onStageEnd?.('parsing', applications.length);

  // Migrating
  hooks.onStageStart?.('migrating');
  const entries = migrateApplications(applications, {
    directoryRecurse: config.directoryRecurse,
  });
  hooks.onStageEnd?.('migrating', entries.length);

  // Validating
  hooks.onStageStart?.('validating');
  let validate: EntryValidator;
  try {
    validate = createEntryValidator(await loadEntrySchema(config.schemaPath));
  } catch (err) {
    if (err instanceof SchemaLoadError) return aborted('validating', err);
    throw err;
  }
  const validation = validate(entries);
  hooks.onStageEnd?.('validating', validation.violations.length);

  const stats = {
    scanned: files.length,
    accepted: applications.length,
    skipped: skips.length,
  };
  const complete = (output: OutputReport): MigrationOutcome => {
    const result: MigrationResult = { entries, stats, skips, validation, output };
    return { status: 'completed', result };
  };

  let reason: 'dry-run' | 'validation-failed' | 'no-entries' | null = null;
  if (config.dryRun) reason = 'dry-run';
  else if (!validation.valid) reason = 'validation-failed';
  else if (entries.length === 0) reason = 'no-entries';

  if (reason) {
    hooks.onStageStart?.('reporting');
    hooks.onStageEnd?.('reporting', entries.length);
    return complete({ written: false, reason });
  }

  // Writing
  hooks.onStageStart?.('writing');
  if (signal?.aborted) return aborted('writing', new InterruptedError());
  let written: string[];
  try {
    written = await writeOutput(entries, config);
  } catch (err) {
    if (err instanceof WriteError) return aborted('writing', err);
    throw err;
  }
  hooks.onStageEnd?.('writing', written.length);

  return complete({ written: true, files: written });
}
