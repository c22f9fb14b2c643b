import type { ArgoApplication, MigratedEntry } from './argocd.js';
import type { PathError, WriteError, InterruptedError, SchemaLoadError } from '../errors.js';

export type RejectionKind = 'decode' | 'wrong-kind' | 'missing-field' | 'invalid-field';

export type RejectionCategory = 'DecodeError' | 'SchemaMismatchError';

export interface ParseRejection {
  file: string;
  kind: RejectionKind;
  message: string;
  /** Dotted paths of the offending fields, when the rejection is about fields. */
  fields: string[];
}

export type ParseOutcome =
  | { status: 'accepted'; application: ArgoApplication }
  | { status: 'rejected'; rejection: ParseRejection };

export interface SchemaViolation {
  /** JSON pointer into the validated array. */
  pointer: string;
  message: string;
  keyword: string;
}

export interface ValidationResult {
  valid: boolean;
  violations: SchemaViolation[];
}

export type PipelineStage =
  | 'scanning'
  | 'parsing'
  | 'migrating'
  | 'validating'
  | 'writing'
  | 'reporting';

export type OutputReport =
  | { written: true; files: string[] }
  | { written: false; reason: 'dry-run' | 'validation-failed' | 'no-entries' };

export interface MigrationStats {
  scanned: number;
  accepted: number;
  skipped: number;
}

export interface MigrationResult {
  entries: MigratedEntry[];
  stats: MigrationStats;
  skips: ParseRejection[];
  validation: ValidationResult;
  output: OutputReport;
}

export type MigrationOutcome =
  | { status: 'completed'; result: MigrationResult }
  | {
      status: 'aborted';
      stage: PipelineStage;
      error: PathError | SchemaLoadError | WriteError | InterruptedError;
    };
