import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { errorMessage } from '../errors.js';
import { applicationSchema, type ApplicationManifest } from './schema.js';
import {
  APPLICATION_API_VERSION,
  APPLICATION_KIND,
  type ArgoApplication,
} from '../types/argocd.js';
import type {
  ParseOutcome,
  ParseRejection,
  RejectionCategory,
  RejectionKind,
} from '../types/pipeline.js';

function reject(
  file: string,
  kind: RejectionKind,
  message: string,
  fields: string[] = [],
): ParseOutcome {
  return { status: 'rejected', rejection: { file, kind, message, fields } };
}

export function rejectionCategory(rejection: ParseRejection): RejectionCategory {
  return rejection.kind === 'decode' ? 'DecodeError' : 'SchemaMismatchError';
}

function isMissing(issue: ZodIssue): boolean {
  return (
    issue.code === 'invalid_type' &&
    (issue.received === 'undefined' || issue.received === 'null')
  );
}

function describeIssues(file: string, issues: ZodIssue[]): ParseOutcome {
  const missing = issues.filter(isMissing);
  if (missing.length > 0) {
    const fields = missing.map((i) => i.path.join('.'));
    return reject(file, 'missing-field', `Missing required field: ${fields.join(', ')}`, fields);
  }

  const fields = issues.map((i) => i.path.join('.'));
  const details = issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  return reject(file, 'invalid-field', `Invalid field ${details}`, fields);
}

function toApplication(file: string, manifest: ApplicationManifest): ArgoApplication {
  const { metadata, spec } = manifest;
  const recurse = spec.source.directory?.recurse;

  return {
    sourceFile: file,
    metadata: {
      name: metadata.name,
      annotations: { ...metadata.annotations },
      labels: { ...metadata.labels },
    },
    project: spec.project ?? undefined,
    source: {
      repoURL: spec.source.repoURL ?? undefined,
      targetRevision: spec.source.targetRevision ?? undefined,
      path: spec.source.path ?? undefined,
      directoryRecurse: recurse ?? undefined,
    },
    destination: {
      server: spec.destination.server ?? undefined,
      name: spec.destination.name ?? undefined,
      namespace: spec.destination.namespace ?? undefined,
    },
    automatedSync: spec.syncPolicy?.automated != null,
  };
}

/**
 * Classify the text of one manifest file.
 */
export function parseApplication(content: string, file: string): ParseOutcome {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    return reject(file, 'decode', `Invalid YAML syntax: ${errorMessage(err)}`);
  }

  if (raw === null || raw === undefined) {
    return reject(file, 'decode', 'Empty YAML document');
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    return reject(file, 'decode', 'YAML document is not a mapping');
  }

  const apiVersion = 'apiVersion' in raw ? raw.apiVersion : undefined;
  const kind = 'kind' in raw ? raw.kind : undefined;
  if (apiVersion === undefined || apiVersion === null) {
    return reject(file, 'wrong-kind', 'Missing apiVersion', ['apiVersion']);
  }
  if (apiVersion !== APPLICATION_API_VERSION) {
    return reject(
      file,
      'wrong-kind',
      `Unexpected apiVersion "${String(apiVersion)}" (expected ${APPLICATION_API_VERSION})`,
      ['apiVersion'],
    );
  }
  if (kind === undefined || kind === null) {
    return reject(file, 'wrong-kind', 'Missing kind', ['kind']);
  }
  if (kind !== APPLICATION_KIND) {
    return reject(
      file,
      'wrong-kind',
      `Unexpected kind "${String(kind)}" (expected ${APPLICATION_KIND})`,
      ['kind'],
    );
  }

  const parsed = applicationSchema.safeParse(raw);
  if (!parsed.success) {
    return describeIssues(file, parsed.error.issues);
  }

  return { status: 'accepted', application: toApplication(file, parsed.data) };
}

/**
 * Read and classify one manifest file. Never throws for file-level problems.
 */
export async function parseApplicationFile(file: string): Promise<ParseOutcome> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (err) {
    return reject(file, 'decode', `Failed to read file: ${errorMessage(err)}`);
  }
  return parseApplication(content, file);
}
