import { SYNC_WAVE_ANNOTATION, type ArgoApplication, type MigratedEntry } from '../types/argocd.js';

export const DEFAULT_PROJECT = 'default';
export const DEFAULT_REVISION = 'HEAD';
export const DEFAULT_NAMESPACE = 'default';

export interface MigrateOptions {
  /** Used for source.directory.recurse when the manifest does not set it. */
  directoryRecurse?: boolean;
}

function migrateMetadata(app: ArgoApplication): MigratedEntry['metadata'] {
  const metadata: MigratedEntry['metadata'] = { name: app.metadata.name };

  const syncWave = app.metadata.annotations[SYNC_WAVE_ANNOTATION];
  if (syncWave !== undefined) {
    metadata.annotations = { syncWave };
  }

  if (Object.keys(app.metadata.labels).length > 0) {
    metadata.labels = { ...app.metadata.labels };
  }

  return metadata;
}

/**
 * Map one Application onto its ApplicationSet generator entry.
 *
 * Keys are always emitted in the same order, so serializing the result is
 * stable for a given input.
 */
export function migrateApplication(
  app: ArgoApplication,
  options: MigrateOptions = {},
): MigratedEntry {
  const { source, destination } = app;
  const clusterName = destination.name ?? destination.server;

  return {
    metadata: migrateMetadata(app),
    project: app.project ?? DEFAULT_PROJECT,
    source: {
      ...(source.repoURL !== undefined ? { repoURL: source.repoURL } : {}),
      revision: source.targetRevision ?? DEFAULT_REVISION,
      ...(source.path !== undefined ? { manifestPath: source.path } : {}),
      directory: {
        recurse: source.directoryRecurse ?? options.directoryRecurse ?? true,
      },
    },
    destination: {
      ...(clusterName !== undefined ? { clusterName } : {}),
      namespace: destination.namespace ?? DEFAULT_NAMESPACE,
    },
    enableSyncPolicy: app.automatedSync,
  };
}

export function migrateApplications(
  apps: readonly ArgoApplication[],
  options: MigrateOptions = {},
): MigratedEntry[] {
  return apps.map((app) => migrateApplication(app, options));
}
