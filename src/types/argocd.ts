export const APPLICATION_API_VERSION = 'argoproj.io/v1alpha1';
export const APPLICATION_KIND = 'Application';
export const SYNC_WAVE_ANNOTATION = 'argocd.argoproj.io/sync-wave';

export interface ArgoApplicationMetadata {
  readonly name: string;
  readonly annotations: Readonly<Record<string, string>>;
  readonly labels: Readonly<Record<string, string>>;
}

export interface ArgoApplicationSource {
  readonly repoURL?: string;
  readonly targetRevision?: string;
  readonly path?: string;
  /** Only set when the manifest carries an explicit boolean. */
  readonly directoryRecurse?: boolean;
}

export interface ArgoApplicationDestination {
  readonly server?: string;
  readonly name?: string;
  readonly namespace?: string;
}

/**
 * The subset of an ArgoCD Application manifest that survives migration.
 */
export interface ArgoApplication {
  readonly sourceFile: string;
  readonly metadata: ArgoApplicationMetadata;
  readonly project?: string;
  readonly source: ArgoApplicationSource;
  readonly destination: ArgoApplicationDestination;
  readonly automatedSync: boolean;
}

export interface MigratedEntry {
  metadata: {
    name: string;
    annotations?: { syncWave?: string };
    labels?: Record<string, string>;
  };
  project: string;
  source: {
    repoURL?: string;
    revision: string;
    manifestPath?: string;
    directory: { recurse: boolean };
  };
  destination: {
    clusterName?: string;
    namespace: string;
  };
  enableSyncPolicy: boolean;
}
