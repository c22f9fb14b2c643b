import { z } from 'zod';

const scalarSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

// Kubernetes string maps; YAML often leaves numbers like sync-wave unquoted.
const stringMapSchema = z.record(scalarSchema).nullish();

const metadataSchema = z
  .object({
    name: z.string().min(1),
    annotations: stringMapSchema,
    labels: stringMapSchema,
  })
  .passthrough();

const sourceSchema = z
  .object({
    repoURL: z.string().nullish(),
    targetRevision: z.union([z.string(), z.number()]).transform((v) => String(v)).nullish(),
    path: z.string().nullish(),
    directory: z
      .object({
        recurse: z.boolean().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const destinationSchema = z
  .object({
    server: z.string().nullish(),
    name: z.string().nullish(),
    namespace: z.string().nullish(),
  })
  .passthrough();

const syncPolicySchema = z
  .object({
    automated: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export const applicationSchema = z
  .object({
    apiVersion: z.string(),
    kind: z.string(),
    metadata: metadataSchema,
    spec: z
      .object({
        project: z.string().nullish(),
        source: sourceSchema,
        destination: destinationSchema,
        syncPolicy: syncPolicySchema.nullish(),
      })
      .passthrough(),
  })
  .passthrough();

export type ApplicationManifest = z.infer<typeof applicationSchema>;
