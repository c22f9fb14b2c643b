import { z } from 'zod';

export const configFileSchema = z.object({
  inputDir: z.string().optional(),
  outputDir: z.string().optional(),
  recursive: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  outputFile: z
    .string()
    .regex(/^[^/\\]+\.json$/, 'must be a plain file name ending in .json')
    .default('applicationset.json'),
  format: z.enum(['aggregate', 'per-application']).default('aggregate'),
  directoryRecurse: z.boolean().default(true),
  schema: z.string().optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;
