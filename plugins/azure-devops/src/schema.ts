import { z } from 'zod';

// Subset of the repository record `az repos` prints
export const azRepositorySchema = z.object({
  id: z.string(),
  name: z.string(),
  remoteUrl: z.string().nullish(),
  webUrl: z.string().nullish(),
  defaultBranch: z.string().nullish(),
});

export const azRepositoryListSchema = z.array(azRepositorySchema);

// `az version --output json`
export const azVersionSchema = z.object({
  'azure-cli': z.string(),
  extensions: z.record(z.string()).default({}),
});

export type AzRepository = z.infer<typeof azRepositorySchema>;

// Pipeline and variable group ids are numeric in `az pipelines` output
const azIdSchema = z.union([z.number(), z.string()]).transform(String);

export const azProjectItemSchema = z.object({
  id: azIdSchema,
  name: z.string(),
});

export const azProjectItemListSchema = z.array(azProjectItemSchema);

export const azPipelineRunSchema = z.object({
  id: azIdSchema,
  status: z.string().nullish(),
});

export const azPipelineRunListSchema = z.array(azPipelineRunSchema);
