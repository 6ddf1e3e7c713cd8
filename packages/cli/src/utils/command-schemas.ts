import { z } from 'zod';

const OutputFormatSchema = z.enum(['console', 'json']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

// commander hands option values over as strings
const PositiveIntSchema = z.coerce.number().int().min(1);

export const ThreatModelIdSchema = z.string().trim().min(1, 'Threat model ID is required');

export const AnalyzeOptionsSchema = z.object({
  maxRepos: PositiveIntSchema.optional(),
  dryRun: z.boolean().optional(),
  output: z.string().min(1).optional(),
  forceAuth: z.boolean().optional(),
  skipDiagram: z.boolean().optional(),
  format: OutputFormatSchema.default('console'),
});
export type AnalyzeCommandOptions = z.infer<typeof AnalyzeOptionsSchema>;

export const ListReposOptionsSchema = z.object({
  format: OutputFormatSchema.default('console'),
});

export const AuthOptionsSchema = z.object({
  force: z.boolean().optional(),
});

export const ConfigInfoOptionsSchema = z.object({
  format: OutputFormatSchema.default('console'),
});

export const DiagramOptionsSchema = z.object({
  output: z.string().min(1).optional(),
});
