import { z } from 'zod';

export const findingSchema = z.object({
  title: z.string().min(1),
  severity: z.enum(['info', 'low', 'medium', 'high', 'critical']),
  description: z.string(),
  file: z.string().optional(),
  line: z.number().int().nonnegative().optional(),
  suggestion: z.string().optional(),
});

export const analysisResultSchema = z.object({
  summary: z.string().min(1),
  sections: z.record(z.string(), z.string()),
  findings: z.array(findingSchema),
});

export const analysisSourcesSchema = z.object({
  files: z.array(z.string()),
  skipped: z.array(z.object({ path: z.string(), reason: z.string() })),
  truncated: z.boolean(),
});

/** A result as stored: the model output plus the files it covered. */
export const storedAnalysisResultSchema = analysisResultSchema.extend({
  sources: analysisSourcesSchema.optional(),
});

export const aggregateResultSchema = z.object({
  parts: z.object({
    'code-review': storedAnalysisResultSchema,
    documentation: storedAnalysisResultSchema,
    'bug-detection': storedAnalysisResultSchema,
  }),
});

export const jobResultSchema = z.union([aggregateResultSchema, storedAnalysisResultSchema]);

export const jobErrorSchema = z.object({
  kind: z.enum([
    'NotFound',
    'AuthFailure',
    'RateLimited',
    'QuotaExceeded',
    'TransientNetworkError',
    'InvalidResponse',
    'Cancelled',
    'Internal',
  ]),
  message: z.string().min(1),
  retryable: z.boolean(),
  attempts: z.number().int().nonnegative(),
  stage: z.enum(['fetch', 'analyze', 'aggregate', 'dispatch']),
});

export const childIdsSchema = z.array(z.string());
