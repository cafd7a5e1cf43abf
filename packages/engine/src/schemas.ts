import { z } from 'zod';

export const matchResultSchema = z.object({
  fitScore: z.number().min(0).max(100),
  coverage: z.number(),
  skillMatch: z.number(),
  keywordMatch: z.number(),
  seniorityAlignment: z.number(),
  matchedBullets: z.array(z.object({ text: z.string(), similarity: z.number() })),
  matchedTechnologies: z.array(z.string()),
  missingTechnologies: z.array(z.string()),
  missingMustHaves: z.number().int().nonnegative(),
  mustHavePenalty: z.number(),
  requirementsAnalyzed: z.number().int().nonnegative(),
  error: z.string().optional(),
});

export const matchRecordsSchema = z.record(matchResultSchema);

export const indexSnapshotSchema = z.object({
  modelName: z.string(),
  dimension: z.number().int().positive(),
  units: z.array(z.string()),
  vectors: z.array(z.array(z.number())),
});
