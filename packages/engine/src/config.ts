import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '@jobfit/core';
import type { SkillsConfig } from '@jobfit/core';

export interface ScoreWeights {
  keywordMatch: number;
  semanticCoverage: number;
  semanticStrength: number;
  seniorityAlignment: number;
}

export interface EngineConfig {
  embeddingModel: string;
  embeddingDimension?: number;
  similarityThreshold: number;
  topK: number;
  penaltyPerMissingMustHave: number;
  weights: ScoreWeights;
  preferredLocations: string[];
  keywordsToMatch: string[];
  companiesToAvoid: string[];
  explicitSkills: SkillsConfig;
  resumePath: string;
  dataDir: string;
  autoSaveThreshold: number;
  minMatchScore: number;
}

export const DEFAULT_WEIGHTS: ScoreWeights = {
  keywordMatch: 0.35,
  semanticCoverage: 0.4,
  semanticStrength: 0.1,
  seniorityAlignment: 0.15,
};

const WEIGHT_SUM_TOLERANCE = 1e-6;

const stringList = z.array(z.string()).default([]);

const weightsSchema = z
  .object({
    keyword_match: z.number().min(0).max(1).default(DEFAULT_WEIGHTS.keywordMatch),
    semantic_coverage: z.number().min(0).max(1).default(DEFAULT_WEIGHTS.semanticCoverage),
    semantic_strength: z.number().min(0).max(1).default(DEFAULT_WEIGHTS.semanticStrength),
    seniority_alignment: z.number().min(0).max(1).default(DEFAULT_WEIGHTS.seniorityAlignment),
  })
  .default({});

const rawConfigSchema = z.object({
  embedding_model: z.string().min(1).default('text-embedding-3-small'),
  embedding_dimension: z.number().int().positive().optional(),
  similarity_threshold: z.number().min(0).lt(1).default(0.3),
  top_k: z.number().int().positive().default(5),
  penalty_per_missing_must_have: z.number().min(0).max(1).default(0.05),
  weights: weightsSchema,
  preferred_locations: stringList,
  keywords_to_match: stringList,
  companies_to_avoid: stringList,
  explicit_skills: z.record(z.array(z.string())).default({}),
  resume_path: z.string().default('input/resume.txt'),
  paths: z.object({ data_dir: z.string().default('data') }).default({}),
  matcher: z
    .object({
      auto_save_threshold: z.number().min(0).max(100).default(30),
      min_match_score: z.number().min(0).max(100).default(0),
    })
    .default({}),
});

export type RawEngineConfig = z.input<typeof rawConfigSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validates the snake_case configuration surface and maps it to an
 * EngineConfig. Throws ConfigurationError listing every problem found.
 */
export function parseEngineConfig(input: unknown = {}): EngineConfig {
  const parsed = rawConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map(formatIssue));
  }
  const raw = parsed.data;

  const weights: ScoreWeights = {
    keywordMatch: raw.weights.keyword_match,
    semanticCoverage: raw.weights.semantic_coverage,
    semanticStrength: raw.weights.semantic_strength,
    seniorityAlignment: raw.weights.seniority_alignment,
  };
  const weightSum =
    weights.keywordMatch + weights.semanticCoverage + weights.semanticStrength + weights.seniorityAlignment;
  if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError([`weights: must sum to 1.0 (got ${Number(weightSum.toFixed(6))})`]);
  }

  return {
    embeddingModel: raw.embedding_model,
    embeddingDimension: raw.embedding_dimension,
    similarityThreshold: raw.similarity_threshold,
    topK: raw.top_k,
    penaltyPerMissingMustHave: raw.penalty_per_missing_must_have,
    weights,
    preferredLocations: raw.preferred_locations,
    keywordsToMatch: raw.keywords_to_match,
    companiesToAvoid: raw.companies_to_avoid,
    explicitSkills: raw.explicit_skills,
    resumePath: raw.resume_path,
    dataDir: raw.paths.data_dir,
    autoSaveThreshold: raw.matcher.auto_save_threshold,
    minMatchScore: raw.matcher.min_match_score,
  };
}

export async function loadEngineConfig(filePath: string): Promise<EngineConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`could not read ${filePath}: ${detail}`]);
  }
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`${filePath} is not valid JSON: ${detail}`]);
  }
  return parseEngineConfig(payload);
}
