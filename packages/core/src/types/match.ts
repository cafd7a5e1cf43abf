import type { JobPosting } from './job';

export interface MatchedBullet {
  text: string;
  similarity: number;
}

export interface MatchResult {
  fitScore: number; // 0-100
  coverage: number;
  skillMatch: number;
  keywordMatch: number;
  seniorityAlignment: number;
  matchedBullets: MatchedBullet[];
  matchedTechnologies: string[];
  missingTechnologies: string[];
  missingMustHaves: number;
  mustHavePenalty: number;
  requirementsAnalyzed: number;
  error?: string;
}

export interface AnalyzedJob {
  job: JobPosting;
  match: MatchResult;
}

export interface FilterDecision {
  skip: boolean;
  autoSave: boolean;
  message?: string;
}

export interface BatchFailure {
  jobId: string;
  message: string;
}

export interface BatchSummary {
  total: number;
  analyzed: number;
  cached: number;
  failed: number;
  failures: BatchFailure[];
}

export interface BatchReport {
  results: AnalyzedJob[];
  summary: BatchSummary;
}
