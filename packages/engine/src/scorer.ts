import type {
  JobPosting,
  MatchedBullet,
  MatchResult,
  ResumeCorpus,
  SearchHit,
  TechnologyExtractor,
} from '@jobfit/core';
import type { EngineConfig, ScoreWeights } from './config';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { RequirementExtractor } from './requirements';
import { clamp, DESCRIPTIVE_FIELDS, joinFields, roundTo } from './text';
import type { VectorIndex } from './vector-index';

const JUNIOR_CUES = ['junior', 'entry', 'intern', 'new grad'];
const SENIOR_CUES = ['senior', 'lead', 'architect', 'principal'];
const LEADERSHIP_VERBS = ['led', 'managed', 'architected', 'designed', 'mentored'];

export const NO_REQUIREMENTS_ERROR = 'No requirements found in job';

/** Score used for seniority when a job has no extractable requirements. */
const EMPTY_JOB_SENIORITY = 0.5;

export type ScorerSettings = Pick<
  EngineConfig,
  'similarityThreshold' | 'topK' | 'penaltyPerMissingMustHave' | 'weights'
>;

export interface HybridScorerOptions {
  index: VectorIndex;
  corpus: ResumeCorpus;
  technologies: TechnologyExtractor;
  settings: ScorerSettings;
  requirements?: RequirementExtractor;
  logger?: Logger;
}

export function keywordOverlap(jobTechs: ReadonlySet<string>, resumeTechs: ReadonlySet<string>): number {
  if (jobTechs.size === 0) return 0;
  let shared = 0;
  for (const tech of jobTechs) {
    if (resumeTechs.has(tech)) shared += 1;
  }
  return shared / jobTechs.size;
}

export function seniorityAlignment(jobText: string, matchedText: string): number {
  const job = jobText.toLowerCase();
  const matched = matchedText.toLowerCase();
  const isJunior = JUNIOR_CUES.some((cue) => job.includes(cue));
  const isSenior = SENIOR_CUES.some((cue) => job.includes(cue));
  const leadershipCount = LEADERSHIP_VERBS.filter((verb) => matched.includes(verb)).length;

  if (isJunior) return leadershipCount <= 1 ? 0.8 : 0.5;
  if (isSenior) return Math.min(1, 0.5 + 0.15 * leadershipCount);
  return 0.7;
}

/** Mean similarity rescaled from [threshold, 1] onto [0, 1]. */
export function semanticStrength(similarities: readonly number[], threshold: number): number {
  if (similarities.length === 0) return 0;
  const mean = similarities.reduce((sum, value) => sum + value, 0) / similarities.length;
  return clamp((mean - threshold) / (1 - threshold), 0, 1);
}

export function weightedScore(
  weights: ScoreWeights,
  signals: { keyword: number; coverage: number; strength: number; seniority: number },
  penalty: number
): number {
  const blended =
    weights.keywordMatch * signals.keyword +
    weights.semanticCoverage * signals.coverage +
    weights.semanticStrength * signals.strength +
    weights.seniorityAlignment * signals.seniority;
  return clamp(roundTo(100 * blended - 100 * penalty, 1), 0, 100);
}

const percent = (value: number) => roundTo(value * 100, 1);

const sorted = (values: Iterable<string>) => Array.from(values).sort((a, b) => a.localeCompare(b));

export class HybridScorer {
  private readonly index: VectorIndex;
  private readonly corpus: ResumeCorpus;
  private readonly technologies: TechnologyExtractor;
  private readonly settings: ScorerSettings;
  private readonly requirements: RequirementExtractor;
  private readonly logger: Logger;
  private resumeTechs: Set<string> | null = null;

  constructor(options: HybridScorerOptions) {
    this.index = options.index;
    this.corpus = options.corpus;
    this.technologies = options.technologies;
    this.settings = options.settings;
    this.requirements = options.requirements ?? new RequirementExtractor();
    this.logger = options.logger ?? createLogger('scorer');
  }

  /**
   * Scores one posting. Rejects only when the embedding or search
   * collaborator fails; technology extraction failures degrade to an
   * empty technology set.
   */
  async score(job: JobPosting): Promise<MatchResult> {
    const requirements = this.requirements.extract(job);
    if (requirements.allRequirements.length === 0) {
      return {
        fitScore: 0,
        coverage: 0,
        skillMatch: 0,
        keywordMatch: 0,
        seniorityAlignment: percent(EMPTY_JOB_SENIORITY),
        matchedBullets: [],
        matchedTechnologies: [],
        missingTechnologies: [],
        missingMustHaves: 0,
        mustHavePenalty: 0,
        requirementsAnalyzed: 0,
        error: NO_REQUIREMENTS_ERROR,
      };
    }

    const { similarityThreshold: threshold, topK } = this.settings;
    const jobText = joinFields(job, DESCRIPTIVE_FIELDS);

    const jobTechs = await this.safeExtract(jobText, job.id);
    const resumeTechs = await this.resumeTechnologies();
    const keyword = keywordOverlap(jobTechs, resumeTechs);

    const results = await this.index.search(requirements.allRequirements, topK);
    const isCovered = (hits: SearchHit[]) => hits.some((hit) => hit.similarity >= threshold);

    const matchedMap = new Map<string, number>();
    let covered = 0;
    for (const hits of results) {
      if (!isCovered(hits)) continue;
      covered += 1;
      for (const hit of hits) {
        if (hit.similarity < threshold) continue;
        matchedMap.set(hit.unitText, Math.max(matchedMap.get(hit.unitText) ?? -Infinity, hit.similarity));
      }
    }
    const coverage = covered / requirements.allRequirements.length;

    const matchedBullets: MatchedBullet[] = Array.from(matchedMap, ([text, similarity]) => ({ text, similarity }))
      .sort((a, b) => b.similarity - a.similarity);
    const strength = semanticStrength(
      matchedBullets.map((bullet) => bullet.similarity),
      threshold
    );
    const seniority = seniorityAlignment(jobText, matchedBullets.map((bullet) => bullet.text).join(' '));

    let missingMustHaves = 0;
    if (requirements.mustHave.length > 0) {
      const mustHaveResults = await this.index.search(requirements.mustHave, topK);
      missingMustHaves = mustHaveResults.filter((hits) => !isCovered(hits)).length;
    }
    const penalty = missingMustHaves * this.settings.penaltyPerMissingMustHave;

    const fitScore = weightedScore(this.settings.weights, { keyword, coverage, strength, seniority }, penalty);
    this.logger.debug(`Scored ${job.id}: ${fitScore} (${covered}/${requirements.allRequirements.length} covered)`);

    return {
      fitScore,
      coverage: percent(coverage),
      skillMatch: percent(strength),
      keywordMatch: percent(keyword),
      seniorityAlignment: percent(seniority),
      matchedBullets,
      matchedTechnologies: sorted(Array.from(jobTechs).filter((tech) => resumeTechs.has(tech))),
      missingTechnologies: sorted(Array.from(jobTechs).filter((tech) => !resumeTechs.has(tech))),
      missingMustHaves,
      mustHavePenalty: percent(penalty),
      requirementsAnalyzed: requirements.allRequirements.length,
    };
  }

  private async resumeTechnologies(): Promise<Set<string>> {
    if (this.resumeTechs) return this.resumeTechs;
    try {
      this.resumeTechs = await this.technologies.extractTechnologies(this.corpus.join('\n'));
      return this.resumeTechs;
    } catch (error) {
      this.logger.warn('Technology extraction failed for the resume', error);
      return new Set();
    }
  }

  private async safeExtract(text: string, jobId: string): Promise<Set<string>> {
    try {
      return await this.technologies.extractTechnologies(text);
    } catch (error) {
      this.logger.warn(`Technology extraction failed for job ${jobId}`, error);
      return new Set();
    }
  }
}
