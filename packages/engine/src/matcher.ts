import { err, ok, ScoreError } from '@jobfit/core';
import type { AnalyzedJob, BatchFailure, BatchReport, JobPosting, MatchResult, Result } from '@jobfit/core';
import { createLogger } from './logger';
import type { Logger } from './logger';
import type { MatchCache } from './match-cache';

export interface JobScorer {
  score(job: JobPosting): Promise<MatchResult>;
}

export interface AnalyzeOptions {
  useCache?: boolean;
}

export interface BatchOptions {
  forceRematch?: boolean;
}

export class JobMatcher {
  constructor(
    private readonly scorer: JobScorer,
    private readonly cache: MatchCache,
    private readonly logger: Logger = createLogger('matcher')
  ) {}

  async analyzeSingle(job: JobPosting, options: AnalyzeOptions = {}): Promise<Result<MatchResult, ScoreError>> {
    const useCache = options.useCache ?? true;
    if (useCache) {
      const cached = this.cache.get(job.id);
      if (cached) return ok(cached);
    }

    const scored = await this.scoreJob(job);
    if (!scored.ok) return scored;
    await this.cache.put(job.id, scored.value);
    return scored;
  }

  /**
   * Scores jobs one at a time. Failed jobs are reported and left out of
   * the cache; new results are saved in one write at the end. Output is
   * sorted by fit score, highest first, keeping input order on ties.
   */
  async batchAnalyze(jobs: JobPosting[], options: BatchOptions = {}): Promise<BatchReport> {
    const forceRematch = options.forceRematch ?? false;
    if (forceRematch) {
      this.logger.info('Force rematch enabled, ignoring cached matches');
    }

    const results: AnalyzedJob[] = [];
    const fresh: Record<string, MatchResult> = {};
    const failures: BatchFailure[] = [];
    let cachedCount = 0;

    for (const [position, job] of jobs.entries()) {
      const cached = forceRematch ? undefined : this.cache.get(job.id);
      if (cached) {
        cachedCount += 1;
        results.push({ job, match: cached });
        continue;
      }

      this.logger.debug(`Analyzing job ${position + 1}/${jobs.length}: ${job.title || job.id}`);
      const scored = await this.scoreJob(job);
      if (!scored.ok) {
        failures.push({ jobId: job.id, message: scored.error.message });
        continue;
      }
      fresh[job.id] = scored.value;
      results.push({ job, match: scored.value });
    }

    await this.cache.putMany(fresh);

    const summary = {
      total: jobs.length,
      analyzed: Object.keys(fresh).length,
      cached: cachedCount,
      failed: failures.length,
      failures,
    };
    this.logger.info(
      `Analyzed ${summary.analyzed}, reused ${summary.cached} cached, ${summary.failed} failed of ${summary.total} jobs`
    );

    return {
      results: results.sort((a, b) => b.match.fitScore - a.match.fitScore),
      summary,
    };
  }

  private async scoreJob(job: JobPosting): Promise<Result<MatchResult, ScoreError>> {
    try {
      return ok(await this.scorer.score(job));
    } catch (error) {
      const failure = new ScoreError(job.id, error);
      this.logger.error(failure.message);
      return err(failure);
    }
  }
}
