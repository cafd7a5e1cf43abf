import type { AnalyzedJob, FilterDecision, JobPosting, MatchResult } from '@jobfit/core';
import type { EngineConfig } from './config';
import { fieldText, joinFields, SEARCHABLE_FIELDS } from './text';

export type FilterSettings = Pick<
  EngineConfig,
  'minMatchScore' | 'autoSaveThreshold' | 'preferredLocations' | 'keywordsToMatch' | 'companiesToAvoid'
>;

export type ContentFilter = 'location' | 'keyword' | 'company';

const normalizeList = (items: readonly string[]) =>
  items.map((item) => item.trim().toLowerCase()).filter(Boolean);

/**
 * Score threshold plus the content filters (preferred locations, keywords,
 * companies to avoid). All matching is case-insensitive substring matching.
 */
export class FilterEngine {
  readonly minMatchScore: number;
  readonly autoSaveThreshold: number;
  private readonly locations: string[];
  private readonly keywords: string[];
  private readonly avoidCompanies: string[];

  constructor(settings: FilterSettings) {
    this.minMatchScore = settings.minMatchScore;
    this.autoSaveThreshold = settings.autoSaveThreshold;
    this.locations = normalizeList(settings.preferredLocations);
    this.keywords = normalizeList(settings.keywordsToMatch);
    this.avoidCompanies = normalizeList(settings.companiesToAvoid);
  }

  /** First content filter the job fails, or null when it passes them all. */
  failedFilter(job: JobPosting): ContentFilter | null {
    if (this.locations.length > 0) {
      const location = fieldText(job.location).toLowerCase();
      if (!this.locations.some((loc) => location.includes(loc))) return 'location';
    }

    if (this.keywords.length > 0) {
      const text = joinFields(job, SEARCHABLE_FIELDS).toLowerCase();
      if (!this.keywords.some((keyword) => text.includes(keyword))) return 'keyword';
    }

    if (this.avoidCompanies.length > 0) {
      const company = fieldText(job.company).toLowerCase();
      if (company && this.avoidCompanies.some((avoid) => company.includes(avoid))) return 'company';
    }

    return null;
  }

  applyBatch(results: readonly AnalyzedJob[]): AnalyzedJob[] {
    return results.filter(
      (result) => result.match.fitScore >= this.minMatchScore && this.failedFilter(result.job) === null
    );
  }

  /** Content filters always win over the score threshold. */
  decide(job: JobPosting, match: Pick<MatchResult, 'fitScore'>, autoSaveEnabled: boolean): FilterDecision {
    const failed = this.failedFilter(job);
    if (failed) {
      return { skip: true, autoSave: false, message: `Skipped (${failed} filter)` };
    }

    if (!autoSaveEnabled) {
      return { skip: false, autoSave: false, message: 'Auto-save disabled' };
    }

    if (match.fitScore < this.autoSaveThreshold) {
      return { skip: false, autoSave: false, message: `Not saved (score < ${this.autoSaveThreshold})` };
    }

    return { skip: false, autoSave: true };
  }
}
