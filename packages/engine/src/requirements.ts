import { z } from 'zod';
import type { JobPosting, RequirementCategory, RequirementSet } from '@jobfit/core';
import defaultLexiconData from './data/requirement-lexicon.json';
import { escapeRegExp, fieldText, stripBullet } from './text';

const MIN_SKILL_LINE_LENGTH = 15;
const MIN_RESPONSIBILITY_LENGTH = 20;
const MIN_SUMMARY_SENTENCE_LENGTH = 30;
const MAX_SUMMARY_SENTENCES = 3;

/** Search budget per job, in priority order. */
export const REQUIREMENT_BUDGET = {
  mustHave: 10,
  responsibilities: 5,
  niceToHave: 3,
} as const;

const lexiconSchema = z.object({
  headerPrefixes: z.array(z.string()),
  headerMaxWords: z.number().int().positive(),
  fillerPhrases: z.array(z.string()),
  technicalTokens: z.array(z.string()),
  intentCues: z.array(z.string()),
  classification: z.array(
    z.object({
      phrase: z.string(),
      category: z.enum(['mustHave', 'niceToHave']),
    })
  ),
  defaultCategory: z.enum(['mustHave', 'niceToHave']),
  /** Match terms only where a word starts instead of anywhere in the text. */
  wordStartMatching: z.boolean().default(false),
});

/**
 * Word lists that drive requirement extraction. The technical vocabulary
 * is a tunable list, not a complete classifier of technologies.
 */
export type RequirementLexicon = z.infer<typeof lexiconSchema>;

export const DEFAULT_REQUIREMENT_LEXICON: RequirementLexicon = lexiconSchema.parse(defaultLexiconData);

/** With `wordStart`, "develop" hits "developing" but not "redevelop". */
function termPattern(term: string, wordStart: boolean): RegExp {
  const escaped = escapeRegExp(term.toLowerCase());
  return new RegExp(wordStart ? `(?<![a-z0-9])${escaped}` : escaped);
}

/** Case-insensitive search for any of a list of terms. */
class TermList {
  private readonly patterns: RegExp[];

  constructor(terms: readonly string[], wordStart: boolean) {
    this.patterns = terms.filter((term) => term.trim()).map((term) => termPattern(term, wordStart));
  }

  matches(lowerText: string): boolean {
    return this.patterns.some((pattern) => pattern.test(lowerText));
  }
}

export class RequirementExtractor {
  private readonly lexicon: RequirementLexicon;
  private readonly filler: TermList;
  private readonly technical: TermList;
  private readonly intent: TermList;
  private readonly classifiers: Array<{ terms: TermList; category: RequirementCategory }>;

  constructor(lexicon: RequirementLexicon = DEFAULT_REQUIREMENT_LEXICON) {
    this.lexicon = lexicon;
    const wordStart = lexicon.wordStartMatching;
    this.filler = new TermList(lexicon.fillerPhrases, wordStart);
    this.technical = new TermList(lexicon.technicalTokens, wordStart);
    this.intent = new TermList(lexicon.intentCues, wordStart);
    this.classifiers = lexicon.classification.map((rule) => ({
      terms: new TermList([rule.phrase], wordStart),
      category: rule.category,
    }));
  }

  extract(job: JobPosting): RequirementSet {
    const mustHave: string[] = [];
    const niceToHave: string[] = [];
    const responsibilities: string[] = [];

    for (const line of this.candidateLines(job.skills)) {
      if (line.length < MIN_SKILL_LINE_LENGTH || !this.isMeaningful(line)) continue;
      if (this.classify(line) === 'niceToHave') {
        niceToHave.push(line);
      } else {
        mustHave.push(line);
      }
    }

    for (const line of this.candidateLines(job.responsibilities)) {
      if (line.length > MIN_RESPONSIBILITY_LENGTH && this.isMeaningful(line)) {
        responsibilities.push(line);
      }
    }

    responsibilities.push(...this.summarySentences(job.summary));

    return {
      mustHave,
      niceToHave,
      responsibilities,
      allRequirements: [
        ...mustHave.slice(0, REQUIREMENT_BUDGET.mustHave),
        ...responsibilities.slice(0, REQUIREMENT_BUDGET.responsibilities),
        ...niceToHave.slice(0, REQUIREMENT_BUDGET.niceToHave),
      ],
    };
  }

  /** Generic filler never counts; otherwise a technical or action token is required. */
  isMeaningful(line: string): boolean {
    const lower = line.toLowerCase();
    if (this.filler.matches(lower)) return false;
    return this.technical.matches(lower);
  }

  classify(line: string): RequirementCategory {
    const lower = line.toLowerCase();
    const rule = this.classifiers.find((candidate) => candidate.terms.matches(lower));
    return rule?.category ?? this.lexicon.defaultCategory;
  }

  isSectionHeader(line: string): boolean {
    const lower = line.toLowerCase().replace(/:$/, '').trim();
    if (lower.includes(':') || lower.includes(',')) return false;
    if (lower.split(/\s+/).length > this.lexicon.headerMaxWords) return false;
    return this.lexicon.headerPrefixes.some((prefix) => lower.startsWith(prefix));
  }

  private candidateLines(value: string): string[] {
    return fieldText(value)
      .split('\n')
      .map(stripBullet)
      .filter((line) => line && !line.endsWith(':') && !this.isSectionHeader(line));
  }

  private summarySentences(value: string): string[] {
    return fieldText(value)
      .replace(/[!?]/g, '.')
      .split('.')
      .map((sentence) => sentence.trim())
      .filter(
        (sentence) =>
          sentence.length > MIN_SUMMARY_SENTENCE_LENGTH &&
          this.isMeaningful(sentence) &&
          this.intent.matches(sentence.toLowerCase())
      )
      .slice(0, MAX_SUMMARY_SENTENCES);
  }
}
