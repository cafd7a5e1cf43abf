import type { MatchResult } from './types/match';
import type { IndexSnapshot } from './types/resume';

export interface DocumentSource {
  /** Rejects with a ResumeNotFoundError when there is no resume to read. */
  readResumeText(): Promise<string>;
}

export interface ResumeTextCache {
  read(): Promise<string | null>;
  write(text: string): Promise<void>;
}

export interface EmbeddingProvider {
  readonly modelName: string;
  readonly dimension: number;
  /** One L2-normalized vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

export interface TechnologyExtractor {
  /** Canonical technology names ("JavaScript", not "JS"). */
  extractTechnologies(text: string): Promise<Set<string>>;
}

export interface MatchStore {
  get(jobId: string): Promise<MatchResult | null>;
  put(jobId: string, record: MatchResult): Promise<void>;
  getAll(): Promise<Record<string, MatchResult>>;
  putMany?(records: Record<string, MatchResult>): Promise<void>;
}

export interface IndexStore {
  save(snapshot: IndexSnapshot): Promise<void>;
  load(): Promise<IndexSnapshot | null>;
}
