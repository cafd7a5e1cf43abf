export { parseEngineConfig, loadEngineConfig, DEFAULT_WEIGHTS } from './config';
export type { EngineConfig, ScoreWeights, RawEngineConfig } from './config';
export { createLogger, silentLogger } from './logger';
export type { Logger } from './logger';

export { toJobPosting } from './jobs';
export type { ScrapedJob } from './jobs';

export { ResumeCorpusBuilder, extractBullets, expandSkills } from './resume-corpus';
export type { ResumeCorpusBuilderOptions } from './resume-corpus';
export { VectorIndex, prepareIndex } from './vector-index';
export { RequirementExtractor, DEFAULT_REQUIREMENT_LEXICON, REQUIREMENT_BUDGET } from './requirements';
export type { RequirementLexicon } from './requirements';
export { CatalogTechnologyExtractor, DEFAULT_TECHNOLOGY_CATALOG } from './technologies';
export type { TechnologyCatalog } from './technologies';
export {
  HybridScorer,
  NO_REQUIREMENTS_ERROR,
  keywordOverlap,
  seniorityAlignment,
  semanticStrength,
  weightedScore,
} from './scorer';
export type { HybridScorerOptions, ScorerSettings } from './scorer';
export { MatchCache } from './match-cache';
export { JobMatcher } from './matcher';
export type { JobScorer, AnalyzeOptions, BatchOptions } from './matcher';
export { FilterEngine } from './filters';
export type { FilterSettings, ContentFilter } from './filters';
export { createEngine } from './engine';
export type { Engine, EngineCollaborators } from './engine';

export { TextFileDocumentSource, FileResumeTextCache } from './adapters/text-files';
export { JsonFileMatchStore, JsonFileIndexStore } from './adapters/json-stores';
export { MemoryMatchStore, MemoryIndexStore } from './adapters/memory-stores';
export { OpenAIEmbeddingProvider, normalizeVector } from './adapters/openai-embeddings';
export type { EmbeddingsClient, OpenAIEmbeddingOptions } from './adapters/openai-embeddings';
