export type { JobPosting, JobTextField, RequirementSet, RequirementCategory } from './types/job';
export type {
  MatchResult,
  MatchedBullet,
  AnalyzedJob,
  FilterDecision,
  BatchFailure,
  BatchSummary,
  BatchReport,
} from './types/match';
export type { ResumeUnit, ResumeCorpus, SkillsConfig, SearchHit, IndexSnapshot } from './types/resume';
export type {
  DocumentSource,
  ResumeTextCache,
  EmbeddingProvider,
  TechnologyExtractor,
  MatchStore,
  IndexStore,
} from './collaborators';
export type { Result } from './result';
export { ok, err } from './result';
export type { EngineErrorKind, IndexSignature } from './errors';
export {
  EngineError,
  ResumeNotFoundError,
  ConfigurationMismatchError,
  ConfigurationError,
  ScoreError,
} from './errors';
