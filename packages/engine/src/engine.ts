import { join } from 'node:path';
import type {
  DocumentSource,
  EmbeddingProvider,
  IndexStore,
  MatchStore,
  ResumeCorpus,
  ResumeTextCache,
  TechnologyExtractor,
} from '@jobfit/core';
import { JsonFileIndexStore, JsonFileMatchStore } from './adapters/json-stores';
import { OpenAIEmbeddingProvider } from './adapters/openai-embeddings';
import { FileResumeTextCache, TextFileDocumentSource } from './adapters/text-files';
import type { EngineConfig } from './config';
import { FilterEngine } from './filters';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { MatchCache } from './match-cache';
import { JobMatcher } from './matcher';
import { RequirementExtractor } from './requirements';
import type { RequirementLexicon } from './requirements';
import { ResumeCorpusBuilder } from './resume-corpus';
import { HybridScorer } from './scorer';
import { CatalogTechnologyExtractor } from './technologies';
import { prepareIndex, VectorIndex } from './vector-index';

export interface EngineCollaborators {
  embeddings?: EmbeddingProvider;
  technologies?: TechnologyExtractor;
  documentSource?: DocumentSource;
  resumeCache?: ResumeTextCache;
  matchStore?: MatchStore;
  indexStore?: IndexStore;
  requirementLexicon?: RequirementLexicon;
  /** Builds a logger per component; defaults to scoped console loggers. */
  logger?: (scope: string) => Logger;
}

export interface Engine {
  config: EngineConfig;
  corpus: ResumeCorpus;
  index: VectorIndex;
  scorer: HybridScorer;
  cache: MatchCache;
  matcher: JobMatcher;
  filters: FilterEngine;
}

/**
 * Builds the resume corpus and index, opens the match cache, and wires the
 * scorer, matcher and filters. Rejects before any job is scored when the
 * resume is missing or the stored index belongs to another model.
 */
export async function createEngine(config: EngineConfig, collaborators: EngineCollaborators = {}): Promise<Engine> {
  const makeLogger = collaborators.logger ?? createLogger;
  const dataPath = (...segments: string[]) => join(config.dataDir, ...segments);

  const builder = new ResumeCorpusBuilder({
    source: collaborators.documentSource ?? new TextFileDocumentSource(config.resumePath),
    cache: collaborators.resumeCache ?? new FileResumeTextCache(dataPath('resume_parsed.txt')),
    skills: config.explicitSkills,
    logger: makeLogger('resume'),
  });
  const built = await builder.build();
  if (!built.ok) {
    throw built.error;
  }
  const corpus = built.value;

  const embeddings =
    collaborators.embeddings ??
    new OpenAIEmbeddingProvider({ model: config.embeddingModel, dimension: config.embeddingDimension });
  const index = new VectorIndex(embeddings, makeLogger('vector-index'));
  const indexStore = collaborators.indexStore ?? new JsonFileIndexStore(dataPath('embeddings', 'resume-index.json'));
  await prepareIndex(index, corpus, indexStore, makeLogger('vector-index'));

  const scorer = new HybridScorer({
    index,
    corpus,
    technologies: collaborators.technologies ?? new CatalogTechnologyExtractor(),
    settings: config,
    requirements: new RequirementExtractor(collaborators.requirementLexicon),
    logger: makeLogger('scorer'),
  });

  const cache = await MatchCache.open(
    collaborators.matchStore ?? new JsonFileMatchStore(dataPath('job_matches_cache.json')),
    makeLogger('match-cache')
  );

  return {
    config,
    corpus,
    index,
    scorer,
    cache,
    matcher: new JobMatcher(scorer, cache, makeLogger('matcher')),
    filters: new FilterEngine(config),
  };
}
