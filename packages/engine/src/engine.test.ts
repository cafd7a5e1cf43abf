import { describe, expect, it } from 'vitest';
import { ConfigurationMismatchError, ResumeNotFoundError } from '@jobfit/core';
import type { DocumentSource, ResumeTextCache } from '@jobfit/core';
import { MemoryIndexStore, MemoryMatchStore } from './adapters/memory-stores';
import { parseEngineConfig } from './config';
import { createEngine } from './engine';
import type { EngineCollaborators } from './engine';
import { silentLogger } from './logger';
import { emptyJob, KeywordEmbeddingProvider } from './testing/fakes';

const VOCABULARY = ['python', 'aws', 'docker', 'react', 'lead'];
const config = parseEngineConfig({ explicit_skills: { cloud: ['AWS'] } });

const resumeSource = (text: string): DocumentSource => ({ readResumeText: async () => text });

const noTextCache = (): ResumeTextCache => ({ read: async () => null, write: async () => {} });

function collaborators(overrides: Partial<EngineCollaborators> = {}): EngineCollaborators {
  return {
    embeddings: new KeywordEmbeddingProvider(VOCABULARY),
    documentSource: resumeSource('Built data pipelines in Python and Docker containers\n'),
    resumeCache: noTextCache(),
    matchStore: new MemoryMatchStore(),
    indexStore: new MemoryIndexStore(),
    logger: () => silentLogger,
    ...overrides,
  };
}

describe('createEngine', () => {
  it('builds the corpus and index and scores jobs end to end', async () => {
    const matchStore = new MemoryMatchStore();
    const engine = await createEngine(config, collaborators({ matchStore }));

    const result = await engine.matcher.analyzeSingle(emptyJob('job-1', { skills: 'Required: Python, AWS, Docker' }));

    expect(engine.corpus).toEqual(['Built data pipelines in Python and Docker containers', 'Proficient in AWS']);
    expect(engine.index.size).toBe(2);
    if (!result.ok) throw result.error;
    expect(result.value.keywordMatch).toBe(100);
    expect(result.value.skillMatch).toBe(56.7);
    expect(result.value.fitScore).toBe(91.2);
    expect(result.value.matchedBullets.map((bullet) => bullet.text)).toEqual([
      'Built data pipelines in Python and Docker containers',
      'Proficient in AWS',
    ]);
    expect((await matchStore.get('job-1'))?.fitScore).toBe(91.2);
    expect(engine.filters.decide(emptyJob('job-1'), result.value, true)).toEqual({ skip: false, autoSave: true });
  });

  it('reuses the stored index on the next start', async () => {
    const indexStore = new MemoryIndexStore();
    await createEngine(config, collaborators({ indexStore }));
    const provider = new KeywordEmbeddingProvider(VOCABULARY);

    await createEngine(config, collaborators({ indexStore, embeddings: provider }));

    expect(provider.calls).toEqual([]);
  });

  it('fails before scoring when the resume is missing', async () => {
    const missing: DocumentSource = {
      readResumeText: () => Promise.reject(new ResumeNotFoundError('Resume not found at input/resume.txt')),
    };

    await expect(createEngine(config, collaborators({ documentSource: missing }))).rejects.toBeInstanceOf(
      ResumeNotFoundError
    );
  });

  it('fails when the stored index belongs to another model', async () => {
    const indexStore = new MemoryIndexStore();
    await createEngine(config, collaborators({ indexStore }));

    const switched = collaborators({ indexStore, embeddings: new KeywordEmbeddingProvider(VOCABULARY, 'other-model') });

    await expect(createEngine(config, switched)).rejects.toBeInstanceOf(ConfigurationMismatchError);
  });

  it('opens the match cache from the store', async () => {
    const matchStore = new MemoryMatchStore();
    const first = await createEngine(config, collaborators({ matchStore }));
    await first.matcher.analyzeSingle(emptyJob('job-1', { skills: 'Required: Python, AWS, Docker' }));

    const second = await createEngine(config, collaborators({ matchStore }));

    expect(second.cache.get('job-1')?.fitScore).toBe(91.2);
  });
});
