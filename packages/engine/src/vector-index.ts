import { ConfigurationMismatchError } from '@jobfit/core';
import type { EmbeddingProvider, IndexSnapshot, IndexStore, ResumeCorpus, ResumeUnit, SearchHit } from '@jobfit/core';
import { createLogger } from './logger';
import type { Logger } from './logger';

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Flat inner-product index over resume unit embeddings. Vectors are
 * expected L2-normalized, so the inner product is the cosine similarity.
 */
export class VectorIndex {
  private units: ResumeUnit[] = [];
  private vectors: number[][] = [];

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly logger: Logger = createLogger('vector-index')
  ) {}

  get size(): number {
    return this.units.length;
  }

  get unitList(): readonly ResumeUnit[] {
    return this.units;
  }

  async build(units: ResumeCorpus): Promise<void> {
    this.logger.info(`Building index from ${units.length} resume units (${this.provider.modelName})`);
    const vectors = units.length > 0 ? await this.embed([...units]) : [];
    this.units = [...units];
    this.vectors = vectors;
    this.logger.debug(`Index built with ${this.vectors.length} vectors`);
  }

  /**
   * Up to `k` hits per query, similarity descending, ties by corpus index.
   * `k` is clamped to the corpus size.
   */
  async search(queries: string[], k: number): Promise<SearchHit[][]> {
    if (queries.length === 0) return [];
    const limit = Math.min(Math.max(0, Math.floor(k)), this.units.length);
    if (limit === 0) return queries.map(() => []);

    const queryVectors = await this.embed(queries);
    return queryVectors.map((queryVector) =>
      this.vectors
        .map((vector, index) => ({ unitText: this.units[index], similarity: dot(queryVector, vector), index }))
        .sort((a, b) => b.similarity - a.similarity || a.index - b.index)
        .slice(0, limit)
    );
  }

  snapshot(): IndexSnapshot {
    return {
      modelName: this.provider.modelName,
      dimension: this.provider.dimension,
      units: [...this.units],
      vectors: this.vectors.map((vector) => [...vector]),
    };
  }

  async persist(store: IndexStore): Promise<void> {
    await store.save(this.snapshot());
    this.logger.debug(`Persisted index with ${this.units.length} units`);
  }

  /**
   * Loads a stored snapshot. Resolves false when nothing is stored; throws
   * ConfigurationMismatchError when the snapshot was built with another
   * model or dimension.
   */
  async reload(store: IndexStore): Promise<boolean> {
    const snapshot = await store.load();
    if (!snapshot) return false;

    const current = { modelName: this.provider.modelName, dimension: this.provider.dimension };
    if (snapshot.modelName !== current.modelName || snapshot.dimension !== current.dimension) {
      throw new ConfigurationMismatchError(
        { modelName: snapshot.modelName, dimension: snapshot.dimension },
        current
      );
    }
    if (snapshot.vectors.length !== snapshot.units.length) {
      throw new Error(
        `Stored index is corrupt: ${snapshot.units.length} units but ${snapshot.vectors.length} vectors`
      );
    }
    this.assertDimensions(snapshot.vectors);

    this.units = [...snapshot.units];
    this.vectors = snapshot.vectors.map((vector) => [...vector]);
    this.logger.info(`Loaded cached index with ${this.units.length} vectors`);
    return true;
  }

  private async embed(texts: string[]): Promise<number[][]> {
    const vectors = await this.provider.embed(texts);
    if (vectors.length !== texts.length) {
      throw new Error(`Embedding provider returned ${vectors.length} vectors for ${texts.length} texts`);
    }
    this.assertDimensions(vectors);
    return vectors;
  }

  private assertDimensions(vectors: number[][]): void {
    const wrong = vectors.find((vector) => vector.length !== this.provider.dimension);
    if (wrong) {
      throw new Error(`Expected vectors of dimension ${this.provider.dimension}, got ${wrong.length}`);
    }
  }
}

function sameUnits(a: readonly ResumeUnit[], b: readonly ResumeUnit[]): boolean {
  return a.length === b.length && a.every((unit, index) => unit === b[index]);
}

/**
 * Reuses the stored index when it was built from this exact corpus;
 * otherwise builds and persists a fresh one. Model mismatches propagate.
 */
export async function prepareIndex(
  index: VectorIndex,
  corpus: ResumeCorpus,
  store: IndexStore,
  logger: Logger = createLogger('vector-index')
): Promise<'loaded' | 'built'> {
  const loaded = await index.reload(store);
  if (loaded && sameUnits(index.unitList, corpus)) {
    return 'loaded';
  }
  if (loaded) {
    logger.warn('Resume corpus changed since the index was built, rebuilding');
  }
  await index.build(corpus);
  await index.persist(store);
  return 'built';
}
