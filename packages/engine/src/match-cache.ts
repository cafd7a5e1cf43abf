import type { MatchResult, MatchStore } from '@jobfit/core';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { createMatchCacheStore } from './state/matchCacheStore';
import type { MatchCacheStore } from './state/matchCacheStore';

/**
 * Per-job memo of match results, held in memory and written through to a
 * MatchStore. Results are replaced whole; there are no partial updates.
 * Not safe for concurrent writers: get-then-put is not atomic.
 */
export class MatchCache {
  private readonly state: MatchCacheStore = createMatchCacheStore();

  private constructor(
    private readonly store: MatchStore,
    private readonly logger: Logger
  ) {}

  /** Opens the cache and loads every stored record. */
  static async open(store: MatchStore, logger: Logger = createLogger('match-cache')): Promise<MatchCache> {
    const cache = new MatchCache(store, logger);
    const records = await store.getAll();
    cache.state.getState().hydrate(records);
    logger.debug(`Loaded ${Object.keys(records).length} cached matches`);
    return cache;
  }

  get size(): number {
    return Object.keys(this.state.getState().entries).length;
  }

  get(jobId: string): MatchResult | undefined {
    return this.state.getState().entries[jobId];
  }

  getAll(): Record<string, MatchResult> {
    return { ...this.state.getState().entries };
  }

  async put(jobId: string, result: MatchResult): Promise<void> {
    await this.store.put(jobId, result);
    this.state.getState().upsert(jobId, result);
  }

  /** Writes a batch of results with a single store call when the store supports it. */
  async putMany(records: Record<string, MatchResult>): Promise<void> {
    const jobIds = Object.keys(records);
    if (jobIds.length === 0) return;
    if (this.store.putMany) {
      await this.store.putMany(records);
    } else {
      for (const jobId of jobIds) {
        await this.store.put(jobId, records[jobId]);
      }
    }
    this.state.getState().upsertMany(records);
    this.logger.debug(`Saved ${jobIds.length} matches`);
  }

  subscribe(listener: (entries: Record<string, MatchResult>) => void): () => void {
    return this.state.subscribe((state) => listener(state.entries));
  }
}
