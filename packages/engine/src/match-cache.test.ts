import { describe, expect, it, vi } from 'vitest';
import type { MatchResult, MatchStore } from '@jobfit/core';
import { MemoryMatchStore } from './adapters/memory-stores';
import { silentLogger } from './logger';
import { MatchCache } from './match-cache';
import { matchResult } from './testing/fakes';

describe('MatchCache', () => {
  it('loads stored results when opened', async () => {
    const stored = matchResult(64);
    const cache = await MatchCache.open(new MemoryMatchStore({ 'job-1': stored }), silentLogger);

    expect(cache.size).toBe(1);
    expect(cache.get('job-1')).toBe(stored);
    expect(cache.get('job-2')).toBeUndefined();
  });

  it('writes single results through to the store', async () => {
    const store = new MemoryMatchStore();
    const cache = await MatchCache.open(store, silentLogger);
    const result = matchResult(72);

    await cache.put('job-1', result);

    expect(cache.get('job-1')).toBe(result);
    expect(await store.get('job-1')).toBe(result);
    expect(store.writes).toBe(1);
  });

  it('saves a batch with one store write', async () => {
    const store = new MemoryMatchStore();
    const cache = await MatchCache.open(store, silentLogger);

    await cache.putMany({ a: matchResult(10), b: matchResult(20) });
    await cache.putMany({});

    expect(store.writes).toBe(1);
    expect(Object.keys(await store.getAll())).toEqual(['a', 'b']);
    expect(cache.size).toBe(2);
  });

  it('falls back to single writes for stores without batch support', async () => {
    const records: Record<string, MatchResult> = {};
    const store: MatchStore = {
      get: async (jobId) => records[jobId] ?? null,
      put: vi.fn(async (jobId: string, record: MatchResult) => {
        records[jobId] = record;
      }),
      getAll: async () => ({ ...records }),
    };
    const cache = await MatchCache.open(store, silentLogger);

    await cache.putMany({ a: matchResult(10), b: matchResult(20) });

    expect(store.put).toHaveBeenCalledTimes(2);
    expect(records.b.fitScore).toBe(20);
  });

  it('hands out copies of its entries', async () => {
    const cache = await MatchCache.open(new MemoryMatchStore({ a: matchResult(10) }), silentLogger);

    const entries = cache.getAll();
    delete entries.a;

    expect(cache.get('a')?.fitScore).toBe(10);
  });

  it('notifies subscribers of new entries until they unsubscribe', async () => {
    const cache = await MatchCache.open(new MemoryMatchStore(), silentLogger);
    const listener = vi.fn();

    const unsubscribe = cache.subscribe(listener);
    await cache.put('a', matchResult(10));
    unsubscribe();
    await cache.put('b', matchResult(20));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(Object.keys(listener.mock.calls[0][0])).toEqual(['a']);
  });
});
