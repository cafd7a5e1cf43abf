import { createStore } from 'zustand/vanilla';
import type { MatchResult } from '@jobfit/core';

export interface MatchCacheState {
  entries: Record<string, MatchResult>;
  lastUpdatedAt: number | null;
  hydrate: (records: Record<string, MatchResult>) => void;
  upsert: (jobId: string, result: MatchResult) => void;
  upsertMany: (records: Record<string, MatchResult>) => void;
}

export const createMatchCacheStore = () =>
  createStore<MatchCacheState>((set) => ({
    entries: {},
    lastUpdatedAt: null,
    hydrate: (records) => set({ entries: { ...records }, lastUpdatedAt: Date.now() }),
    upsert: (jobId, result) =>
      set((state) => ({
        entries: { ...state.entries, [jobId]: result },
        lastUpdatedAt: Date.now(),
      })),
    upsertMany: (records) =>
      set((state) => ({
        entries: { ...state.entries, ...records },
        lastUpdatedAt: Date.now(),
      })),
  }));

export type MatchCacheStore = ReturnType<typeof createMatchCacheStore>;
