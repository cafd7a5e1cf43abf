import type { IndexSnapshot, IndexStore, MatchResult, MatchStore } from '@jobfit/core';

export class MemoryMatchStore implements MatchStore {
  private readonly records = new Map<string, MatchResult>();
  writes = 0;

  constructor(initial: Record<string, MatchResult> = {}) {
    for (const [jobId, record] of Object.entries(initial)) {
      this.records.set(jobId, record);
    }
  }

  async get(jobId: string): Promise<MatchResult | null> {
    return this.records.get(jobId) ?? null;
  }

  async put(jobId: string, record: MatchResult): Promise<void> {
    this.writes += 1;
    this.records.set(jobId, record);
  }

  async putMany(records: Record<string, MatchResult>): Promise<void> {
    this.writes += 1;
    for (const [jobId, record] of Object.entries(records)) {
      this.records.set(jobId, record);
    }
  }

  async getAll(): Promise<Record<string, MatchResult>> {
    return Object.fromEntries(this.records);
  }
}

export class MemoryIndexStore implements IndexStore {
  private snapshot: IndexSnapshot | null;

  constructor(snapshot: IndexSnapshot | null = null) {
    this.snapshot = snapshot;
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    this.snapshot = snapshot;
  }

  async load(): Promise<IndexSnapshot | null> {
    return this.snapshot;
  }
}
