import type { IndexSnapshot, IndexStore, MatchResult, MatchStore } from '@jobfit/core';
import { indexSnapshotSchema, matchRecordsSchema } from '../schemas';
import { readTextIfExists, writeTextAtomic } from './fs-utils';

function parseJson(text: string, filePath: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`${filePath} is not valid JSON: ${detail}`);
  }
}

/** All match results in one JSON object keyed by job id. */
export class JsonFileMatchStore implements MatchStore {
  constructor(private readonly filePath: string) {}

  async getAll(): Promise<Record<string, MatchResult>> {
    const text = await readTextIfExists(this.filePath);
    if (text === null) return {};
    return matchRecordsSchema.parse(parseJson(text, this.filePath));
  }

  async get(jobId: string): Promise<MatchResult | null> {
    const records = await this.getAll();
    return records[jobId] ?? null;
  }

  async put(jobId: string, record: MatchResult): Promise<void> {
    await this.putMany({ [jobId]: record });
  }

  async putMany(records: Record<string, MatchResult>): Promise<void> {
    const existing = await this.getAll();
    await writeTextAtomic(this.filePath, JSON.stringify({ ...existing, ...records }, null, 2));
  }
}

export class JsonFileIndexStore implements IndexStore {
  constructor(private readonly filePath: string) {}

  async save(snapshot: IndexSnapshot): Promise<void> {
    await writeTextAtomic(this.filePath, JSON.stringify(snapshot));
  }

  async load(): Promise<IndexSnapshot | null> {
    const text = await readTextIfExists(this.filePath);
    if (text === null) return null;
    return indexSnapshotSchema.parse(parseJson(text, this.filePath));
  }
}
