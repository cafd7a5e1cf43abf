import OpenAI from 'openai';
import { ConfigurationError } from '@jobfit/core';
import type { EmbeddingProvider } from '@jobfit/core';

const KNOWN_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/** Models that accept a `dimensions` parameter to shorten their vectors. */
const SHORTENABLE_MODELS = new Set(['text-embedding-3-small', 'text-embedding-3-large']);

const MAX_INPUTS_PER_REQUEST = 2048;

/** The slice of the OpenAI client this provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[]; dimensions?: number }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export interface OpenAIEmbeddingOptions {
  model: string;
  dimension?: number;
  apiKey?: string;
  client?: EmbeddingsClient;
}

export function normalizeVector(vector: readonly number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) return [...vector];
  return vector.map((value) => value / norm);
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly modelName: string;
  readonly dimension: number;
  private readonly client: EmbeddingsClient;
  private readonly requestDimensions?: number;

  constructor(options: OpenAIEmbeddingOptions) {
    const knownDimension = KNOWN_DIMENSIONS[options.model];
    const dimension = options.dimension ?? knownDimension;
    if (!dimension) {
      throw new ConfigurationError([
        `embedding_dimension: required for model ${options.model}, whose dimension is not known`,
      ]);
    }
    if (options.dimension && knownDimension && options.dimension !== knownDimension) {
      if (!SHORTENABLE_MODELS.has(options.model)) {
        throw new ConfigurationError([`embedding_dimension: ${options.model} only produces ${knownDimension}`]);
      }
      this.requestDimensions = options.dimension;
    }

    this.modelName = options.model;
    this.dimension = dimension;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey ?? process.env.OPENAI_API_KEY });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += MAX_INPUTS_PER_REQUEST) {
      const batch = texts.slice(start, start + MAX_INPUTS_PER_REQUEST);
      const response = await this.client.embeddings.create({
        model: this.modelName,
        input: batch,
        ...(this.requestDimensions ? { dimensions: this.requestDimensions } : {}),
      });
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((item) => normalizeVector(item.embedding)));
    }
    return vectors;
  }
}
