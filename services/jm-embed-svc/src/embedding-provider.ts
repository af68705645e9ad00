import OpenAI from 'openai';
import type { Logger } from 'pino';

import { configurationError } from '@jobmatch/common';

import type { EmbeddingProviderSettings } from './config';
import type { EmbeddingProviderName, EmbeddingVector, EmbedRequestOptions } from './types';

/**
 * A backend that turns a list of texts into one vector per text, in input order.
 * Providers do not retry, truncate or rate limit; the VectorProviderClient owns that.
 */
export interface EmbeddingProvider {
  readonly name: EmbeddingProviderName;
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[], options?: EmbedRequestOptions): Promise<EmbeddingVector[]>;
}

/** The slice of the OpenAI SDK this module calls. */
export interface OpenAiEmbeddingsApi {
  create(
    body: { model: string; input: string[]; encoding_format: 'float'; dimensions?: number },
    options?: { signal?: AbortSignal }
  ): Promise<{ data: Array<{ index: number; embedding: number[] }> }>;
}

export interface EmbeddingProviderFactoryOptions {
  providers: EmbeddingProviderSettings;
  logger: Logger;
  providerOverride?: EmbeddingProviderName;
  openAiApi?: OpenAiEmbeddingsApi;
}

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(token: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Offline provider: a feature-hashed bag of words, L2-normalized. Texts that
 * share words get a positive cosine, texts that share none score 0.
 */
export class LocalDeterministicProvider implements EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'local';
  readonly model = 'local-hashed-bow';
  readonly dimensions: number;

  constructor(dimensions: number) {
    this.dimensions = dimensions;
  }

  embedText(text: string): EmbeddingVector {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 0);
    for (const token of tokens) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }

    const magnitude = Math.sqrt(vector.reduce((acc, value) => acc + value * value, 0));
    return magnitude > 0 ? vector.map((value) => value / magnitude) : vector;
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    return texts.map((text) => this.embedText(text));
  }
}

export class OpenAiProvider implements EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'openai';
  readonly model: string;
  readonly dimensions: number;

  constructor(
    private readonly api: OpenAiEmbeddingsApi,
    model: string,
    dimensions: number,
    private readonly logger: Logger
  ) {
    this.model = model;
    this.dimensions = dimensions;
  }

  async embed(texts: string[], options: EmbedRequestOptions = {}): Promise<EmbeddingVector[]> {
    // Only the text-embedding-3 family accepts a dimensions override.
    const dimensions = this.model.startsWith('text-embedding-3') ? this.dimensions : undefined;

    try {
      const response = await this.api.create(
        { model: this.model, input: texts, encoding_format: 'float', dimensions },
        { signal: options.signal }
      );
      return [...response.data].sort((left, right) => left.index - right.index).map((item) => item.embedding);
    } catch (error) {
      this.logger.debug({ error, inputs: texts.length }, 'OpenAI embeddings request failed.');
      throw error;
    }
  }
}

export function createEmbeddingProvider(options: EmbeddingProviderFactoryOptions): EmbeddingProvider {
  const providerName = options.providerOverride ?? options.providers.provider;

  switch (providerName) {
    case 'openai': {
      const { apiKey, model } = options.providers.openai;
      if (!options.openAiApi && !apiKey) {
        throw configurationError('OPENAI_API_KEY must be set to use the openai embedding provider.', {
          provider: 'openai'
        });
      }
      // Retries are driven by the client, so the SDK's own retry loop is disabled.
      const api = options.openAiApi ?? new OpenAI({ apiKey, maxRetries: 0 }).embeddings;
      return new OpenAiProvider(api, model, options.providers.dimensions, options.logger.child({ provider: 'openai' }));
    }
    case 'local':
    default:
      return new LocalDeterministicProvider(options.providers.dimensions);
  }
}
