import {
  getConfig as getBaseConfig,
  parseNumber,
  parsePositiveNumber,
  readOptionalString,
  type ServiceConfig
} from '@jobmatch/common';

import type { EmbeddingProviderName } from './types';

export interface OpenAiSettings {
  apiKey?: string;
  model: string;
}

export interface EmbeddingProviderSettings {
  provider: EmbeddingProviderName;
  dimensions: number;
  openai: OpenAiSettings;
}

export interface VectorClientSettings {
  maxTokens: number;
  maxAttempts: number;
  requestsPerMinute: number;
  backoffBaseMs: number;
}

export interface BatchEmbedderSettings {
  chunkSize: number;
  pacingDelayMs: number;
  concurrency: number;
  placeholderText: string;
}

export interface EmbedServiceConfig {
  base: ServiceConfig;
  providers: EmbeddingProviderSettings;
  client: VectorClientSettings;
  batch: BatchEmbedderSettings;
}

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export const MODEL_DIMENSIONS: Readonly<Record<string, number>> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536
};

export const DEFAULT_CLIENT_SETTINGS: VectorClientSettings = {
  maxTokens: 8000,
  maxAttempts: 3,
  requestsPerMinute: 3000,
  backoffBaseMs: 1000
};

export const DEFAULT_BATCH_SETTINGS: BatchEmbedderSettings = {
  chunkSize: 20,
  pacingDelayMs: 1000,
  concurrency: 4,
  placeholderText: 'empty text'
};

let cachedConfig: EmbedServiceConfig | null = null;

function resolveProviderName(apiKey: string | undefined): EmbeddingProviderName {
  const value = process.env.EMBEDDING_PROVIDER?.trim().toLowerCase();
  if (value === 'openai') {
    return 'openai';
  }
  if (value === 'local') {
    return 'local';
  }
  return apiKey ? 'openai' : 'local';
}

export function getEmbedServiceConfig(): EmbedServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();
  const apiKey = readOptionalString(process.env.OPENAI_API_KEY);
  const model = readOptionalString(process.env.EMBEDDING_MODEL) ?? DEFAULT_EMBEDDING_MODEL;

  const providers: EmbeddingProviderSettings = {
    provider: resolveProviderName(apiKey),
    dimensions: parsePositiveNumber(process.env.EMBEDDING_DIMENSIONS, MODEL_DIMENSIONS[model] ?? 1536),
    openai: {
      apiKey,
      model
    }
  };

  const client: VectorClientSettings = {
    maxTokens: parsePositiveNumber(process.env.EMBEDDING_MAX_TOKENS, DEFAULT_CLIENT_SETTINGS.maxTokens),
    maxAttempts: parsePositiveNumber(process.env.EMBEDDING_MAX_ATTEMPTS, DEFAULT_CLIENT_SETTINGS.maxAttempts),
    requestsPerMinute: parsePositiveNumber(
      process.env.EMBEDDING_REQUESTS_PER_MINUTE,
      DEFAULT_CLIENT_SETTINGS.requestsPerMinute
    ),
    backoffBaseMs: Math.max(0, parseNumber(process.env.EMBEDDING_BACKOFF_BASE_MS, DEFAULT_CLIENT_SETTINGS.backoffBaseMs))
  };

  const batch: BatchEmbedderSettings = {
    chunkSize: parsePositiveNumber(process.env.EMBED_BATCH_SIZE, DEFAULT_BATCH_SETTINGS.chunkSize),
    pacingDelayMs: Math.max(0, parseNumber(process.env.EMBED_BATCH_DELAY_MS, DEFAULT_BATCH_SETTINGS.pacingDelayMs)),
    concurrency: parsePositiveNumber(process.env.EMBED_BATCH_CONCURRENCY, DEFAULT_BATCH_SETTINGS.concurrency),
    placeholderText: DEFAULT_BATCH_SETTINGS.placeholderText
  };

  cachedConfig = {
    base,
    providers,
    client,
    batch
  };

  return cachedConfig;
}

export function resetEmbedServiceConfig(): void {
  cachedConfig = null;
}
