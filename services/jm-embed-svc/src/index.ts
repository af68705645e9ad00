import { getLogger, type Clock, type SleepFn } from '@jobmatch/common';
import type { Logger } from 'pino';

import { BatchEmbedder } from './batch-embedder';
import { getEmbedServiceConfig, type EmbedServiceConfig } from './config';
import { createEmbeddingProvider, type EmbeddingProvider, type OpenAiEmbeddingsApi } from './embedding-provider';
import { VectorProviderClient } from './vector-provider-client';

export * from './batch-embedder';
export * from './config';
export * from './embedding-provider';
export * from './embedding-slot';
export * from './rate-limiter';
export * from './types';
export * from './vector-provider-client';

export interface EmbeddingStack {
  provider: EmbeddingProvider;
  client: VectorProviderClient;
  batchEmbedder: BatchEmbedder;
}

export interface EmbeddingStackOptions {
  config?: EmbedServiceConfig;
  provider?: EmbeddingProvider;
  openAiApi?: OpenAiEmbeddingsApi;
  logger?: Logger;
  clock?: Clock;
  sleep?: SleepFn;
}

/** Wires provider, client and batch embedder from configuration. */
export function createEmbeddingStack(options: EmbeddingStackOptions = {}): EmbeddingStack {
  const config = options.config ?? getEmbedServiceConfig();
  const logger = options.logger ?? getLogger({ module: 'embed-svc' });

  const provider =
    options.provider ??
    createEmbeddingProvider({
      providers: config.providers,
      logger,
      openAiApi: options.openAiApi
    });

  const client = new VectorProviderClient({
    provider,
    settings: config.client,
    logger: logger.child({ component: 'vector-provider-client' }),
    clock: options.clock,
    sleep: options.sleep
  });

  const batchEmbedder = new BatchEmbedder({
    client,
    settings: config.batch,
    logger: logger.child({ component: 'batch-embedder' }),
    clock: options.clock,
    sleep: options.sleep
  });

  logger.info({ provider: provider.name, model: provider.model, dimensions: provider.dimensions }, 'Embedding stack ready.');

  return { provider, client, batchEmbedder };
}
