export type EmbeddingVector = number[];

export type EmbeddingProviderName = 'openai' | 'local';

export interface EmbeddedSlot {
  kind: 'vector';
  values: EmbeddingVector;
}

export interface FailedSlot {
  kind: 'failed';
  error: string;
}

/**
 * Per-item outcome of a batched embedding request. Failures stay in place so
 * batch results remain index-aligned with their inputs.
 */
export type EmbeddingSlot = EmbeddedSlot | FailedSlot;

export interface EmbedRequestOptions {
  signal?: AbortSignal;
}

export interface EmbedBatchOptions extends EmbedRequestOptions {
  chunkSize?: number;
}

export interface EmbeddingProviderInfo {
  provider: EmbeddingProviderName;
  model: string;
  dimensions: number;
  maxTokens: number;
  requestsPerMinute: number;
  rateLimit: string;
}

export interface TruncationResult {
  text: string;
  tokenCount: number;
  truncated: boolean;
}
