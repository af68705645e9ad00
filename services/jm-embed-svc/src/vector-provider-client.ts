import {
  cancelledError,
  delay,
  describeError,
  getLogger,
  internalError,
  invalidInputError,
  isServiceError,
  providerExhaustedError,
  throwIfAborted,
  type Clock,
  type SleepFn
} from '@jobmatch/common';
import pRetry, { AbortError } from 'p-retry';
import type { Logger } from 'pino';

import { DEFAULT_CLIENT_SETTINGS, type VectorClientSettings } from './config';
import type { EmbeddingProvider } from './embedding-provider';
import { embeddedSlot, failedSlot } from './embedding-slot';
import { RateLimiter } from './rate-limiter';
import type {
  EmbeddingProviderInfo,
  EmbeddingSlot,
  EmbeddingVector,
  EmbedRequestOptions,
  TruncationResult
} from './types';

export interface VectorProviderClientOptions {
  provider: EmbeddingProvider;
  settings?: Partial<VectorClientSettings>;
  logger?: Logger;
  clock?: Clock;
  /** Rate-limit waits only; retry backoff runs on p-retry's own timers. */
  sleep?: SleepFn;
}

const PROBE_TEXT = 'connection check';

/**
 * Single gateway to an embedding provider: validation, truncation, rate
 * limiting and retries all happen here. Each instance owns its own rate budget.
 */
export class VectorProviderClient {
  readonly settings: VectorClientSettings;
  private readonly provider: EmbeddingProvider;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;

  constructor({ provider, settings, logger, clock, sleep }: VectorProviderClientOptions) {
    this.provider = provider;
    this.settings = { ...DEFAULT_CLIENT_SETTINGS, ...settings };
    this.rateLimiter = RateLimiter.perMinute(this.settings.requestsPerMinute, { clock, sleep: sleep ?? delay });
    this.logger = logger ?? getLogger({ module: 'vector-provider-client' });
  }

  truncate(text: string): TruncationResult {
    const tokens = text.trim().split(/\s+/);
    if (tokens.length <= this.settings.maxTokens) {
      return { text, tokenCount: tokens.length, truncated: false };
    }

    return {
      text: tokens.slice(0, this.settings.maxTokens).join(' '),
      tokenCount: tokens.length,
      truncated: true
    };
  }

  /**
   * Embeds one text, retrying failed attempts with exponential backoff
   * (`backoffBaseMs`, then doubling). Every attempt waits for its rate-limit slot.
   */
  async embedOne(text: string, options: EmbedRequestOptions = {}): Promise<EmbeddingVector> {
    const { signal } = options;
    const [prepared] = this.prepareInputs([text]);
    const { maxAttempts, backoffBaseMs } = this.settings;

    try {
      return await pRetry(
        async (attemptNumber) => {
          try {
            await this.rateLimiter.acquire(signal);
            const [vector] = this.validateVectors(await this.provider.embed([prepared], { signal }), 1);
            this.logger.debug({ attempt: attemptNumber, dimensions: vector.length }, 'Embedding generated.');
            return vector;
          } catch (error) {
            if (isServiceError(error, 'cancelled')) {
              throw new AbortError(error);
            }
            if (signal?.aborted) {
              throw new AbortError(cancelledError('Embedding cancelled.', { attempt: attemptNumber }, error));
            }
            throw error;
          }
        },
        {
          retries: Math.max(0, maxAttempts - 1),
          factor: 2,
          minTimeout: backoffBaseMs,
          randomize: false,
          signal,
          onFailedAttempt: (error) => {
            this.logger.warn(
              { attempt: error.attemptNumber, retriesLeft: error.retriesLeft, error: describeError(error) },
              'Embedding attempt failed.'
            );
          }
        }
      );
    } catch (error) {
      if (isServiceError(error, 'cancelled')) {
        throw error;
      }
      if (signal?.aborted) {
        throw cancelledError('Embedding cancelled.', { provider: this.provider.name }, error);
      }

      this.logger.error(
        { attempts: maxAttempts, provider: this.provider.name, error: describeError(error) },
        'Embedding provider exhausted all attempts.'
      );
      throw providerExhaustedError(
        `Embedding failed after ${maxAttempts} attempts: ${describeError(error)}`,
        { attempts: maxAttempts, provider: this.provider.name },
        error
      );
    }
  }

  /**
   * Embeds every text with a single provider call. A provider failure marks
   * every slot as failed instead of throwing; there is no per-item retry.
   */
  async embedMany(texts: readonly string[], options: EmbedRequestOptions = {}): Promise<EmbeddingSlot[]> {
    const { signal } = options;
    if (texts.length === 0) {
      return [];
    }

    const prepared = this.prepareInputs(texts);
    await this.rateLimiter.acquire(signal);

    try {
      const vectors = this.validateVectors(await this.provider.embed(prepared, { signal }), prepared.length);
      this.logger.debug({ count: vectors.length }, 'Batch embeddings generated.');
      return vectors.map((vector) => embeddedSlot(vector));
    } catch (error) {
      throwIfAborted(signal, { count: texts.length });
      const message = describeError(error);
      this.logger.warn({ count: texts.length, error: message }, 'Batch embedding request failed.');
      return prepared.map(() => failedSlot(message));
    }
  }

  info(): EmbeddingProviderInfo {
    return {
      provider: this.provider.name,
      model: this.provider.model,
      dimensions: this.provider.dimensions,
      maxTokens: this.settings.maxTokens,
      requestsPerMinute: this.settings.requestsPerMinute,
      rateLimit: `${this.settings.requestsPerMinute} requests/minute`
    };
  }

  /** Embeds a probe text; reports failure as `false` rather than throwing. */
  async validateConnection(options: EmbedRequestOptions = {}): Promise<boolean> {
    try {
      const vector = await this.embedOne(PROBE_TEXT, options);
      this.logger.info({ provider: this.provider.name, dimensions: vector.length }, 'Embedding provider reachable.');
      return true;
    } catch (error) {
      this.logger.error({ provider: this.provider.name, error: describeError(error) }, 'Embedding provider check failed.');
      return false;
    }
  }

  private prepareInputs(texts: readonly string[]): string[] {
    return texts.map((text, index) => {
      if (text.trim().length === 0) {
        throw invalidInputError('Text to embed must not be empty.', { index });
      }

      const result = this.truncate(text);
      if (result.truncated) {
        this.logger.warn(
          { index, tokenCount: result.tokenCount, maxTokens: this.settings.maxTokens },
          'Text exceeds token limit; truncating.'
        );
      }
      return result.text;
    });
  }

  private validateVectors(vectors: EmbeddingVector[], expected: number): EmbeddingVector[] {
    if (vectors.length !== expected) {
      throw internalError(`Provider returned ${vectors.length} embeddings for ${expected} inputs.`, {
        expected,
        received: vectors.length
      });
    }

    vectors.forEach((vector, index) => {
      if (vector.length === 0) {
        throw internalError('Provider returned an empty embedding.', { index });
      }
      if (vector.length !== this.provider.dimensions) {
        throw internalError(
          `Embedding dimensionality mismatch. Expected ${this.provider.dimensions}, received ${vector.length}.`,
          { index, expected: this.provider.dimensions, received: vector.length }
        );
      }
      if (!vector.every((value) => Number.isFinite(value))) {
        throw internalError('Provider returned non-finite embedding values.', { index });
      }
    });

    return vectors;
  }
}
