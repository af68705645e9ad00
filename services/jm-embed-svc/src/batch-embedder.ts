import {
  delay,
  describeError,
  getLogger,
  invalidInputError,
  isServiceError,
  throwIfAborted,
  type Clock,
  type SleepFn
} from '@jobmatch/common';
import type { Logger } from 'pino';

import { DEFAULT_BATCH_SETTINGS, type BatchEmbedderSettings } from './config';
import { countFailed, failedSlot } from './embedding-slot';
import { RateLimiter } from './rate-limiter';
import type { EmbedBatchOptions, EmbeddingSlot } from './types';
import type { VectorProviderClient } from './vector-provider-client';

export interface BatchEmbedderOptions {
  client: Pick<VectorProviderClient, 'embedMany'>;
  settings?: Partial<BatchEmbedderSettings>;
  logger?: Logger;
  clock?: Clock;
  sleep?: SleepFn;
}

interface Chunk {
  index: number;
  start: number;
  texts: string[];
}

export class BatchEmbedder {
  readonly settings: BatchEmbedderSettings;
  private readonly client: Pick<VectorProviderClient, 'embedMany'>;
  private readonly clock: Clock | undefined;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  constructor({ client, settings, logger, clock, sleep }: BatchEmbedderOptions) {
    this.client = client;
    this.settings = { ...DEFAULT_BATCH_SETTINGS, ...settings };
    this.clock = clock;
    this.sleep = sleep ?? delay;
    this.logger = logger ?? getLogger({ module: 'batch-embedder' });
  }

  /**
   * Embeds `texts` in contiguous chunks, one client call per chunk. The result
   * has one slot per input, in input order; a failed chunk leaves `failed`
   * slots at its indices and later chunks still run.
   */
  async embedBatch(texts: readonly string[], options: EmbedBatchOptions = {}): Promise<EmbeddingSlot[]> {
    const chunkSize = options.chunkSize ?? this.settings.chunkSize;
    const { signal } = options;

    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw invalidInputError('chunkSize must be a positive integer.', { chunkSize });
    }
    if (texts.length === 0) {
      return [];
    }

    const prepared = texts.map((text) => (text.trim().length === 0 ? this.settings.placeholderText : text));
    const chunks: Chunk[] = [];
    for (let start = 0; start < prepared.length; start += chunkSize) {
      chunks.push({ index: chunks.length, start, texts: prepared.slice(start, start + chunkSize) });
    }

    // Pacing is per call, so the first chunk of every batch goes out at once.
    const pacing = new RateLimiter(this.settings.pacingDelayMs, { clock: this.clock, sleep: this.sleep });
    const results = new Array<EmbeddingSlot>(prepared.length);
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < chunks.length) {
        const chunk = chunks[cursor];
        cursor += 1;
        await this.runChunk(chunk, chunks.length, results, pacing, signal);
      }
    };

    const workerCount = Math.max(1, Math.min(Math.floor(this.settings.concurrency), chunks.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    this.logger.info(
      { total: results.length, chunks: chunks.length, failed: countFailed(results) },
      'Batch embedding complete.'
    );
    return results;
  }

  private async runChunk(
    chunk: Chunk,
    totalChunks: number,
    results: EmbeddingSlot[],
    pacing: RateLimiter,
    signal: AbortSignal | undefined
  ): Promise<void> {
    await pacing.acquire(signal);
    throwIfAborted(signal, { chunk: chunk.index });

    let slots: EmbeddingSlot[];
    try {
      slots = await this.client.embedMany(chunk.texts, { signal });
    } catch (error) {
      throwIfAborted(signal, { chunk: chunk.index });
      if (isServiceError(error, 'cancelled')) {
        throw error;
      }
      const message = describeError(error);
      this.logger.warn({ chunk: chunk.index + 1, error: message }, 'Chunk embedding failed.');
      slots = chunk.texts.map(() => failedSlot(message));
    }

    if (slots.length !== chunk.texts.length) {
      const message = `Chunk returned ${slots.length} results for ${chunk.texts.length} inputs.`;
      slots = chunk.texts.map(() => failedSlot(message));
    }

    slots.forEach((slot, offset) => {
      results[chunk.start + offset] = slot;
    });

    this.logger.debug(
      { chunk: chunk.index + 1, chunks: totalChunks, size: chunk.texts.length, failed: countFailed(slots) },
      'Chunk embedded.'
    );
  }
}
