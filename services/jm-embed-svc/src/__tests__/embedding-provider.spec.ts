import { describe, expect, it, vi } from 'vitest';

import { getLogger } from '@jobmatch/common';

import type { EmbeddingProviderSettings } from '../config';
import {
  createEmbeddingProvider,
  LocalDeterministicProvider,
  OpenAiProvider,
  type OpenAiEmbeddingsApi
} from '../embedding-provider';

const logger = getLogger({ module: 'embedding-provider-test' });

function settings(overrides: Partial<EmbeddingProviderSettings> = {}): EmbeddingProviderSettings {
  return {
    provider: 'local',
    dimensions: 8,
    openai: { model: 'text-embedding-3-small' },
    ...overrides
  };
}

function norm(vector: number[]): number {
  return Math.sqrt(vector.reduce((acc, value) => acc + value * value, 0));
}

describe('LocalDeterministicProvider', () => {
  it('produces unit vectors of the configured size', async () => {
    const provider = new LocalDeterministicProvider(64);

    const [vector] = await provider.embed(['senior python engineer']);

    expect(vector).toHaveLength(64);
    expect(norm(vector)).toBeCloseTo(1, 10);
  });

  it('is deterministic and ignores case and punctuation', async () => {
    const provider = new LocalDeterministicProvider(64);

    const [first, second] = await provider.embed(['Python, Engineer!', 'python engineer']);

    expect(first).toEqual(second);
  });

  it('returns a zero vector for text without words', async () => {
    const provider = new LocalDeterministicProvider(4);

    await expect(provider.embed(['?!'])).resolves.toEqual([[0, 0, 0, 0]]);
  });
});

describe('OpenAiProvider', () => {
  it('requests float embeddings and restores input order', async () => {
    const create = vi.fn<OpenAiEmbeddingsApi['create']>(async () => ({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] }
      ]
    }));
    const provider = new OpenAiProvider({ create }, 'text-embedding-3-small', 2, logger);

    await expect(provider.embed(['first', 'second'])).resolves.toEqual([
      [1, 0],
      [0, 1]
    ]);
    expect(create).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: ['first', 'second'], encoding_format: 'float', dimensions: 2 },
      { signal: undefined }
    );
  });

  it('omits the dimensions override for older models', async () => {
    const create = vi.fn<OpenAiEmbeddingsApi['create']>(async () => ({ data: [{ index: 0, embedding: [1] }] }));
    const provider = new OpenAiProvider({ create }, 'text-embedding-ada-002', 1536, logger);

    await provider.embed(['only']);

    expect(create.mock.calls[0][0].dimensions).toBeUndefined();
  });

  it('propagates request failures', async () => {
    const create = vi.fn<OpenAiEmbeddingsApi['create']>(async () => {
      throw new Error('429 Too Many Requests');
    });
    const provider = new OpenAiProvider({ create }, 'text-embedding-3-small', 2, logger);

    await expect(provider.embed(['first'])).rejects.toThrow('429 Too Many Requests');
  });
});

describe('createEmbeddingProvider', () => {
  it('builds the local provider', () => {
    const provider = createEmbeddingProvider({ providers: settings(), logger });

    expect(provider).toBeInstanceOf(LocalDeterministicProvider);
    expect(provider.dimensions).toBe(8);
  });

  it('requires an API key for openai', () => {
    expect(() => createEmbeddingProvider({ providers: settings({ provider: 'openai' }), logger })).toThrow(
      expect.objectContaining({ code: 'configuration' })
    );
  });

  it('builds the openai provider around an injected API', () => {
    const api: OpenAiEmbeddingsApi = { create: vi.fn() };

    const provider = createEmbeddingProvider({ providers: settings(), logger, providerOverride: 'openai', openAiApi: api });

    expect(provider).toBeInstanceOf(OpenAiProvider);
    expect(provider.model).toBe('text-embedding-3-small');
  });
});
