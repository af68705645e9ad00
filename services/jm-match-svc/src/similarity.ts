import { dimensionMismatchError, emptyReferenceError } from '@jobmatch/common';
import type { EmbeddingSlot, EmbeddingVector } from '@jobmatch/embed-svc';
import { max, mean, median, min, quantile, standardDeviation } from 'simple-statistics';

import type { SimilarityStatistics } from './types';

const ZERO_TOLERANCE = 1e-8;

function norm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity clamped into [0, 1]. Negative correlation scores 0, as do
 * empty or all-zero vectors. Vectors of different lengths are rejected.
 */
export function similarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  if (a.length !== b.length) {
    throw dimensionMismatchError(`Vector dimensions differ: ${a.length} vs ${b.length}.`, {
      left: a.length,
      right: b.length
    });
  }

  const normA = norm(a);
  const normB = norm(b);
  if (normA < ZERO_TOLERANCE || normB < ZERO_TOLERANCE) {
    return 0;
  }

  let dot = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
  }

  return Math.min(1, Math.max(0, dot / (normA * normB)));
}

/** Scores every candidate slot against `reference`; failed slots score 0. */
export function similarityAll(reference: readonly number[], candidates: readonly EmbeddingSlot[]): number[] {
  if (reference.length === 0) {
    throw emptyReferenceError('Reference embedding is empty.');
  }

  return candidates.map((slot) => (slot.kind === 'vector' ? similarity(reference, slot.values) : 0));
}

export function similarityStatistics(scores: readonly number[]): SimilarityStatistics | null {
  if (scores.length === 0) {
    return null;
  }

  const values = [...scores];
  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    std: standardDeviation(values),
    min: min(values),
    max: max(values),
    q25: quantile(values, 0.25),
    q75: quantile(values, 0.75)
  };
}

export function similarityMatrix(vectors: readonly EmbeddingVector[]): number[][] {
  const size = vectors.length;
  const matrix = Array.from({ length: size }, () => new Array<number>(size).fill(0));

  for (let i = 0; i < size; i += 1) {
    matrix[i][i] = 1;
    for (let j = i + 1; j < size; j += 1) {
      const score = similarity(vectors[i], vectors[j]);
      matrix[i][j] = score;
      matrix[j][i] = score;
    }
  }

  return matrix;
}

