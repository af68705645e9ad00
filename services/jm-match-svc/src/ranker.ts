import { invalidInputError, lengthMismatchError } from '@jobmatch/common';

import type { JobCandidate, Recommendation, RecommendationFilter } from './types';

function roundScore(score: number): number {
  return Number(score.toFixed(4));
}

/**
 * Orders candidates by descending score and keeps the first `n`. Ties keep
 * their input order.
 */
export function topN(candidates: readonly JobCandidate[], scores: readonly number[], n: number): Recommendation[] {
  if (candidates.length !== scores.length) {
    throw lengthMismatchError(`Got ${candidates.length} candidates but ${scores.length} scores.`, {
      candidates: candidates.length,
      scores: scores.length
    });
  }
  if (!Number.isInteger(n) || n < 0) {
    throw invalidInputError('n must be a non-negative integer.', { n });
  }
  if (candidates.length === 0) {
    return [];
  }

  // Array.prototype.sort is stable, so equal scores stay in input order.
  const order = candidates.map((_, index) => index).sort((left, right) => scores[right] - scores[left]);

  return order.slice(0, n).map((index, position) => ({
    ...candidates[index],
    similarity: roundScore(scores[index]),
    rank: position + 1
  }));
}

export function filterRecommendations(
  recommendations: readonly Recommendation[],
  { minSimilarity = 0, location, company }: RecommendationFilter = {}
): Recommendation[] {
  const locationNeedle = location?.trim().toLowerCase();
  const companyNeedle = company?.trim().toLowerCase();

  return recommendations.filter((recommendation) => {
    if (minSimilarity > 0 && recommendation.similarity < minSimilarity) {
      return false;
    }
    if (locationNeedle && !(recommendation.location ?? '').toLowerCase().includes(locationNeedle)) {
      return false;
    }
    if (companyNeedle && !(recommendation.company ?? '').toLowerCase().includes(companyNeedle)) {
      return false;
    }
    return true;
  });
}
