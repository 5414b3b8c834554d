import type { Recommendation, RecommendationBound } from './types';

export const DEFAULT_RECOMMENDATION_BOUNDS: readonly RecommendationBound[] = [
  [85, 'STRONG_BUY'],
  [70, 'BUY'],
  [30, 'HOLD'],
  [16, 'SELL'],
  [0, 'STRONG_SELL'],
];

/**
 * First bucket whose inclusive lower bound the percentile reaches. Bounds are
 * ordered from highest to lowest; anything below the last bound falls into
 * the last bucket.
 */
export function recommendationFor(
  percentile: number,
  bounds: readonly RecommendationBound[] = DEFAULT_RECOMMENDATION_BOUNDS
): Recommendation {
  if (bounds.length === 0) {
    throw new Error('recommendation bounds must not be empty');
  }
  for (const [lowerBound, label] of bounds) {
    if (percentile >= lowerBound) return label;
  }
  return bounds[bounds.length - 1][1];
}

export function formatRecommendation(recommendation: Recommendation): string {
  return recommendation.replace('_', ' ');
}
