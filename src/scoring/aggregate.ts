/**
 * Weighted aggregation of optional scores.
 *
 * Every aggregation level (metric ranks into a pillar, pillars into a
 * composite) goes through weightedAverage: entries whose score is missing are
 * dropped together with their weight, and the surviving weights are
 * renormalized to sum to 1.
 */

import { createChildLogger } from '@/utils/logger';
import { isPresent } from './percentile';
import { roundScore } from './normalize';

const logger = createChildLogger('aggregate');

export function weightedAverage(
  values: readonly (number | null | undefined)[],
  weights?: readonly number[]
): number | null {
  if (weights && weights.length !== values.length) {
    throw new Error(
      `weights length ${weights.length} does not match values length ${values.length}`
    );
  }

  const pairs: Array<[number, number]> = [];
  values.forEach((value, i) => {
    if (isPresent(value)) {
      pairs.push([value, weights ? weights[i] : 1]);
    }
  });

  if (pairs.length === 0) {
    logger.debug('No present values to average');
    return null;
  }

  const totalWeight = pairs.reduce((sum, [, w]) => sum + w, 0);
  if (!(totalWeight > 0)) {
    logger.warn({ totalWeight }, 'Remaining weights do not sum to a positive total');
    return null;
  }

  return pairs.reduce((sum, [value, w]) => sum + value * (w / totalWeight), 0);
}

/** Weighted mean of percentile ranks, rounded to 2 decimals. */
export function averagePercentileRanks(
  ranks: readonly (number | null | undefined)[],
  weights?: readonly number[]
): number | null {
  const average = weightedAverage(ranks, weights);
  return average === null ? null : roundScore(average);
}
