/**
 * Percentile ranking within a universe of comparable values.
 * A rank is the share of the universe strictly on the worse side of a value,
 * expressed 0-100 and rounded to 2 decimals. Ties never earn partial credit.
 */

import { createChildLogger } from '@/utils/logger';
import { roundScore } from './normalize';

const logger = createChildLogger('percentile');

/** Neutral rank for a value with no peers left to compare against. */
export const NEUTRAL_PERCENTILE = 50;

type MaybeNumber = number | null | undefined;

export interface RelativeCounts {
  below: number;
  equal: number;
  above: number;
}

export function isPresent(value: MaybeNumber): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

function presentValues(universe: readonly MaybeNumber[]): number[] {
  return universe.filter(isPresent);
}

/** Drops exactly one occurrence of the value: the entity itself, not its ties. */
function withoutSelf(values: number[], value: number): number[] {
  const index = values.indexOf(value);
  if (index === -1) return values;
  return [...values.slice(0, index), ...values.slice(index + 1)];
}

export function countRelative(value: number, universe: readonly MaybeNumber[]): RelativeCounts {
  const counts: RelativeCounts = { below: 0, equal: 0, above: 0 };
  for (const v of presentValues(universe)) {
    if (v < value) counts.below += 1;
    else if (v > value) counts.above += 1;
    else counts.equal += 1;
  }
  return counts;
}

function rank(
  value: MaybeNumber,
  universe: readonly MaybeNumber[],
  excludeSelf: boolean,
  inverted: boolean
): number | null {
  if (!isPresent(value)) {
    logger.warn('Cannot rank a missing value');
    return null;
  }

  let comparable = presentValues(universe);
  if (comparable.length === 0) {
    logger.warn('Cannot rank against an empty universe');
    return null;
  }

  if (excludeSelf) {
    comparable = withoutSelf(comparable, value);
    if (comparable.length === 0) {
      return NEUTRAL_PERCENTILE;
    }
  }

  const counts = countRelative(value, comparable);
  const favorable = inverted ? counts.above : counts.below;
  return roundScore((favorable / comparable.length) * 100);
}

/** Higher raw value ranks higher (ROE, margins, composite scores). */
export function percentileRank(
  value: MaybeNumber,
  universe: readonly MaybeNumber[],
  excludeSelf: boolean = false
): number | null {
  return rank(value, universe, excludeSelf, false);
}

/** Lower raw value ranks higher (P/E, debt/equity). */
export function percentileRankInverted(
  value: MaybeNumber,
  universe: readonly MaybeNumber[],
  excludeSelf: boolean = false
): number | null {
  return rank(value, universe, excludeSelf, true);
}

/**
 * Ranks every value against all the others. Missing entries stay null and
 * do not count towards anyone's universe.
 */
export function rankUniverse(
  values: readonly MaybeNumber[],
  inverted: boolean = false
): (number | null)[] {
  const comparable = presentValues(values);
  if (comparable.length === 0) {
    return values.map(() => null);
  }

  return values.map((value) =>
    isPresent(value) ? rank(value, comparable, true, inverted) : null
  );
}

export function isValidPercentile(score: MaybeNumber): score is number {
  return isPresent(score) && Number.isFinite(score) && score >= 0 && score <= 100;
}
