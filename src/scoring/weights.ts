import { ComputationError } from '@/core/errors';
import { PILLARS, type Pillar, type WeightRange, type WeightSet } from './types';

export const DEFAULT_WEIGHT_TOLERANCE = 0.001;

export function weightSum(weights: Readonly<Record<Pillar, number>>): number {
  return weights.fundamental + weights.technical + weights.sentiment;
}

export function sumsToOne(
  weights: Readonly<Record<Pillar, number>>,
  tolerance: number = DEFAULT_WEIGHT_TOLERANCE
): boolean {
  return Math.abs(weightSum(weights) - 1) <= tolerance;
}

/**
 * Builds a frozen WeightSet. Fails when any weight is not a finite number in
 * [0, 1] or when the three do not sum to 1 within the tolerance.
 */
export function createWeightSet(
  input: Readonly<Record<Pillar, number>>,
  tolerance: number = DEFAULT_WEIGHT_TOLERANCE,
  entityId: string | null = null
): WeightSet {
  for (const pillar of PILLARS) {
    const w = input[pillar];
    if (typeof w !== 'number' || !Number.isFinite(w) || w < 0 || w > 1) {
      throw new ComputationError(`${pillar} weight must be a number in [0, 1], got ${w}`, entityId);
    }
  }

  if (!sumsToOne(input, tolerance)) {
    const total = weightSum(input);
    throw new ComputationError(
      `Weights must sum to 1.0, got ${total.toFixed(4)} ` +
        `(F: ${input.fundamental}, T: ${input.technical}, S: ${input.sentiment})`,
      entityId
    );
  }

  return Object.freeze({
    fundamental: input.fundamental,
    technical: input.technical,
    sentiment: input.sentiment,
  });
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function checkWeightRanges(
  weights: Readonly<Record<Pillar, number>>,
  ranges: Readonly<Record<Pillar, WeightRange>>
): string[] {
  const violations: string[] = [];
  for (const pillar of PILLARS) {
    const value = weights[pillar];
    const { min, max } = ranges[pillar];
    if (!(value >= min && value <= max)) {
      violations.push(
        `${capitalize(pillar)} weight ${value.toFixed(2)} outside permissible range ` +
          `[${min.toFixed(2)}, ${max.toFixed(2)}]`
      );
    }
  }
  return violations;
}
