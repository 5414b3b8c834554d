/**
 * Policy configuration: weights, ranges, caps, ceilings and recommendation
 * thresholds. Loaded once at the edge and handed to every component as an
 * explicit, frozen object; nothing in the scoring or override math reads
 * process-wide state.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { loadEnvConfig } from '@/core/env';
import { validatePolicy } from '@/validation/ajv_instance';
import { deepFreeze } from '@/utils/immutable';
import { DEFAULT_RECOMMENDATION_BOUNDS } from '@/scoring/recommendation';
import {
  checkWeightRanges,
  createWeightSet,
  DEFAULT_WEIGHT_TOLERANCE,
  sumsToOne,
} from '@/scoring/weights';
import {
  PILLARS,
  type ConvictionLevel,
  type Pillar,
  type Recommendation,
  type RecommendationBound,
  type WeightRange,
  type WeightSet,
} from '@/scoring/types';
import type { RawPolicyConfig } from '@/types/payloads';

export type TransitionPair = readonly [from: Recommendation, to: Recommendation];

export interface ImpactCeilings {
  /** Weight-only overrides */
  weight: number;
  /** Sentiment-only overrides */
  sentiment: number;
  /** Weight and sentiment together */
  both: number;
}

export interface ExtremeOverridePolicy {
  /** |impact| strictly above this marks an override as extreme */
  threshold: number;
  minEvidence: number;
  requiredConviction: ConvictionLevel;
}

export interface PolicyConfig {
  readonly baseWeights: WeightSet;
  readonly weightTolerance: number;
  readonly weightRanges: Readonly<Record<Pillar, Readonly<WeightRange>>>;
  readonly sentimentAdjustmentCap: number;
  readonly impactCeilings: Readonly<ImpactCeilings>;
  readonly extremeOverride: Readonly<ExtremeOverridePolicy>;
  readonly forbiddenTransitions: readonly TransitionPair[];
  readonly forbiddenTransitionConviction: ConvictionLevel;
  readonly recommendationBounds: readonly RecommendationBound[];
}

const SELL_SIDE: readonly Recommendation[] = ['SELL', 'STRONG_SELL'];
const BUY_SIDE: readonly Recommendation[] = ['BUY', 'STRONG_BUY'];

function crossPairs(
  from: readonly Recommendation[],
  to: readonly Recommendation[]
): TransitionPair[] {
  return from.flatMap((f) => to.map((t): TransitionPair => [f, t]));
}

export const DEFAULT_POLICY: PolicyConfig = deepFreeze({
  baseWeights: { fundamental: 0.45, technical: 0.35, sentiment: 0.2 },
  weightTolerance: DEFAULT_WEIGHT_TOLERANCE,
  weightRanges: {
    fundamental: { min: 0.35, max: 0.55 },
    technical: { min: 0.25, max: 0.45 },
    sentiment: { min: 0.1, max: 0.3 },
  },
  sentimentAdjustmentCap: 15,
  impactCeilings: { weight: 10, sentiment: 3, both: 12 },
  extremeOverride: { threshold: 15, minEvidence: 3, requiredConviction: 'HIGH' },
  forbiddenTransitions: [...crossPairs(SELL_SIDE, BUY_SIDE), ...crossPairs(BUY_SIDE, SELL_SIDE)],
  forbiddenTransitionConviction: 'HIGH',
  recommendationBounds: DEFAULT_RECOMMENDATION_BOUNDS,
});

function mergeRange(base: Readonly<WeightRange>, raw?: [number, number]): WeightRange {
  return raw ? { min: raw[0], max: raw[1] } : { min: base.min, max: base.max };
}

function mergeRanges(
  base: PolicyConfig['weightRanges'],
  override?: RawPolicyConfig['weight_ranges']
): Record<Pillar, WeightRange> {
  return {
    fundamental: mergeRange(base.fundamental, override?.fundamental),
    technical: mergeRange(base.technical, override?.technical),
    sentiment: mergeRange(base.sentiment, override?.sentiment),
  };
}

/** Cross-field rules the schema cannot express. */
export function checkPolicyConsistency(policy: PolicyConfig): string[] {
  const issues: string[] = [];

  if (!sumsToOne(policy.baseWeights, policy.weightTolerance)) {
    issues.push('base_weights must sum to 1.0');
  }
  issues.push(
    ...checkWeightRanges(policy.baseWeights, policy.weightRanges).map((v) => `base_weights: ${v}`)
  );

  for (const pillar of PILLARS) {
    const { min, max } = policy.weightRanges[pillar];
    if (min > max) {
      issues.push(`weight_ranges.${pillar}: min ${min} exceeds max ${max}`);
    }
  }

  const bounds = policy.recommendationBounds;
  for (let i = 1; i < bounds.length; i++) {
    if (bounds[i][0] >= bounds[i - 1][0]) {
      issues.push('recommendation_bounds must be strictly descending');
      break;
    }
  }
  if (bounds.length > 0 && bounds[bounds.length - 1][0] !== 0) {
    issues.push('recommendation_bounds must end with a bound of 0');
  }

  return issues;
}

/**
 * Validates a raw policy document and merges it over the defaults.
 * Throws with every schema or consistency problem listed.
 */
export function parsePolicyConfig(raw: unknown, base: PolicyConfig = DEFAULT_POLICY): PolicyConfig {
  const validation = validatePolicy(raw);
  if (!validation.valid || !validation.data) {
    throw new Error(`policy_invalid_schema: ${(validation.errors ?? []).join('; ')}`);
  }
  const parsed = validation.data;

  const baseWeights = parsed.base_weights ?? base.baseWeights;
  const weightTolerance = parsed.weight_tolerance ?? base.weightTolerance;

  const policy: PolicyConfig = {
    baseWeights: { ...baseWeights },
    weightTolerance,
    weightRanges: mergeRanges(base.weightRanges, parsed.weight_ranges),
    sentimentAdjustmentCap: parsed.sentiment_adjustment_cap ?? base.sentimentAdjustmentCap,
    impactCeilings: {
      weight: parsed.impact_ceilings?.weight ?? base.impactCeilings.weight,
      sentiment: parsed.impact_ceilings?.sentiment ?? base.impactCeilings.sentiment,
      both: parsed.impact_ceilings?.both ?? base.impactCeilings.both,
    },
    extremeOverride: {
      threshold: parsed.extreme_override?.threshold ?? base.extremeOverride.threshold,
      minEvidence: parsed.extreme_override?.min_evidence ?? base.extremeOverride.minEvidence,
      requiredConviction:
        parsed.extreme_override?.required_conviction ?? base.extremeOverride.requiredConviction,
    },
    forbiddenTransitions: parsed.forbidden_transitions ?? base.forbiddenTransitions,
    forbiddenTransitionConviction:
      parsed.forbidden_transition_conviction ?? base.forbiddenTransitionConviction,
    recommendationBounds: parsed.recommendation_bounds ?? base.recommendationBounds,
  };

  const issues = checkPolicyConsistency(policy);
  if (issues.length > 0) {
    throw new Error(`policy_inconsistent: ${issues.join('; ')}`);
  }

  return deepFreeze({
    ...policy,
    baseWeights: createWeightSet(policy.baseWeights, policy.weightTolerance),
  });
}

export function resolvePolicyPath(projectRoot: string = process.cwd()): string {
  const envPath = loadEnvConfig(projectRoot).policyConfigPath;
  if (envPath) {
    return isAbsolute(envPath) ? envPath : join(projectRoot, envPath);
  }
  return join(projectRoot, 'config', 'policy.json');
}

/**
 * Reads the policy file (config/policy.json unless POLICY_CONFIG points
 * elsewhere). Falls back to the defaults when no file exists.
 */
export function loadPolicyConfig(projectRoot: string = process.cwd()): PolicyConfig {
  const path = resolvePolicyPath(projectRoot);
  if (!existsSync(path)) {
    return DEFAULT_POLICY;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    throw new Error(`policy_invalid_json: ${path}`);
  }
  return parsePolicyConfig(raw);
}
