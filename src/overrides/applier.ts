/**
 * Override Applier
 * Recomputes one entity's composite, percentile and recommendation under a
 * human adjustment, ranked against a frozen copy of the rest of the universe.
 */

import type { PolicyConfig } from '@/core/config';
import { ComputationError, ValidationError } from '@/core/errors';
import { calculateComposite } from '@/scoring/composite';
import { clamp, roundScore } from '@/scoring/normalize';
import { percentileRank } from '@/scoring/percentile';
import { recommendationFor } from '@/scoring/recommendation';
import type { CompositeResult, UniverseSnapshot, WeightSet } from '@/scoring/types';
import { createWeightSet } from '@/scoring/weights';
import { deepFreeze } from '@/utils/immutable';
import { createChildLogger } from '@/utils/logger';
import {
  documentationOf,
  sentimentOf,
  weightsOf,
  type Documentation,
  type OverrideRequest,
  type OverrideType,
} from './request';
import { assertValidOverride } from './validator';

const logger = createChildLogger('override_applier');

export interface AppliedAdjustment {
  /** Weights used instead of the base weights, when the override replaced them */
  readonly weights: WeightSet | null;
  /** Requested sentiment delta, before clamping */
  readonly sentimentDelta: number | null;
  /** Sentiment pillar actually used, after clamping to [0, 100] */
  readonly adjustedSentiment: number | null;
}

/** Before/after state of an applied override, prior to guardrail review. */
export interface OverrideComputation {
  readonly entityId: string;
  readonly overrideType: OverrideType;
  readonly appliedAt: string;
  readonly base: CompositeResult;
  readonly adjustment: AppliedAdjustment;
  readonly final: CompositeResult;
  /** final percentile minus base percentile, signed */
  readonly percentileImpact: number;
  readonly recommendationChanged: boolean;
  readonly documentation: Documentation | null;
  readonly currentPrice: number | null;
}

export type ApplierPolicy = Pick<
  PolicyConfig,
  | 'weightRanges'
  | 'weightTolerance'
  | 'sentimentAdjustmentCap'
  | 'recommendationBounds'
>;

/**
 * Ranks a replacement composite inside a private copy of the frozen universe.
 * Every other entity keeps its original composite.
 */
export function rerankInUniverse(
  entityId: string,
  composite: number,
  frozenUniverse: UniverseSnapshot
): number {
  if (!frozenUniverse.has(entityId)) {
    throw new ComputationError('Entity is not part of the universe snapshot', entityId);
  }

  const composites = Array.from(frozenUniverse, ([id, value]) => (id === entityId ? composite : value));
  const percentile = percentileRank(composite, composites, false);
  if (percentile === null) {
    throw new ComputationError('Composite could not be ranked', entityId);
  }
  return percentile;
}

function copyResult(result: CompositeResult): CompositeResult {
  return {
    ...result,
    pillars: { ...result.pillars },
    weights: { ...result.weights },
    signalAgreement: result.signalAgreement ? { ...result.signalAgreement } : null,
  };
}

export function applyOverride(
  base: CompositeResult,
  request: OverrideRequest,
  frozenUniverse: UniverseSnapshot,
  policy: ApplierPolicy
): OverrideComputation {
  if (request.entityId !== base.entityId) {
    throw new ValidationError(request.entityId, [
      `Override targets ${request.entityId} but the base result belongs to ${base.entityId}`,
    ]);
  }
  assertValidOverride(request, policy);

  // Copied so freezing the result leaves the caller's objects alone
  const requested = documentationOf(request);
  const documentation = requested ? { ...requested, evidence: [...requested.evidence] } : null;
  const original = copyResult(base);

  if (request.type === 'NONE') {
    return deepFreeze({
      entityId: base.entityId,
      overrideType: request.type,
      appliedAt: request.requestedAt,
      base: original,
      adjustment: { weights: null, sentimentDelta: null, adjustedSentiment: null },
      final: original,
      percentileImpact: 0,
      recommendationChanged: false,
      documentation,
      currentPrice: request.currentPrice,
    });
  }

  const weightOverride = weightsOf(request);
  const weights = weightOverride
    ? createWeightSet(weightOverride, policy.weightTolerance, base.entityId)
    : original.weights;

  const sentimentOverride = sentimentOf(request);
  const adjustedSentiment = sentimentOverride
    ? clamp(base.pillars.sentiment + sentimentOverride.adjustment, 0, 100)
    : null;

  // Fundamental and technical pillars are never touched by an override
  const pillars = {
    ...base.pillars,
    sentiment: adjustedSentiment ?? base.pillars.sentiment,
  };

  const composite = calculateComposite(pillars, weights);
  const percentile = rerankInUniverse(base.entityId, composite, frozenUniverse);
  const recommendation = recommendationFor(percentile, policy.recommendationBounds);

  const final: CompositeResult = {
    entityId: base.entityId,
    pillars,
    weights,
    composite,
    percentile,
    recommendation,
    signalAgreement: original.signalAgreement,
  };

  const percentileImpact = roundScore(percentile - base.percentile);

  logger.info(
    {
      entityId: base.entityId,
      type: request.type,
      basePercentile: base.percentile,
      finalPercentile: percentile,
      impact: percentileImpact,
      from: base.recommendation,
      to: recommendation,
    },
    'Override applied'
  );

  return deepFreeze({
    entityId: base.entityId,
    overrideType: request.type,
    appliedAt: request.requestedAt,
    base: original,
    adjustment: {
      weights: weightOverride ? weights : null,
      sentimentDelta: sentimentOverride ? sentimentOverride.adjustment : null,
      adjustedSentiment,
    },
    final,
    percentileImpact,
    recommendationChanged: recommendation !== base.recommendation,
    documentation,
    currentPrice: request.currentPrice,
  });
}
