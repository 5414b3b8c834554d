/**
 * Composite Score Engine
 * Combines the three pillar scores per entity, ranks composites within the
 * universe and maps each percentile to a recommendation bucket.
 */

import type { PolicyConfig } from '@/core/config';
import { ComputationError, errorMessage } from '@/core/errors';
import { FrozenMap, deepFreeze } from '@/utils/immutable';
import { createChildLogger } from '@/utils/logger';
import { weightedAverage } from './aggregate';
import { isPresent, percentileRank } from './percentile';
import { recommendationFor } from './recommendation';
import { calculateSignalAgreement } from './signal_agreement';
import {
  PILLARS,
  type CompositeResult,
  type EntityPillarInput,
  type ExcludedEntity,
  type Pillar,
  type PillarScores,
  type Recommendation,
  type UniverseRun,
  type UniverseSnapshot,
  type WeightSet,
} from './types';
import { createWeightSet } from './weights';

const logger = createChildLogger('composite');

export type CompositePolicy = Pick<
  PolicyConfig,
  'baseWeights' | 'weightTolerance' | 'recommendationBounds'
>;

/**
 * composite = fundamental * w_f + technical * w_t + sentiment * w_s
 *
 * With every pillar present the weights are applied as given, so a set
 * accepted within tolerance of 1.0 is not rescaled. Missing pillars fall back
 * to the aggregator's drop-and-renormalize average.
 */
export function calculateComposite(pillars: Readonly<PillarScores>, weights: WeightSet): number {
  if (PILLARS.every((p) => isPresent(pillars[p]))) {
    return PILLARS.reduce((sum, p) => sum + pillars[p] * weights[p], 0);
  }

  const composite = weightedAverage(
    PILLARS.map((p) => pillars[p]),
    PILLARS.map((p) => weights[p])
  );
  if (composite === null) {
    throw new ComputationError('Composite could not be computed from pillar scores');
  }
  return composite;
}

function requirePillar(entity: EntityPillarInput, pillar: Pillar): number {
  const value = entity[pillar];
  if (!isPresent(value)) {
    throw new ComputationError(`Missing ${pillar} score`, entity.entityId);
  }
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new ComputationError(`${pillar} score ${value} outside [0, 100]`, entity.entityId);
  }
  return value;
}

/** Every pillar present and within [0, 100], or a ComputationError naming the first gap. */
export function requirePillarScores(entity: EntityPillarInput): PillarScores {
  return {
    fundamental: requirePillar(entity, 'fundamental'),
    technical: requirePillar(entity, 'technical'),
    sentiment: requirePillar(entity, 'sentiment'),
  };
}

interface ScoredEntity {
  entityId: string;
  pillars: PillarScores;
  weights: WeightSet;
  composite: number;
  entity: EntityPillarInput;
}

function scoreEntity(
  entity: EntityPillarInput,
  runWeights: WeightSet,
  policy: CompositePolicy
): ScoredEntity {
  const pillars = requirePillarScores(entity);
  const weights = entity.weights
    ? createWeightSet(entity.weights, policy.weightTolerance, entity.entityId)
    : runWeights;
  return {
    entityId: entity.entityId,
    pillars,
    weights,
    composite: calculateComposite(pillars, weights),
    entity,
  };
}

function byPercentileDesc(a: CompositeResult, b: CompositeResult): number {
  if (b.percentile !== a.percentile) return b.percentile - a.percentile;
  return a.entityId.localeCompare(b.entityId);
}

/**
 * Scores a whole universe. Entities that cannot be scored are excluded from
 * the ranked universe and listed in `excluded`; the rest of the run goes on.
 * Results come back best first, ties broken by entity id.
 */
export function calculateForUniverse(
  entities: readonly EntityPillarInput[],
  policy: CompositePolicy
): UniverseRun {
  const runWeights = createWeightSet(policy.baseWeights, policy.weightTolerance);
  const scored: ScoredEntity[] = [];
  const excluded: ExcludedEntity[] = [];
  const seen = new Set<string>();

  for (const entity of entities) {
    if (seen.has(entity.entityId)) {
      excluded.push({ entityId: entity.entityId, reason: 'Duplicate entity id in universe' });
      continue;
    }
    seen.add(entity.entityId);

    try {
      scored.push(scoreEntity(entity, runWeights, policy));
    } catch (error) {
      if (!(error instanceof ComputationError)) throw error;
      logger.warn({ entityId: entity.entityId, reason: error.message }, 'Entity excluded from run');
      excluded.push({ entityId: entity.entityId, reason: errorMessage(error) });
    }
  }

  const composites = scored.map((s) => s.composite);
  const results = scored.map((s): CompositeResult => {
    // Own composite stays in the universe it is ranked against
    const percentile = percentileRank(s.composite, composites, false) ?? 0;
    return deepFreeze({
      entityId: s.entityId,
      pillars: s.pillars,
      weights: s.weights,
      composite: s.composite,
      percentile,
      recommendation: recommendationFor(percentile, policy.recommendationBounds),
      signalAgreement: s.entity.subSignals ? calculateSignalAgreement(s.entity.subSignals) : null,
    });
  });

  results.sort(byPercentileDesc);

  logger.info(
    { scored: results.length, excluded: excluded.length },
    'Composite scores calculated'
  );

  return deepFreeze({ results, excluded, weights: runWeights });
}

/** Original composites of a run, used as the frozen universe for overrides. */
export function createUniverseSnapshot(results: readonly CompositeResult[]): UniverseSnapshot {
  return new FrozenMap(results.map((r) => [r.entityId, r.composite] as const));
}

export interface RecommendationCount {
  recommendation: Recommendation;
  count: number;
  share: number;
}

/** Bucket distribution in bound order; share is a percentage of the run. */
export function summarizeRecommendations(
  results: readonly CompositeResult[],
  policy: Pick<PolicyConfig, 'recommendationBounds'>
): RecommendationCount[] {
  return policy.recommendationBounds.map(([, recommendation]) => {
    const count = results.filter((r) => r.recommendation === recommendation).length;
    return {
      recommendation,
      count,
      share: results.length > 0 ? (count / results.length) * 100 : 0,
    };
  });
}
