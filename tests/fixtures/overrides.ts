import type {
  Documentation,
  NoOverrideRequest,
  SentimentOverrideRequest,
  WeightOverride,
  WeightOverrideRequest,
} from '@/overrides/request';
import type { EntityPillarInput } from '@/scoring/types';

export const REQUESTED_AT = '2026-03-02T10:00:00.000Z';

/** An entity whose three pillars share one value, so its composite is that value. */
export function flatEntity(entityId: string, value: number): EntityPillarInput {
  return { entityId, fundamental: value, technical: value, sentiment: value };
}

export function flatEntities(prefix: string, values: readonly number[]): EntityPillarInput[] {
  return values.map((v, i) => flatEntity(`${prefix}${i + 1}`, v));
}

export function range(from: number, count: number, step: number = 1): number[] {
  return Array.from({ length: count }, (_, i) => from + i * step);
}

export function documentation(overrides: Partial<Documentation> = {}): Documentation {
  return {
    whatModelMisses: 'Backlog growth is not visible in trailing fundamentals',
    whyMoreAccurate: 'Order book disclosed at the last investor day',
    whatProvesWrong: 'Next two quarters of revenue below guidance',
    conviction: 'MEDIUM',
    evidence: ['Investor day slides', 'Channel checks'],
    ...overrides,
  };
}

export function noneRequest(entityId: string): NoOverrideRequest {
  return { type: 'NONE', entityId, requestedAt: REQUESTED_AT, currentPrice: null };
}

export function weightRequest(
  entityId: string,
  weights: WeightOverride,
  doc: Documentation = documentation()
): WeightOverrideRequest {
  return {
    type: 'WEIGHT',
    entityId,
    requestedAt: REQUESTED_AT,
    currentPrice: null,
    weights,
    documentation: doc,
  };
}

export function sentimentRequest(
  entityId: string,
  adjustment: number,
  doc: Documentation = documentation()
): SentimentOverrideRequest {
  return {
    type: 'SENTIMENT',
    entityId,
    requestedAt: REQUESTED_AT,
    currentPrice: null,
    sentiment: { adjustment },
    documentation: doc,
  };
}
