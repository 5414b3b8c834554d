export const PILLARS = ['fundamental', 'technical', 'sentiment'] as const;

export type Pillar = (typeof PILLARS)[number];

export type PillarScores = Record<Pillar, number>;

/** Pillar weights; construct through createWeightSet so the sum is checked. */
export type WeightSet = Readonly<Record<Pillar, number>>;

export interface WeightRange {
  min: number;
  max: number;
}

export const RECOMMENDATIONS = ['STRONG_BUY', 'BUY', 'HOLD', 'SELL', 'STRONG_SELL'] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];

/** Inclusive lower bound paired with the bucket it opens. Ordered from highest bound down. */
export type RecommendationBound = readonly [lowerBound: number, label: Recommendation];

export const CONVICTION_LEVELS = ['LOW', 'MEDIUM', 'HIGH'] as const;

export type ConvictionLevel = (typeof CONVICTION_LEVELS)[number];

export type SubSignals = Readonly<Record<Pillar, Readonly<Record<string, number>>>>;

export interface SignalAgreement {
  agreement: number;
  conviction: Exclude<ConvictionLevel, 'LOW'>;
}

/** One entity as delivered by the pillar calculators. Absent pillars are null or omitted. */
export interface EntityPillarInput {
  entityId: string;
  fundamental?: number | null;
  technical?: number | null;
  sentiment?: number | null;
  /** Replaces the run's base weights for this entity only. */
  weights?: Readonly<Record<Pillar, number>>;
  subSignals?: SubSignals;
}

export interface CompositeResult {
  readonly entityId: string;
  readonly pillars: Readonly<PillarScores>;
  readonly weights: WeightSet;
  readonly composite: number;
  readonly percentile: number;
  readonly recommendation: Recommendation;
  readonly signalAgreement: SignalAgreement | null;
}

export interface ExcludedEntity {
  entityId: string;
  reason: string;
}

export interface UniverseRun {
  readonly results: readonly CompositeResult[];
  readonly excluded: readonly ExcludedEntity[];
  readonly weights: WeightSet;
}

/** Original composites of a run keyed by entity id; read-only while overrides are applied. */
export type UniverseSnapshot = ReadonlyMap<string, number>;
