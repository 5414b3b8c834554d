/**
 * Wire shapes of the JSON documents read at the boundary. Keys are
 * snake_case as they appear on disk; the schemas in schemas/ describe the
 * same documents.
 */

export type RawRecommendation = 'STRONG_BUY' | 'BUY' | 'HOLD' | 'SELL' | 'STRONG_SELL';

export type RawConviction = 'LOW' | 'MEDIUM' | 'HIGH';

export interface RawWeights {
  fundamental: number;
  technical: number;
  sentiment: number;
}

export interface RawPolicyConfig {
  base_weights?: RawWeights;
  weight_tolerance?: number;
  weight_ranges?: Partial<Record<keyof RawWeights, [number, number]>>;
  sentiment_adjustment_cap?: number;
  impact_ceilings?: {
    weight?: number;
    sentiment?: number;
    both?: number;
  };
  extreme_override?: {
    threshold?: number;
    min_evidence?: number;
    required_conviction?: RawConviction;
  };
  forbidden_transitions?: Array<[RawRecommendation, RawRecommendation]>;
  forbidden_transition_conviction?: RawConviction;
  recommendation_bounds?: Array<[number, RawRecommendation]>;
}

export interface RawDocumentation {
  what_model_misses: string;
  why_view_more_accurate: string;
  what_proves_wrong: string;
  conviction: RawConviction;
  evidence_pieces?: string[];
  additional_notes?: string;
}

export interface RawOverrideRequest {
  entity_id: string;
  override_type: 'NONE' | 'WEIGHT' | 'SENTIMENT' | 'BOTH';
  weight_override?: RawWeights | null;
  sentiment_override?: { adjustment: number } | null;
  documentation?: RawDocumentation | null;
  current_price?: number | null;
  requested_at?: string;
}

export interface RawEntityScores {
  entity_id: string;
  fundamental?: number | null;
  technical?: number | null;
  sentiment?: number | null;
  weights?: RawWeights;
  sub_signals?: Record<keyof RawWeights, Record<string, number>>;
}

export interface RawPillarScoresFile {
  as_of?: string;
  entities: RawEntityScores[];
}
