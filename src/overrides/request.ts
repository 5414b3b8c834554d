/**
 * Override requests.
 *
 * The override type decides which payloads exist: a WEIGHT request always
 * carries weights, a SENTIMENT request always carries an adjustment, and every
 * request other than NONE carries documentation. Untyped payloads become
 * requests only through parseOverrideRequest.
 */

import { toIsoTimestamp } from '@/core/time';
import { validateOverridePayload } from '@/validation/ajv_instance';
import type { ConvictionLevel, Pillar } from '@/scoring/types';
import type { RawOverrideRequest } from '@/types/payloads';

export const OVERRIDE_TYPES = ['NONE', 'WEIGHT', 'SENTIMENT', 'BOTH'] as const;

export type OverrideType = (typeof OVERRIDE_TYPES)[number];

export type WeightOverride = Readonly<Record<Pillar, number>>;

export interface SentimentOverride {
  /** Signed points added to the sentiment pillar */
  readonly adjustment: number;
}

export interface Documentation {
  readonly whatModelMisses: string;
  readonly whyMoreAccurate: string;
  readonly whatProvesWrong: string;
  readonly conviction: ConvictionLevel;
  readonly evidence: readonly string[];
  readonly notes?: string;
}

interface RequestBase {
  readonly entityId: string;
  /** ISO-8601 timestamp */
  readonly requestedAt: string;
  readonly currentPrice: number | null;
}

export interface NoOverrideRequest extends RequestBase {
  readonly type: 'NONE';
}

export interface WeightOverrideRequest extends RequestBase {
  readonly type: 'WEIGHT';
  readonly weights: WeightOverride;
  readonly documentation: Documentation;
}

export interface SentimentOverrideRequest extends RequestBase {
  readonly type: 'SENTIMENT';
  readonly sentiment: SentimentOverride;
  readonly documentation: Documentation;
}

export interface CombinedOverrideRequest extends RequestBase {
  readonly type: 'BOTH';
  readonly weights: WeightOverride;
  readonly sentiment: SentimentOverride;
  readonly documentation: Documentation;
}

export type OverrideRequest =
  | NoOverrideRequest
  | WeightOverrideRequest
  | SentimentOverrideRequest
  | CombinedOverrideRequest;

export function weightsOf(request: OverrideRequest): WeightOverride | null {
  return request.type === 'WEIGHT' || request.type === 'BOTH' ? request.weights : null;
}

export function sentimentOf(request: OverrideRequest): SentimentOverride | null {
  return request.type === 'SENTIMENT' || request.type === 'BOTH' ? request.sentiment : null;
}

export function documentationOf(request: OverrideRequest): Documentation | null {
  return request.type === 'NONE' ? null : request.documentation;
}

export interface ParsedOverrideRequest {
  request: OverrideRequest | null;
  violations: string[];
}

function toDocumentation(raw: NonNullable<RawOverrideRequest['documentation']>): Documentation {
  return {
    whatModelMisses: raw.what_model_misses,
    whyMoreAccurate: raw.why_view_more_accurate,
    whatProvesWrong: raw.what_proves_wrong,
    conviction: raw.conviction,
    evidence: raw.evidence_pieces ?? [],
    ...(raw.additional_notes !== undefined ? { notes: raw.additional_notes } : {}),
  };
}

function payloadViolations(raw: RawOverrideRequest): string[] {
  const violations: string[] = [];
  const type = raw.override_type;
  const wantsWeights = type === 'WEIGHT' || type === 'BOTH';
  const wantsSentiment = type === 'SENTIMENT' || type === 'BOTH';

  if (wantsWeights && !raw.weight_override) {
    violations.push(`Weight override data required for ${type} override`);
  }
  if (!wantsWeights && raw.weight_override) {
    violations.push(`Weight override data not allowed for ${type} override`);
  }
  if (wantsSentiment && !raw.sentiment_override) {
    violations.push(`Sentiment override data required for ${type} override`);
  }
  if (!wantsSentiment && raw.sentiment_override) {
    violations.push(`Sentiment override data not allowed for ${type} override`);
  }
  if (type !== 'NONE' && !raw.documentation) {
    violations.push('Documentation is required for all overrides');
  }
  return violations;
}

/**
 * Turns an untyped payload (request file, form body) into an OverrideRequest.
 * Collects every schema and payload/type mismatch instead of stopping at the
 * first one; `request` is null whenever `violations` is non-empty.
 */
export function parseOverrideRequest(raw: unknown, now: Date = new Date()): ParsedOverrideRequest {
  const validation = validateOverridePayload(raw);
  if (!validation.valid || !validation.data) {
    return { request: null, violations: validation.errors ?? ['Invalid override request'] };
  }

  const data = validation.data;
  const violations = payloadViolations(data);
  if (violations.length > 0) {
    return { request: null, violations };
  }

  const base = {
    entityId: data.entity_id.trim().toUpperCase(),
    requestedAt: toIsoTimestamp(data.requested_at ?? now),
    currentPrice: data.current_price ?? null,
  };

  const { weight_override: weights, sentiment_override: sentiment, documentation } = data;
  let request: OverrideRequest | null = null;

  switch (data.override_type) {
    case 'NONE':
      request = { ...base, type: 'NONE' };
      break;
    case 'WEIGHT':
      if (weights && documentation) {
        request = { ...base, type: 'WEIGHT', weights, documentation: toDocumentation(documentation) };
      }
      break;
    case 'SENTIMENT':
      if (sentiment && documentation) {
        request = {
          ...base,
          type: 'SENTIMENT',
          sentiment,
          documentation: toDocumentation(documentation),
        };
      }
      break;
    case 'BOTH':
      if (weights && sentiment && documentation) {
        request = {
          ...base,
          type: 'BOTH',
          weights,
          sentiment,
          documentation: toDocumentation(documentation),
        };
      }
      break;
  }

  return request
    ? { request, violations: [] }
    : { request: null, violations: ['Override payload does not match its type'] };
}
