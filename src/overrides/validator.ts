/**
 * Override Validator
 * Pre-flight checks on an override request. Returns every violated rule;
 * an empty list means the request may be applied.
 */

import type { PolicyConfig } from '@/core/config';
import { ValidationError } from '@/core/errors';
import { checkWeightRanges, sumsToOne, weightSum } from '@/scoring/weights';
import { createChildLogger } from '@/utils/logger';
import {
  documentationOf,
  parseOverrideRequest,
  sentimentOf,
  weightsOf,
  type Documentation,
  type OverrideRequest,
  type ParsedOverrideRequest,
  type SentimentOverride,
  type WeightOverride,
} from './request';

const logger = createChildLogger('override_validator');

export type ValidatorPolicy = Pick<
  PolicyConfig,
  'weightRanges' | 'weightTolerance' | 'sentimentAdjustmentCap'
>;

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

export function validateDocumentation(doc: Documentation): string[] {
  const violations: string[] = [];
  if (isBlank(doc.whatModelMisses)) {
    violations.push("Documentation required: 'What does the model miss?'");
  }
  if (isBlank(doc.whyMoreAccurate)) {
    violations.push("Documentation required: 'Why is your view more accurate?'");
  }
  if (isBlank(doc.whatProvesWrong)) {
    violations.push("Documentation required: 'What would prove you wrong?'");
  }
  return violations;
}

export function validateWeightOverride(weights: WeightOverride, policy: ValidatorPolicy): string[] {
  const violations = checkWeightRanges(weights, policy.weightRanges);
  if (!sumsToOne(weights, policy.weightTolerance)) {
    violations.push(
      `Weights must sum to 1.0, got ${weightSum(weights).toFixed(4)} ` +
        `(F: ${weights.fundamental}, T: ${weights.technical}, S: ${weights.sentiment})`
    );
  }
  return violations;
}

export function validateSentimentOverride(
  sentiment: SentimentOverride,
  policy: ValidatorPolicy
): string[] {
  const { adjustment } = sentiment;
  const cap = policy.sentimentAdjustmentCap;
  if (!Number.isFinite(adjustment)) {
    return ['Sentiment adjustment must be a finite number'];
  }
  if (Math.abs(adjustment) > cap) {
    const signed = `${adjustment >= 0 ? '+' : ''}${adjustment.toFixed(1)}`;
    return [`Sentiment adjustment ${signed} exceeds ±${cap} limit`];
  }
  return [];
}

export function validateOverrideRequest(
  request: OverrideRequest,
  policy: ValidatorPolicy
): string[] {
  if (request.type === 'NONE') {
    return [];
  }

  const violations: string[] = [];

  const documentation = documentationOf(request);
  if (documentation) {
    violations.push(...validateDocumentation(documentation));
  }

  const weights = weightsOf(request);
  if (weights) {
    violations.push(...validateWeightOverride(weights, policy));
  }

  const sentiment = sentimentOf(request);
  if (sentiment) {
    violations.push(...validateSentimentOverride(sentiment, policy));
  }

  return violations;
}

/** Parses an untyped payload and applies every policy rule to it. */
export function validateRawOverride(
  raw: unknown,
  policy: ValidatorPolicy,
  now: Date = new Date()
): ParsedOverrideRequest {
  const parsed = parseOverrideRequest(raw, now);
  if (!parsed.request) {
    return parsed;
  }
  const violations = validateOverrideRequest(parsed.request, policy);
  return violations.length > 0 ? { request: null, violations } : parsed;
}

export function assertValidOverride(request: OverrideRequest, policy: ValidatorPolicy): void {
  const violations = validateOverrideRequest(request, policy);
  if (violations.length > 0) {
    logger.warn({ entityId: request.entityId, violations }, 'Override request rejected');
    throw new ValidationError(request.entityId, violations);
  }
}
