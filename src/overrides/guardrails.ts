/**
 * Guardrail Engine
 * Advisory checks run after an override has been applied. Findings are
 * attached to the result as strings; nothing here blocks or rolls back.
 */

import type { PolicyConfig } from '@/core/config';
import { formatRecommendation } from '@/scoring/recommendation';
import {
  CONVICTION_LEVELS,
  type ConvictionLevel,
  type Recommendation,
} from '@/scoring/types';
import { deepFreeze } from '@/utils/immutable';
import { createChildLogger } from '@/utils/logger';
import type { OverrideComputation } from './applier';
import type { Documentation, OverrideType } from './request';

const logger = createChildLogger('guardrails');

export interface OverrideResult extends OverrideComputation {
  readonly extremeOverride: boolean;
  readonly guardrailViolations: readonly string[];
}

export type GuardrailPolicy = Pick<
  PolicyConfig,
  'impactCeilings' | 'extremeOverride' | 'forbiddenTransitions' | 'forbiddenTransitionConviction'
>;

export interface ExtremeOverrideCheck {
  extreme: boolean;
  violations: string[];
}

function meetsConviction(actual: ConvictionLevel | null, required: ConvictionLevel): boolean {
  if (actual === null) return false;
  return CONVICTION_LEVELS.indexOf(actual) >= CONVICTION_LEVELS.indexOf(required);
}

function countEvidence(documentation: Documentation | null): number {
  return documentation ? documentation.evidence.filter((e) => e.trim().length > 0).length : 0;
}

export function checkImpactCeiling(
  type: OverrideType,
  impact: number,
  policy: Pick<GuardrailPolicy, 'impactCeilings'>
): string | null {
  const magnitude = Math.abs(impact);
  const { weight, sentiment, both } = policy.impactCeilings;

  switch (type) {
    case 'WEIGHT':
      return magnitude > weight
        ? `Weight override impact (${magnitude.toFixed(1)}pt) exceeds ±${weight}pt limit`
        : null;
    case 'SENTIMENT':
      return magnitude > sentiment
        ? `Sentiment override impact (${magnitude.toFixed(1)}pt) exceeds ±${sentiment}pt limit`
        : null;
    case 'BOTH':
      return magnitude > both
        ? `Combined override impact (${magnitude.toFixed(1)}pt) exceeds ±${both}pt limit`
        : null;
    case 'NONE':
      return null;
  }
}

export function checkExtremeOverride(
  impact: number,
  documentation: Documentation | null,
  policy: Pick<GuardrailPolicy, 'extremeOverride'>
): ExtremeOverrideCheck {
  const magnitude = Math.abs(impact);
  const { threshold, minEvidence, requiredConviction } = policy.extremeOverride;
  if (magnitude <= threshold) {
    return { extreme: false, violations: [] };
  }

  const violations: string[] = [];
  if (!meetsConviction(documentation?.conviction ?? null, requiredConviction)) {
    violations.push(
      `Extreme override (${magnitude.toFixed(1)}pt) requires ${requiredConviction} conviction`
    );
  }

  const evidence = countEvidence(documentation);
  if (evidence < minEvidence) {
    violations.push(`Extreme override requires ${minEvidence}+ evidence pieces (have ${evidence})`);
  }

  return { extreme: true, violations };
}

export function isForbiddenTransition(
  from: Recommendation,
  to: Recommendation,
  policy: Pick<GuardrailPolicy, 'forbiddenTransitions'>
): boolean {
  return policy.forbiddenTransitions.some(([f, t]) => f === from && t === to);
}

export function checkForbiddenTransition(
  from: Recommendation,
  to: Recommendation,
  conviction: ConvictionLevel | null,
  policy: Pick<GuardrailPolicy, 'forbiddenTransitions' | 'forbiddenTransitionConviction'>
): string | null {
  if (!isForbiddenTransition(from, to, policy)) {
    return null;
  }

  const required = policy.forbiddenTransitionConviction;
  if (meetsConviction(conviction, required)) {
    logger.warn({ from, to }, `Recommendation reversal allowed with ${required} conviction`);
    return null;
  }

  return (
    `Forbidden override: ${formatRecommendation(from)} -> ${formatRecommendation(to)} ` +
    `requires ${required} conviction (current: ${conviction ?? 'none'})`
  );
}

/** Runs every guardrail and returns the final, frozen OverrideResult. */
export function evaluateGuardrails(
  computation: OverrideComputation,
  policy: GuardrailPolicy
): OverrideResult {
  const impact = computation.percentileImpact;
  const documentation = computation.documentation;
  const violations: string[] = [];

  const ceiling = checkImpactCeiling(computation.overrideType, impact, policy);
  if (ceiling) violations.push(ceiling);

  const forbidden = checkForbiddenTransition(
    computation.base.recommendation,
    computation.final.recommendation,
    documentation?.conviction ?? null,
    policy
  );
  if (forbidden) violations.push(forbidden);

  const extreme = checkExtremeOverride(impact, documentation, policy);
  violations.push(...extreme.violations);

  if (violations.length > 0) {
    logger.warn(
      { entityId: computation.entityId, violations },
      'Override has guardrail violations'
    );
  }

  return deepFreeze({
    ...computation,
    extremeOverride: extreme.extreme,
    guardrailViolations: violations,
  });
}
