/**
 * Review statistics over recorded overrides.
 * Performance of overrides against later prices is not measured here.
 */

import { roundScore } from '@/scoring/normalize';
import type { ConvictionLevel } from '@/scoring/types';
import type { OverrideResult } from './guardrails';
import type { OverrideType } from './request';

export interface OverrideStats {
  total: number;
  byType: Partial<Record<OverrideType, number>>;
  /** NONE requests carry no documentation and are counted under `none` */
  byConviction: Partial<Record<ConvictionLevel | 'none', number>>;
  meanAbsoluteImpact: number;
  recommendationChanges: number;
  extremeOverrides: number;
  withGuardrailViolations: number;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function aggregateOverrides(results: readonly OverrideResult[]): OverrideStats {
  const byType: OverrideStats['byType'] = {};
  const byConviction: OverrideStats['byConviction'] = {};
  let impactSum = 0;

  for (const result of results) {
    increment(byType, result.overrideType);
    increment(byConviction, result.documentation?.conviction ?? 'none');
    impactSum += Math.abs(result.percentileImpact);
  }

  return {
    total: results.length,
    byType,
    byConviction,
    meanAbsoluteImpact: results.length > 0 ? roundScore(impactSum / results.length) : 0,
    recommendationChanges: results.filter((r) => r.recommendationChanged).length,
    extremeOverrides: results.filter((r) => r.extremeOverride).length,
    withGuardrailViolations: results.filter((r) => r.guardrailViolations.length > 0).length,
  };
}

/** Share of the evaluated universe that received an override, in percent. */
export function overrideFrequency(stats: OverrideStats, entitiesEvaluated: number): number {
  return entitiesEvaluated > 0 ? roundScore((stats.total / entitiesEvaluated) * 100, 1) : 0;
}

export function formatReviewSummary(
  label: string,
  stats: OverrideStats,
  entitiesEvaluated: number | null = null
): string {
  const rule = '='.repeat(60);
  const lines = [rule, `OVERRIDE REVIEW: ${label}`, rule, ''];

  if (entitiesEvaluated !== null) {
    lines.push(`Entities evaluated:      ${entitiesEvaluated}`);
  }
  lines.push(`Total overrides:         ${stats.total}`);
  if (entitiesEvaluated !== null) {
    lines.push(`Override frequency:      ${overrideFrequency(stats, entitiesEvaluated).toFixed(1)}%`);
  }

  lines.push('', 'By type:');
  for (const [type, count] of Object.entries(stats.byType)) {
    lines.push(`  ${type.padEnd(20)} ${count}`);
  }

  lines.push('', 'By conviction:');
  for (const [conviction, count] of Object.entries(stats.byConviction)) {
    lines.push(`  ${conviction.padEnd(20)} ${count}`);
  }

  lines.push(
    '',
    `Mean |impact|:           ${stats.meanAbsoluteImpact.toFixed(1)}pt`,
    `Recommendation changes:  ${stats.recommendationChanges}`,
    `Extreme overrides:       ${stats.extremeOverrides}`,
    `With violations:         ${stats.withGuardrailViolations}`,
    rule
  );

  return lines.join('\n');
}
