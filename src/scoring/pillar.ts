/**
 * Sub-component ranks into a pillar score.
 *
 * Each metric is ranked across the whole universe (self excluded), and every
 * entity's pillar is the weighted average of its available metric ranks.
 */

import { averagePercentileRanks } from './aggregate';
import { rankUniverse } from './percentile';

export interface MetricDefinition {
  key: string;
  weight: number;
  /** Lower raw values are better (valuation multiples, leverage). */
  inverted?: boolean;
}

export type MetricRow = Readonly<Record<string, number | null | undefined>>;

export interface PillarScoreRow {
  entityId: string;
  metricRanks: Record<string, number | null>;
  score: number | null;
}

export function scorePillar(
  rows: ReadonlyArray<{ entityId: string; metrics: MetricRow }>,
  definitions: readonly MetricDefinition[]
): PillarScoreRow[] {
  const ranksByMetric = new Map<string, (number | null)[]>();
  for (const def of definitions) {
    const values = rows.map((row) => row.metrics[def.key]);
    ranksByMetric.set(def.key, rankUniverse(values, def.inverted ?? false));
  }

  const weights = definitions.map((def) => def.weight);

  return rows.map((row, i) => {
    const metricRanks: Record<string, number | null> = {};
    for (const def of definitions) {
      metricRanks[def.key] = ranksByMetric.get(def.key)?.[i] ?? null;
    }
    const ranks = definitions.map((def) => metricRanks[def.key]);
    return {
      entityId: row.entityId,
      metricRanks,
      score: averagePercentileRanks(ranks, weights),
    };
  });
}
