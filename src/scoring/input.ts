/**
 * Pillar score documents produced by the upstream calculators.
 */

import type { RawEntityScores } from '@/types/payloads';
import { validatePillarScores } from '@/validation/ajv_instance';
import type { EntityPillarInput } from './types';

export interface PillarScoresDocument {
  asOf: string | null;
  entities: EntityPillarInput[];
}

function toEntityInput(raw: RawEntityScores): EntityPillarInput {
  return {
    entityId: raw.entity_id.trim().toUpperCase(),
    fundamental: raw.fundamental ?? null,
    technical: raw.technical ?? null,
    sentiment: raw.sentiment ?? null,
    ...(raw.weights ? { weights: raw.weights } : {}),
    ...(raw.sub_signals ? { subSignals: raw.sub_signals } : {}),
  };
}

/** Throws with every schema error when the document does not match pillar_scores.v1. */
export function parsePillarScores(raw: unknown): PillarScoresDocument {
  const validation = validatePillarScores(raw);
  if (!validation.valid || !validation.data) {
    const errors = validation.errors ?? ['unknown error'];
    throw new Error(`pillar_scores_invalid_schema: ${errors.join('; ')}`);
  }

  return {
    asOf: validation.data.as_of ?? null,
    entities: validation.data.entities.map(toEntityInput),
  };
}
