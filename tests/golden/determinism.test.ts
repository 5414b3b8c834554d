import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { DEFAULT_POLICY } from '@/core/config';
import { applyOverride } from '@/overrides/applier';
import { evaluateGuardrails } from '@/overrides/guardrails';
import { calculateForUniverse, createUniverseSnapshot } from '@/scoring/composite';
import { parsePillarScores } from '@/scoring/input';
import { contentHash } from '@/utils/hash';
import { sentimentRequest } from '../fixtures/overrides';

function loadDocument() {
  const raw: unknown = JSON.parse(
    readFileSync(join(__dirname, '..', 'fixtures', 'pillar_scores.json'), 'utf-8')
  );
  return parsePillarScores(raw);
}

describe('determinism', () => {
  describe('Composite run', () => {
    it('produces byte-identical output for identical input', () => {
      const { entities } = loadDocument();
      const first = calculateForUniverse(entities, DEFAULT_POLICY);
      const second = calculateForUniverse(entities, DEFAULT_POLICY);

      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
      expect(contentHash(second)).toBe(contentHash(first));
    });

    it('does not depend on input order', () => {
      const { entities } = loadDocument();
      const forward = calculateForUniverse(entities, DEFAULT_POLICY);
      const reversed = calculateForUniverse([...entities].reverse(), DEFAULT_POLICY);

      expect(JSON.stringify(reversed.results)).toBe(JSON.stringify(forward.results));
    });

    it('excludes the entity with a missing pillar and ranks the rest', () => {
      const { entities, asOf } = loadDocument();
      const run = calculateForUniverse(entities, DEFAULT_POLICY);

      expect(asOf).toBe('2026-03-02');
      expect(run.results).toHaveLength(11);
      expect(run.excluded).toEqual([{ entityId: 'ELMO', reason: 'Missing technical score' }]);
      expect(run.results[0]?.entityId).toBe('CORV');
      expect(run.results[0]?.percentile).toBe(90.91);
      expect(run.results[0]?.recommendation).toBe('STRONG_BUY');
      expect(run.results.at(-1)?.entityId).toBe('DUNE');
      expect(run.results.at(-1)?.percentile).toBe(0);
    });
  });

  describe('Override', () => {
    it('produces the same result hash for the same request', () => {
      const { entities } = loadDocument();
      const run = calculateForUniverse(entities, DEFAULT_POLICY);
      const snapshot = createUniverseSnapshot(run.results);
      const base = run.results.find((r) => r.entityId === 'LUMA');
      if (!base) throw new Error('LUMA missing');

      const once = evaluateGuardrails(
        applyOverride(base, sentimentRequest('LUMA', 4), snapshot, DEFAULT_POLICY),
        DEFAULT_POLICY
      );
      const again = evaluateGuardrails(
        applyOverride(base, sentimentRequest('LUMA', 4), snapshot, DEFAULT_POLICY),
        DEFAULT_POLICY
      );

      expect(contentHash(again)).toBe(contentHash(once));
    });
  });

  describe('Content Hash', () => {
    it('produces identical hash regardless of key order', () => {
      expect(contentHash({ a: 1, b: { c: 2, d: 3 } })).toBe(contentHash({ b: { d: 3, c: 2 }, a: 1 }));
    });

    it('ignores undefined properties', () => {
      expect(contentHash({ a: 1, b: undefined })).toBe(contentHash({ a: 1 }));
    });

    it('produces different hash for different content', () => {
      expect(contentHash({ composite: 53.1 })).not.toBe(contentHash({ composite: 53.2 }));
      expect(contentHash([1, 2])).not.toBe(contentHash([2, 1]));
    });
  });
});
