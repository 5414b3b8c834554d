import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { DEFAULT_POLICY } from '@/core/config';
import { PersistenceError } from '@/core/errors';
import { openDatabase } from '@/data/db';
import { applyOverride } from '@/overrides/applier';
import { SqliteOverrideAuditLog } from '@/overrides/audit_log';
import { evaluateGuardrails, type OverrideResult } from '@/overrides/guardrails';
import type { OverrideRequest } from '@/overrides/request';
import { contentHash } from '@/utils/hash';
import { noneRequest, sentimentRequest } from '../fixtures/overrides';
import { ceilingScenario } from '../fixtures/scenarios';

const RECORDED_AT = new Date('2026-03-10T08:00:00Z');

function resultFor(request: OverrideRequest): OverrideResult {
  const { run, snapshot } = ceilingScenario();
  const base = run.results.find((r) => r.entityId === request.entityId);
  if (!base) throw new Error(`no base for ${request.entityId}`);
  return evaluateGuardrails(applyOverride(base, request, snapshot, DEFAULT_POLICY), DEFAULT_POLICY);
}

function at(request: OverrideRequest, requestedAt: string): OverrideRequest {
  return { ...request, requestedAt };
}

describe('SqliteOverrideAuditLog', () => {
  let db: Database.Database;
  let log: SqliteOverrideAuditLog;

  beforeEach(() => {
    db = openDatabase(':memory:');
    log = new SqliteOverrideAuditLog(db);
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it('appends a record with its content hash', () => {
    const result = resultFor(sentimentRequest('TGT', 2));
    const record = log.append(result, RECORDED_AT);

    expect(record.id).toBe(1);
    expect(record.entityId).toBe('TGT');
    expect(record.overrideType).toBe('SENTIMENT');
    expect(record.conviction).toBe('MEDIUM');
    expect(record.appliedAt).toBe('2026-03-02T10:00:00.000Z');
    expect(record.recordedAt).toBe('2026-03-10T08:00:00.000Z');
    expect(record.contentHash).toBe(contentHash(result));
    expect(record.contentHash).toMatch(/^[0-9a-f]{64}$/);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('reads back what was written', () => {
    const result = resultFor(sentimentRequest('TGT', 2));
    log.append(result, RECORDED_AT);

    const [record] = log.query();
    expect(record?.result).toEqual(result);
    expect(Object.isFrozen(record?.result.final)).toBe(true);
  });

  it('records NONE requests without a conviction', () => {
    const record = log.append(resultFor(noneRequest('TGT')), RECORDED_AT);
    expect(record.conviction).toBeNull();
  });

  it('returns records in applied order, ties in append order', () => {
    log.append(resultFor(at(sentimentRequest('TGT', 1), '2026-03-04T09:00:00.000Z')), RECORDED_AT);
    log.append(resultFor(at(sentimentRequest('LO1', 1), '2026-03-01T09:00:00.000Z')), RECORDED_AT);
    log.append(resultFor(at(sentimentRequest('HI1', 1), '2026-03-04T09:00:00.000Z')), RECORDED_AT);

    expect(log.query().map((r) => [r.id, r.entityId])).toEqual([
      [2, 'LO1'],
      [1, 'TGT'],
      [3, 'HI1'],
    ]);
  });

  it('filters by entity and by inclusive date bounds', () => {
    log.append(resultFor(at(sentimentRequest('TGT', 1), '2026-01-15T12:00:00.000Z')), RECORDED_AT);
    log.append(resultFor(at(sentimentRequest('TGT', 2), '2026-02-15T12:00:00.000Z')), RECORDED_AT);
    log.append(resultFor(at(sentimentRequest('LO1', 1), '2026-02-20T12:00:00.000Z')), RECORDED_AT);

    expect(log.query({ entityId: 'TGT' })).toHaveLength(2);
    expect(log.query({ entityId: 'NOPE' })).toEqual([]);

    const february = log.query({
      from: new Date('2026-02-01T00:00:00.000Z'),
      to: new Date('2026-02-20T12:00:00.000Z'),
    });
    expect(february.map((r) => r.entityId)).toEqual(['TGT', 'LO1']);

    const tgtInFebruary = log.query({ entityId: 'TGT', from: new Date('2026-02-01T00:00:00.000Z') });
    expect(tgtInFebruary.map((r) => r.appliedAt)).toEqual(['2026-02-15T12:00:00.000Z']);
  });

  it('refuses updates and deletes at the storage layer', () => {
    log.append(resultFor(sentimentRequest('TGT', 2)), RECORDED_AT);

    expect(() => db.prepare("UPDATE override_audit SET entity_id = 'X'").run()).toThrow(
      'override_audit is append-only'
    );
    expect(() => db.prepare('DELETE FROM override_audit').run()).toThrow(
      'override_audit is append-only'
    );
    expect(log.query()).toHaveLength(1);
  });

  it('detects a record altered behind its back', () => {
    log.append(resultFor(sentimentRequest('TGT', 2)), RECORDED_AT);
    db.exec('DROP TRIGGER override_audit_no_update');
    db.prepare(
      "UPDATE override_audit SET payload = replace(payload, '\"overrideType\":\"SENTIMENT\"', '\"overrideType\":\"WEIGHT\"')"
    ).run();

    expect(() => log.query()).toThrow(new PersistenceError('Audit record 1 failed its integrity check'));
  });

  it('wraps storage failures in PersistenceError', () => {
    const result = resultFor(sentimentRequest('TGT', 2));
    db.close();

    expect(() => log.append(result, RECORDED_AT)).toThrow(PersistenceError);
    expect(() => log.query()).toThrow(PersistenceError);
  });

  it('raises PersistenceError for timestamps it cannot store', () => {
    const result = resultFor(sentimentRequest('TGT', 2));

    expect(() => log.append({ ...result, appliedAt: 'last tuesday' }, RECORDED_AT)).toThrow(
      new PersistenceError('Failed to record override for TGT: Invalid date: last tuesday')
    );
    expect(() => log.query({ from: new Date('not a date') })).toThrow(PersistenceError);
    expect(log.query()).toEqual([]);
  });

  it('opens the same schema twice without error', () => {
    expect(() => openDatabase(':memory:').close()).not.toThrow();
  });
});
