/**
 * Override Audit Log
 * Append-only record of override results. Storage refuses UPDATE and DELETE,
 * and every record is checked against its content hash when read back.
 */

import type Database from 'better-sqlite3';
import { PersistenceError, errorMessage } from '@/core/errors';
import { toIsoTimestamp } from '@/core/time';
import type { ConvictionLevel } from '@/scoring/types';
import { contentHash } from '@/utils/hash';
import { deepFreeze } from '@/utils/immutable';
import { createChildLogger } from '@/utils/logger';
import type { OverrideResult } from './guardrails';
import type { OverrideType } from './request';

const logger = createChildLogger('override_audit');

export interface AuditRecord {
  readonly id: number;
  readonly entityId: string;
  readonly overrideType: OverrideType;
  readonly conviction: ConvictionLevel | null;
  readonly appliedAt: string;
  readonly recordedAt: string;
  readonly contentHash: string;
  readonly result: OverrideResult;
}

export interface AuditQuery {
  entityId?: string;
  /** Inclusive lower bound on appliedAt */
  from?: Date;
  /** Inclusive upper bound on appliedAt */
  to?: Date;
}

export interface OverrideAuditLog {
  append(result: OverrideResult, now?: Date): AuditRecord;
  /** Records in appliedAt order, ties in append order */
  query(filter?: AuditQuery): readonly AuditRecord[];
}

interface AuditRow {
  id: number;
  entity_id: string;
  override_type: OverrideType;
  conviction: ConvictionLevel | null;
  applied_at: string;
  recorded_at: string;
  content_hash: string;
  payload: string;
}

export class SqliteOverrideAuditLog implements OverrideAuditLog {
  constructor(private readonly db: Database.Database) {}

  append(result: OverrideResult, now: Date = new Date()): AuditRecord {
    const conviction = result.documentation?.conviction ?? null;

    let id: number;
    let hash: string;
    let appliedAt: string;
    let recordedAt: string;
    try {
      hash = contentHash(result);
      appliedAt = toIsoTimestamp(result.appliedAt);
      recordedAt = toIsoTimestamp(now);
      const info = this.db
        .prepare(
          `INSERT INTO override_audit
             (entity_id, override_type, conviction, applied_at, recorded_at, content_hash, payload)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          result.entityId,
          result.overrideType,
          conviction,
          appliedAt,
          recordedAt,
          hash,
          JSON.stringify(result)
        );
      id = Number(info.lastInsertRowid);
    } catch (error) {
      throw new PersistenceError(
        `Failed to record override for ${result.entityId}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    logger.info({ id, entityId: result.entityId, type: result.overrideType }, 'Override recorded');

    return deepFreeze({
      id,
      entityId: result.entityId,
      overrideType: result.overrideType,
      conviction,
      appliedAt,
      recordedAt,
      contentHash: hash,
      result,
    });
  }

  query(filter: AuditQuery = {}): readonly AuditRecord[] {
    const clauses: string[] = [];
    const params: string[] = [];

    let rows: AuditRow[];
    try {
      if (filter.entityId !== undefined) {
        clauses.push('entity_id = ?');
        params.push(filter.entityId);
      }
      if (filter.from) {
        clauses.push('applied_at >= ?');
        params.push(toIsoTimestamp(filter.from));
      }
      if (filter.to) {
        clauses.push('applied_at <= ?');
        params.push(toIsoTimestamp(filter.to));
      }

      const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
      rows = this.db
        .prepare(`SELECT * FROM override_audit ${where} ORDER BY applied_at ASC, id ASC`)
        .all(...params) as AuditRow[];
    } catch (error) {
      throw new PersistenceError(`Failed to read override audit log: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return deepFreeze(rows.map(toRecord));
  }
}

function toRecord(row: AuditRow): AuditRecord {
  let result: OverrideResult;
  try {
    result = JSON.parse(row.payload) as OverrideResult;
  } catch (error) {
    throw new PersistenceError(`Audit record ${row.id} has an unreadable payload`, { cause: error });
  }

  if (contentHash(result) !== row.content_hash) {
    throw new PersistenceError(`Audit record ${row.id} failed its integrity check`);
  }

  return {
    id: row.id,
    entityId: row.entity_id,
    overrideType: row.override_type,
    conviction: row.conviction,
    appliedAt: row.applied_at,
    recordedAt: row.recorded_at,
    contentHash: row.content_hash,
    result,
  };
}
