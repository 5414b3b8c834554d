/**
 * Override session
 * Applies a batch of overrides against one run, then persists the results.
 * Every override in a session is ranked against the run's original
 * composites, never against another override's output.
 */

import type { PolicyConfig } from '@/core/config';
import { PersistenceError, ValidationError } from '@/core/errors';
import { createUniverseSnapshot } from '@/scoring/composite';
import type { CompositeResult, UniverseRun } from '@/scoring/types';
import { createChildLogger } from '@/utils/logger';
import { applyOverride } from './applier';
import type { AuditRecord, OverrideAuditLog } from './audit_log';
import { evaluateGuardrails, type OverrideResult } from './guardrails';
import type { OverrideRequest } from './request';

const logger = createChildLogger('override_session');

export type OverrideOutcome =
  | { status: 'applied'; result: OverrideResult }
  | { status: 'rejected'; entityId: string; violations: readonly string[] };

export interface PersistenceFailure {
  result: OverrideResult;
  error: PersistenceError;
}

export interface PersistReport {
  persisted: AuditRecord[];
  failures: PersistenceFailure[];
}

export function runOverrideSession(
  baseRun: UniverseRun,
  requests: readonly OverrideRequest[],
  policy: PolicyConfig
): OverrideOutcome[] {
  const snapshot = createUniverseSnapshot(baseRun.results);
  const byEntity = new Map<string, CompositeResult>(baseRun.results.map((r) => [r.entityId, r]));

  const outcomes = requests.map((request): OverrideOutcome => {
    const base = byEntity.get(request.entityId);
    if (!base) {
      return {
        status: 'rejected',
        entityId: request.entityId,
        violations: [`Entity ${request.entityId} is not part of the scored universe`],
      };
    }

    try {
      const computation = applyOverride(base, request, snapshot, policy);
      return { status: 'applied', result: evaluateGuardrails(computation, policy) };
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      return { status: 'rejected', entityId: request.entityId, violations: error.violations };
    }
  });

  logger.info(
    {
      requested: requests.length,
      applied: outcomes.filter((o) => o.status === 'applied').length,
    },
    'Override session complete'
  );

  return outcomes;
}

/**
 * Appends each result to the audit log. A failed write is reported and the
 * remaining results are still attempted; the in-memory results are untouched.
 */
export function persistOverrideResults(
  results: readonly OverrideResult[],
  auditLog: OverrideAuditLog,
  now: Date = new Date()
): PersistReport {
  const report: PersistReport = { persisted: [], failures: [] };

  for (const result of results) {
    try {
      report.persisted.push(auditLog.append(result, now));
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      logger.error({ entityId: result.entityId, err: error }, 'Override could not be recorded');
      report.failures.push({ result, error });
    }
  }

  return report;
}

export function appliedResults(outcomes: readonly OverrideOutcome[]): OverrideResult[] {
  return outcomes.flatMap((o) => (o.status === 'applied' ? [o.result] : []));
}
