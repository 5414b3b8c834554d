/**
 * Override Application
 * Applies one or more documented overrides to a freshly scored universe,
 * prints the before/after comparison with every guardrail finding and
 * appends the results to the audit log.
 *
 * Usage:
 *   npx tsx scripts/apply_override.ts --request overrides/acme.json
 *   npx tsx scripts/apply_override.ts --ticker ACME --type SENTIMENT --sentiment 5 \
 *     --what-misses "..." --why-accurate "..." --proves-wrong "..." \
 *     --conviction MEDIUM --evidence "..." --evidence "..."
 *
 * Options: --scores <pillar scores file> (default data/pillar_scores.json),
 *          --price <current price>, --dry-run (skip the audit log)
 */

import dotenv from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();

import { loadPolicyConfig } from '../src/core/config';
import { errorMessage } from '../src/core/errors';
import { closeDatabase, getDatabase } from '../src/data/db';
import { SqliteOverrideAuditLog } from '../src/overrides/audit_log';
import type { OverrideResult } from '../src/overrides/guardrails';
import { parseOverrideRequest, type OverrideRequest } from '../src/overrides/request';
import {
  appliedResults,
  persistOverrideResults,
  runOverrideSession,
} from '../src/overrides/session';
import { calculateForUniverse } from '../src/scoring/composite';
import { parsePillarScores } from '../src/scoring/input';
import { formatRecommendation } from '../src/scoring/recommendation';
import { PILLARS } from '../src/scoring/types';
import { createChildLogger } from '../src/utils/logger';
import { getArg, getArgs, getNumberArg, hasFlag } from './lib/args';

const logger = createChildLogger('apply_override');

function readJson(path: string): unknown {
  if (!existsSync(path)) {
    throw new Error(`File not found: ${path}`);
  }
  return JSON.parse(readFileSync(path, 'utf-8'));
}

/** Raw request built from flags; shape-checked by parseOverrideRequest like any file. */
function requestFromFlags(): Record<string, unknown> {
  const type = (getArg('--type') ?? 'SENTIMENT').toUpperCase();
  const weights = getArg('--weights');
  const sentiment = getNumberArg('--sentiment');

  let weightOverride: Record<string, number> | null = null;
  if (weights) {
    const parts = weights.split(',').map(Number);
    weightOverride = Object.fromEntries(PILLARS.map((p, i) => [p, parts[i] ?? Number.NaN]));
  }

  return {
    entity_id: getArg('--ticker') ?? '',
    override_type: type,
    weight_override: weightOverride,
    sentiment_override: sentiment === undefined ? null : { adjustment: sentiment },
    documentation:
      type === 'NONE'
        ? null
        : {
            what_model_misses: getArg('--what-misses') ?? '',
            why_view_more_accurate: getArg('--why-accurate') ?? '',
            what_proves_wrong: getArg('--proves-wrong') ?? '',
            conviction: (getArg('--conviction') ?? 'MEDIUM').toUpperCase(),
            evidence_pieces: getArgs('--evidence'),
          },
    current_price: getNumberArg('--price') ?? null,
  };
}

function loadRequests(): OverrideRequest[] {
  const requestPath = getArg('--request');
  const raw = requestPath ? readJson(resolve(requestPath)) : requestFromFlags();
  const items = Array.isArray(raw) ? raw : [raw];

  return items.map((item, index) => {
    const parsed = parseOverrideRequest(item);
    if (!parsed.request) {
      throw new Error(`Override request #${index + 1} rejected:\n  - ${parsed.violations.join('\n  - ')}`);
    }
    return parsed.request;
  });
}

function printResult(result: OverrideResult): void {
  const { base, final } = result;
  const row = (label: string, before: string, after: string) =>
    console.log(`  ${label.padEnd(16)} ${before.padStart(14)} ${after.padStart(14)}`);

  console.log(`\nOVERRIDE: ${result.entityId} (${result.overrideType})`);
  console.log('-'.repeat(48));
  row('', 'Base', 'Final');
  for (const pillar of PILLARS) {
    row(`${pillar} score`, base.pillars[pillar].toFixed(2), final.pillars[pillar].toFixed(2));
  }
  for (const pillar of PILLARS) {
    row(`${pillar} weight`, base.weights[pillar].toFixed(2), final.weights[pillar].toFixed(2));
  }
  row('Composite', base.composite.toFixed(2), final.composite.toFixed(2));
  row('Percentile', base.percentile.toFixed(1), final.percentile.toFixed(1));
  row(
    'Recommendation',
    formatRecommendation(base.recommendation),
    formatRecommendation(final.recommendation)
  );

  const sign = result.percentileImpact > 0 ? '+' : '';
  console.log(`\n  Impact: ${sign}${result.percentileImpact.toFixed(1)}pt`);
  if (result.extremeOverride) console.log('  EXTREME OVERRIDE');

  if (result.guardrailViolations.length > 0) {
    console.log('  Guardrail violations:');
    for (const v of result.guardrailViolations) console.log(`    ! ${v}`);
  } else {
    console.log('  Guardrails: all passed');
  }
}

function main(): number {
  const scoresPath = resolve(getArg('--scores') ?? 'data/pillar_scores.json');
  const dryRun = hasFlag('--dry-run');

  const policy = loadPolicyConfig();
  const requests = loadRequests();
  const document = parsePillarScores(readJson(scoresPath));
  const run = calculateForUniverse(document.entities, policy);

  const outcomes = runOverrideSession(run, requests, policy);
  let rejected = 0;
  for (const outcome of outcomes) {
    if (outcome.status === 'applied') {
      printResult(outcome.result);
    } else {
      rejected++;
      console.log(`\nREJECTED: ${outcome.entityId}`);
      for (const v of outcome.violations) console.log(`  - ${v}`);
    }
  }

  const results = appliedResults(outcomes);
  if (dryRun || results.length === 0) {
    if (dryRun) console.log('\nDry run: nothing recorded');
    return rejected > 0 ? 1 : 0;
  }

  try {
    const report = persistOverrideResults(results, new SqliteOverrideAuditLog(getDatabase()));
    console.log(`\nRecorded ${report.persisted.length} override(s) in the audit log`);
    for (const failure of report.failures) {
      console.error(`  Not recorded: ${failure.result.entityId}: ${failure.error.message}`);
    }
    return rejected > 0 || report.failures.length > 0 ? 1 : 0;
  } finally {
    closeDatabase();
  }
}

try {
  process.exit(main());
} catch (error) {
  logger.error({ err: error }, 'Override application failed');
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
}
