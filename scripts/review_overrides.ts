/**
 * Override Review
 * Lists, summarizes and details recorded overrides from the audit log.
 *
 * Usage:
 *   npx tsx scripts/review_overrides.ts list [--ticker ACME]
 *   npx tsx scripts/review_overrides.ts summary [--quarter 0|1|...] [--from 2026-01-01 --to 2026-03-31]
 *                                               [--universe-size 500]
 *   npx tsx scripts/review_overrides.ts detail ACME
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();

import { errorMessage } from '../src/core/errors';
import { dayRange, quarterLabel, quarterRange, type DateRange } from '../src/core/time';
import { closeDatabase, getDatabase } from '../src/data/db';
import { SqliteOverrideAuditLog, type AuditRecord } from '../src/overrides/audit_log';
import { aggregateOverrides, formatReviewSummary } from '../src/overrides/audit_stats';
import { formatRecommendation } from '../src/scoring/recommendation';
import { PILLARS } from '../src/scoring/types';
import { createChildLogger } from '../src/utils/logger';
import { getArg, getNumberArg, positionals } from './lib/args';

const logger = createChildLogger('review_overrides');

function formatImpact(impact: number): string {
  return `${impact > 0 ? '+' : ''}${impact.toFixed(1)}pt`;
}

function listOverrides(records: readonly AuditRecord[], ticker: string | undefined): void {
  if (records.length === 0) {
    console.log(`No overrides found${ticker ? ` for ${ticker}` : ''}.`);
    return;
  }

  console.log(`Overrides: ${records.length}`);
  console.log('-'.repeat(84));
  console.log(
    `  ${'Applied'.padEnd(20)} ${'Entity'.padEnd(8)} ${'Type'.padEnd(10)} ` +
      `${'Conviction'.padEnd(11)} ${'Impact'.padStart(8)}  Rec changed`
  );
  for (const record of records) {
    const { result } = record;
    console.log(
      `  ${record.appliedAt.slice(0, 19).padEnd(20)} ${record.entityId.padEnd(8)} ` +
        `${record.overrideType.padEnd(10)} ${(record.conviction ?? '-').padEnd(11)} ` +
        `${formatImpact(result.percentileImpact).padStart(8)}  ${result.recommendationChanged ? 'YES' : 'no'}`
    );
  }
}

function showDetail(records: readonly AuditRecord[], ticker: string): void {
  if (records.length === 0) {
    console.log(`No overrides found for ${ticker}.`);
    return;
  }

  console.log(`OVERRIDE DETAIL: ${ticker} (${records.length} override(s))`);
  console.log('='.repeat(72));

  records.forEach((record, i) => {
    const { result } = record;
    const doc = result.documentation;
    console.log(`\n--- Override #${i + 1} (${record.appliedAt}) ---`);
    console.log(`  Type:        ${result.overrideType}`);
    if (doc) {
      console.log(`  Conviction:  ${doc.conviction}`);
      console.log(`  Model miss:  ${doc.whatModelMisses}`);
      console.log(`  Why better:  ${doc.whyMoreAccurate}`);
      console.log(`  Falsifiable: ${doc.whatProvesWrong}`);
      if (doc.evidence.length > 0) {
        console.log('  Evidence:');
        for (const e of doc.evidence) console.log(`    - ${e}`);
      }
    }

    const { weights, sentimentDelta } = result.adjustment;
    if (weights) {
      console.log(`  Weights:     ${PILLARS.map((p) => `${p[0]?.toUpperCase()}=${weights[p].toFixed(2)}`).join(' ')}`);
    }
    if (sentimentDelta !== null) {
      console.log(`  Sentiment:   ${sentimentDelta > 0 ? '+' : ''}${sentimentDelta.toFixed(1)}pt`);
    }

    console.log(`  Composite:   ${result.base.composite.toFixed(2)} -> ${result.final.composite.toFixed(2)}`);
    console.log(`  Impact:      ${formatImpact(result.percentileImpact)}`);
    if (result.recommendationChanged) {
      console.log(
        `  Rec change:  ${formatRecommendation(result.base.recommendation)} -> ` +
          formatRecommendation(result.final.recommendation)
      );
    }
    if (result.currentPrice !== null) {
      console.log(`  Price:       ${result.currentPrice.toFixed(2)}`);
    }
    for (const v of result.guardrailViolations) console.log(`  ! ${v}`);
    console.log(`  Hash:        ${record.contentHash.slice(0, 12)}`);
  });
}

function resolveSummaryRange(): { range: DateRange | null; label: string } {
  const quartersBack = getNumberArg('--quarter');
  if (quartersBack !== undefined) {
    const range = quarterRange(new Date(), quartersBack);
    return { range, label: quarterLabel(range.from) };
  }

  const from = getArg('--from');
  const to = getArg('--to');
  if (from && to) {
    return { range: dayRange(from, to), label: `${from} to ${to}` };
  }
  return { range: null, label: 'all time' };
}

function main(): number {
  const [command, tickerArg] = positionals();
  const auditLog = new SqliteOverrideAuditLog(getDatabase());

  try {
    switch (command) {
      case 'list': {
        const ticker = getArg('--ticker')?.toUpperCase();
        listOverrides(auditLog.query(ticker ? { entityId: ticker } : {}), ticker);
        return 0;
      }
      case 'summary': {
        const { range, label } = resolveSummaryRange();
        const records = auditLog.query(range ?? {});
        const stats = aggregateOverrides(records.map((r) => r.result));
        console.log(formatReviewSummary(label, stats, getNumberArg('--universe-size') ?? null));
        return 0;
      }
      case 'detail': {
        if (!tickerArg) {
          console.error('Usage: review_overrides.ts detail <ticker>');
          return 1;
        }
        const ticker = tickerArg.toUpperCase();
        showDetail(auditLog.query({ entityId: ticker }), ticker);
        return 0;
      }
      default:
        console.log('Usage: review_overrides.ts <list|summary|detail> [options]');
        return command ? 1 : 0;
    }
  } finally {
    closeDatabase();
  }
}

try {
  process.exit(main());
} catch (error) {
  logger.error({ err: error }, 'Override review failed');
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
}
