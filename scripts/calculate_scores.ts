/**
 * Composite Score Calculation
 * Reads pillar scores, ranks the universe and writes composite results.
 *
 * Usage: npx tsx scripts/calculate_scores.ts [--input data/pillar_scores.json]
 *        [--output data/composite_scores.json] [--top 20]
 */

import dotenv from 'dotenv';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();

import { loadPolicyConfig } from '../src/core/config';
import { errorMessage } from '../src/core/errors';
import { calculateForUniverse, summarizeRecommendations } from '../src/scoring/composite';
import { parsePillarScores } from '../src/scoring/input';
import { formatRecommendation } from '../src/scoring/recommendation';
import { createChildLogger } from '../src/utils/logger';
import { getArg, getNumberArg } from './lib/args';

const logger = createChildLogger('calculate_scores');

function main(): void {
  const inputPath = resolve(getArg('--input') ?? 'data/pillar_scores.json');
  const outputPath = resolve(getArg('--output') ?? 'data/composite_scores.json');
  const top = getNumberArg('--top') ?? 20;

  if (!existsSync(inputPath)) {
    throw new Error(`Pillar scores file not found: ${inputPath}`);
  }

  const policy = loadPolicyConfig();
  const document = parsePillarScores(JSON.parse(readFileSync(inputPath, 'utf-8')));
  const run = calculateForUniverse(document.entities, policy);

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(
    outputPath,
    JSON.stringify({ as_of: document.asOf, ...run }, null, 2) + '\n',
    'utf-8'
  );
  logger.info({ outputPath, scored: run.results.length }, 'Composite results written');

  console.log(`\nCOMPOSITE SCORES${document.asOf ? ` (${document.asOf})` : ''}`);
  console.log('-'.repeat(72));
  console.log(
    `  ${'#'.padStart(3)}  ${'Entity'.padEnd(10)} ${'Composite'.padStart(10)} ` +
      `${'Pctl'.padStart(7)}  Recommendation`
  );
  run.results.slice(0, top).forEach((r, i) => {
    console.log(
      `  ${String(i + 1).padStart(3)}  ${r.entityId.padEnd(10)} ${r.composite.toFixed(2).padStart(10)} ` +
        `${r.percentile.toFixed(1).padStart(7)}  ${formatRecommendation(r.recommendation)}`
    );
  });

  console.log('\nDistribution:');
  for (const bucket of summarizeRecommendations(run.results, policy)) {
    console.log(
      `  ${formatRecommendation(bucket.recommendation).padEnd(14)} ${String(bucket.count).padStart(4)} ` +
        `(${bucket.share.toFixed(1)}%)`
    );
  }

  if (run.excluded.length > 0) {
    console.log(`\nExcluded (${run.excluded.length}):`);
    for (const e of run.excluded) {
      console.log(`  ${e.entityId.padEnd(10)} ${e.reason}`);
    }
  }
}

try {
  main();
} catch (error) {
  logger.error({ err: error }, 'Score calculation failed');
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
}
