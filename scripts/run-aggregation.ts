/**
 * Newscast — Run Aggregation Script
 *
 * Collects news from every configured feed, ranks each category and
 * replaces podcasts.json plus the per-record text blobs.
 *
 * Usage:
 *   npm run aggregate                # Fetch and save
 *   npm run aggregate -- --dry-run   # Fetch only, print what would be saved
 */

import 'dotenv/config';
import { loadConfig } from '../src/config';
import { logger } from '../src/lib/logger';
import { getErrorMessage } from '../src/lib/errors';
import { runAggregation } from '../src/pipeline';

interface AggregationCliOptions {
  dryRun: boolean;
}

function parseArgs(): AggregationCliOptions {
  const args = process.argv.slice(2);
  return { dryRun: args.includes('--dry-run') };
}

async function main(): Promise<void> {
  const options = parseArgs();

  try {
    const config = loadConfig();

    console.log('\n' + '='.repeat(60));
    console.log('NEWSCAST AGGREGATION');
    console.log('='.repeat(60));
    console.log(`Data dir: ${config.dataDir}`);
    console.log(`Categories: ${Object.keys(config.feeds).join(', ')}`);
    console.log(`Max per category: ${config.maxNewsPerCategory}`);
    console.log(`Dry run: ${options.dryRun}`);
    console.log('='.repeat(60) + '\n');

    const result = await runAggregation(config, { dryRun: options.dryRun });

    console.log('\n' + '='.repeat(60));
    console.log('AGGREGATION COMPLETE');
    console.log('='.repeat(60));
    for (const category of result.categories) {
      console.log(`${category.category}: ${category.kept} kept (${category.fetched} fetched, ${category.duplicates} duplicates)`);
    }
    console.log(`Total records: ${result.records.length}`);
    console.log(`Duration: ${(result.durationMs / 1000).toFixed(2)}s`);
    console.log('='.repeat(60) + '\n');

    if (options.dryRun) {
      for (const record of result.records) {
        console.log(`#${record.id} [${record.category}] ${record.date} ${record.title} (${record.source})`);
      }
    }
  } catch (error) {
    logger.error('Aggregation failed', { error: getErrorMessage(error) });
    process.exit(1);
  }
}

void main();
