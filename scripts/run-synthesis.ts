/**
 * Newscast — Run Synthesis Script
 *
 * Voices every record in podcasts.json that has no audio yet and
 * writes the audio paths back. Run after `npm run aggregate`.
 *
 * Usage:
 *   npm run synthesize
 */

import 'dotenv/config';
import { loadConfig } from '../src/config';
import { logger } from '../src/lib/logger';
import { getErrorMessage } from '../src/lib/errors';
import { runSynthesis } from '../src/pipeline';

async function main(): Promise<void> {
  try {
    const config = loadConfig();

    console.log('\n' + '='.repeat(60));
    console.log('NEWSCAST SYNTHESIS');
    console.log('='.repeat(60));
    console.log(`Data dir: ${config.dataDir}`);
    console.log(`Voice: ${config.synthesis.voice} (${config.synthesis.model})`);
    console.log('='.repeat(60) + '\n');

    const report = await runSynthesis(config);

    if (report.aborted) {
      console.error(`\nNothing to synthesize (store ${report.storeStatus}). Run \`npm run aggregate\` first.`);
      process.exit(1);
    }

    console.log('\n' + '='.repeat(60));
    console.log('SYNTHESIS COMPLETE');
    console.log('='.repeat(60));
    console.log(`Synthesized: ${report.synthesized}`);
    console.log(`Already voiced: ${report.existing}`);
    console.log(`Errors: ${report.failed}`);
    console.log('='.repeat(60) + '\n');
  } catch (error) {
    logger.error('Synthesis failed', { error: getErrorMessage(error) });
    process.exit(1);
  }
}

void main();
