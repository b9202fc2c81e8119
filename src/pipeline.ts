/**
 * Newscast — Pipelines
 *
 * The two independent entry points: aggregation writes the record
 * store and text blobs; synthesis voices what aggregation stored.
 */

import type { AppConfig } from './config';
import { timeOperation } from './lib/logger';
import { aggregateFeeds, type AggregatorOptions, type AggregatorResult } from './feeds';
import { PodcastStore } from './storage';
import { OpenAISpeechSynthesizer, synthesizeAll, type SpeechSynthesizer, type SynthesisReport } from './synthesis';

export interface AggregationRunOptions extends AggregatorOptions {
  /** Aggregate without touching the store */
  dryRun?: boolean;
  store?: PodcastStore;
}

/**
 * Aggregate all categories and replace the stored output.
 */
export async function runAggregation(
  config: AppConfig,
  options: AggregationRunOptions = {}
): Promise<AggregatorResult> {
  const result = await timeOperation('Aggregation', () => aggregateFeeds(config, options));

  if (!options.dryRun) {
    const store = options.store ?? new PodcastStore(config.dataDir);
    await store.save(result.records);
    await store.saveTexts(result.records);
  }

  return result;
}

export interface SynthesisRunOptions {
  synthesizer?: SpeechSynthesizer;
  store?: PodcastStore;
}

/**
 * Voice every stored record that has no audio yet.
 */
export async function runSynthesis(
  config: AppConfig,
  options: SynthesisRunOptions = {}
): Promise<SynthesisReport> {
  const store = options.store ?? new PodcastStore(config.dataDir);
  const synthesizer =
    options.synthesizer ??
    new OpenAISpeechSynthesizer({ apiKey: config.synthesis.apiKey, model: config.synthesis.model });

  return timeOperation('Synthesis', () => synthesizeAll(store, synthesizer, config.synthesis));
}
