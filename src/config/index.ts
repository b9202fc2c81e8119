/**
 * Newscast — Configuration
 *
 * Builds the immutable configuration value both pipelines run on.
 * Constructed once at startup and passed explicitly; nothing in the
 * pipeline reads process.env on its own.
 */

import { resolve } from 'path';
import { z } from 'zod';
import type { FeedTable } from '../types';
import { ConfigError } from '../lib/errors';
import { DEFAULT_FEEDS, freezeFeedTable, loadFeedTable } from './feeds';

export { DEFAULT_FEEDS, loadFeedTable, parseFeedTable } from './feeds';

export const SPEECH_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type SpeechVoice = (typeof SPEECH_VOICES)[number];

export interface AppConfig {
  readonly dataDir: string;
  readonly feeds: FeedTable;
  readonly maxNewsPerCategory: number;
  readonly descriptionMaxLength: number;
  readonly feedTimeoutMs: number;
  readonly fetchConcurrency: number;
  readonly synthesis: {
    readonly concurrency: number;
    readonly voice: SpeechVoice;
    readonly model: string;
    readonly apiKey?: string;
  };
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  DATA_DIR: z.string().min(1).default('./data'),
  MAX_NEWS_PER_CATEGORY: positiveInt(5),
  DESCRIPTION_MAX_LENGTH: positiveInt(500),
  FEED_TIMEOUT_MS: positiveInt(30000),
  FETCH_CONCURRENCY: positiveInt(1),
  SYNTHESIS_CONCURRENCY: positiveInt(1),
  FEEDS_FILE: z.string().min(1).optional(),
  TTS_VOICE: z.enum(SPEECH_VOICES).default('alloy'),
  TTS_MODEL: z.string().min(1).default('tts-1'),
  OPENAI_API_KEY: z.string().min(1).optional(),
});

/**
 * Treat empty strings as unset, the way a blank line in .env reads.
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * Load and validate configuration from the environment.
 * @throws ConfigError if any variable is malformed or the feed table is invalid
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: { feeds?: FeedTable } = {}
): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid environment configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  const feeds = overrides.feeds ?? (vars.FEEDS_FILE ? loadFeedTable(vars.FEEDS_FILE) : DEFAULT_FEEDS);

  return Object.freeze({
    dataDir: resolve(vars.DATA_DIR),
    feeds: freezeFeedTable(feeds),
    maxNewsPerCategory: vars.MAX_NEWS_PER_CATEGORY,
    descriptionMaxLength: vars.DESCRIPTION_MAX_LENGTH,
    feedTimeoutMs: vars.FEED_TIMEOUT_MS,
    fetchConcurrency: vars.FETCH_CONCURRENCY,
    synthesis: Object.freeze({
      concurrency: vars.SYNTHESIS_CONCURRENCY,
      voice: vars.TTS_VOICE,
      model: vars.TTS_MODEL,
      apiKey: vars.OPENAI_API_KEY,
    }),
  });
}
