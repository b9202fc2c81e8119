/**
 * Newscast — Podcast Record Types
 *
 * The persisted unit: one ranked news item plus its audio reference.
 */

import { z } from 'zod';

export const PodcastRecordSchema = z.object({
  id: z.number().int().positive(),
  title: z.string().min(1),
  category: z.string().min(1),
  date: z.string(),
  image: z.string(),
  /** Relative audio path; empty until synthesis runs */
  audio: z.string(),
  description: z.string(),
  source: z.string(),
  link: z.string(),
});
export type PodcastRecord = z.infer<typeof PodcastRecordSchema>;

export const PodcastStoreSchema = z.array(PodcastRecordSchema);
