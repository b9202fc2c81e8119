/**
 * Newscast — Storage Module
 */

export {
  PodcastStore,
  recordText,
  RECORDS_FILE,
  TEXTS_DIR,
  AUDIO_DIR,
  type StoreLoadResult,
  type StoreStatus,
} from './podcast-store';
