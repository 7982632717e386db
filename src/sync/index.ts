export {
  EpisodeSynchronizer,
  parsePubDate,
  PLACEHOLDER_EPISODE_NUM,
  type BatchSource,
  type EpisodeSynchronizerOptions,
  type SyncResult,
} from './episode-synchronizer.js';
export type { EpisodeRecord, NewEpisode, PodcastRecord, PodcastRepository } from './repository.js';
