export { createEpisodeEntry, type EpisodeEntry } from './types.js';
export { FeedExtractor, type FetchedFeed, type ParsedFeed } from './feed.js';
export {
  XiaoyuzhouPageExtractor,
  DEFAULT_PAGE_STRATEGIES,
  runPageStrategies,
  pairEpisodesWithAudio,
  extractAudioUrls,
  type PageExtraction,
  type PageExtractionStrategy,
  type PageSource,
  type XiaoyuzhouPage,
} from './xiaoyuzhou-page.js';
