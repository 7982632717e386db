export type {
  FavoriteRecord,
  PlayCount,
  PlayHistoryRecord,
  PlayTotals,
  PlaybackRepository,
} from './repository.js';
