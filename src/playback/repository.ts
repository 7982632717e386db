import type { EpisodeRecord } from '../sync/repository.js';

export interface FavoriteRecord {
  id: number;
  podcastId: number;
  createdAt: string;
}

export interface PlayHistoryRecord {
  id: number;
  episodeId: number;
  podcastId: number;
  playedAt: string;
  progress: number;
  durationSeconds: number;
}

export interface PlayCount {
  podcastId: number;
  count: number;
}

export interface PlayTotals {
  totalPlays: number;
  totalDurationSeconds: number;
  topPodcasts: PlayCount[];   // 再生回数の多い順
}

// 再生履歴・お気に入りの永続化。ポッドキャストを削除すると関連する行も消える
export interface PlaybackRepository {
  getEpisode(episodeId: number): Promise<EpisodeRecord | null>;
  // 再生済みにして履歴を1行追加する。エピソードがなければnull
  recordPlay(episodeId: number): Promise<PlayHistoryRecord | null>;
  updateProgress(episodeId: number, progress: number): Promise<EpisodeRecord | null>;
  listPlayHistory(limit: number): Promise<PlayHistoryRecord[]>;
  getPlayTotals(topLimit: number): Promise<PlayTotals>;
  addFavorite(podcastId: number): Promise<{ favorite: FavoriteRecord; created: boolean }>;
  removeFavorite(podcastId: number): Promise<boolean>;
  listFavorites(limit: number): Promise<FavoriteRecord[]>;
}
