import type { PodcastInfo } from '../resolvers/types.js';

export interface PodcastRecord {
  id: number;
  platform: PodcastInfo['platform'];
  title: string;
  description: string;
  imageUrl: string;
  feedUrl: string;
  sourceUrl: string;
  author: string;
  category: string;
  episodeCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface EpisodeRecord {
  id: number;
  podcastId: number;
  title: string;
  description: string;
  audioUrl: string;
  durationSeconds: number;
  pubDate: string;
  episodeNum: number;
  createdAt: string;
  isPlayed: boolean;
  progress: number;          // 再生位置（秒）
  playedAt: string | null;   // 最後に再生位置を更新した日時
}

export interface NewEpisode {
  podcastId: number;
  title: string;
  description: string;
  audioUrl: string;
  durationSeconds: number;
  pubDate: Date;
  episodeNum: number;
}

// 永続化層の契約。ポッドキャスト内で audioUrl は一意
export interface PodcastRepository {
  getOrCreatePodcast(info: PodcastInfo): Promise<{ podcast: PodcastRecord; created: boolean }>;
  getPodcast(podcastId: number): Promise<PodcastRecord | null>;
  listPodcasts(): Promise<PodcastRecord[]>;
  updateEpisodeCount(podcastId: number, episodeCount: number): Promise<void>;
  listAudioUrls(podcastId: number): Promise<string[]>;
  insertEpisode(episode: NewEpisode): Promise<EpisodeRecord>;
  listEpisodes(podcastId: number): Promise<EpisodeRecord[]>;
  deletePodcast(podcastId: number): Promise<boolean>;
}
