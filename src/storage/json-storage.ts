import fs from 'fs/promises';
import path from 'path';
import type { PodcastInfo } from '../resolvers/types.js';
import type { EpisodeRecord, NewEpisode, PodcastRecord, PodcastRepository } from '../sync/repository.js';
import type { FavoriteRecord, PlayHistoryRecord, PlayTotals, PlaybackRepository } from '../playback/repository.js';
import { PodcastNotFoundError } from '../errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface StorageData {
  nextPodcastId: number;
  nextEpisodeId: number;
  nextFavoriteId: number;
  nextHistoryId: number;
  podcasts: PodcastRecord[];
  episodes: EpisodeRecord[];
  favorites: FavoriteRecord[];
  playHistory: PlayHistoryRecord[];
}

function emptyData(): StorageData {
  return {
    nextPodcastId: 1,
    nextEpisodeId: 1,
    nextFavoriteId: 1,
    nextHistoryId: 1,
    podcasts: [],
    episodes: [],
    favorites: [],
    playHistory: [],
  };
}

function nextId(records: readonly { id: number }[]): number {
  return Math.max(0, ...records.map((r) => r.id)) + 1;
}

// 新しい順（同時刻ならIDの大きい順）
function newestFirst<T extends { id: number }>(timeOf: (record: T) => string): (a: T, b: T) => number {
  return (a, b) => Date.parse(timeOf(b)) - Date.parse(timeOf(a)) || b.id - a.id;
}

function byPubDateDesc(a: EpisodeRecord, b: EpisodeRecord): number {
  return Date.parse(b.pubDate) - Date.parse(a.pubDate);
}

// ポッドキャスト・エピソード・再生履歴・お気に入りを1つのJSONファイルに保存する
export class JsonStorage implements PodcastRepository, PlaybackRepository {
  private filePath: string;
  private data: StorageData;
  private logger: Logger;

  constructor(dataDir: string, logger: Logger = getLogger()) {
    this.filePath = path.join(dataDir, 'podcasts.json');
    this.data = emptyData();
    this.logger = logger;
  }

  async load(): Promise<void> {
    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      const parsed = JSON.parse(content) as Partial<StorageData>;
      const podcasts = parsed.podcasts ?? [];
      // 再生状態を持たない古いファイルは未再生として読む
      const episodes = (parsed.episodes ?? []).map((e: Omit<EpisodeRecord, 'isPlayed' | 'progress' | 'playedAt'> & Partial<EpisodeRecord>) => ({ isPlayed: false, progress: 0, playedAt: null, ...e }));
      const favorites = parsed.favorites ?? [];
      const playHistory = parsed.playHistory ?? [];
      this.data = {
        podcasts,
        episodes,
        favorites,
        playHistory,
        nextPodcastId: parsed.nextPodcastId ?? nextId(podcasts),
        nextEpisodeId: parsed.nextEpisodeId ?? nextId(episodes),
        nextFavoriteId: parsed.nextFavoriteId ?? nextId(favorites),
        nextHistoryId: parsed.nextHistoryId ?? nextId(playHistory),
      };
      this.logger.debug(
        { podcasts: podcasts.length, episodes: episodes.length },
        'ポッドキャストデータを読み込み'
      );
    } catch (error) {
      // ファイルが存在しない場合は空のデータで初期化
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.data = emptyData();
        this.logger.debug('ポッドキャストデータファイルが存在しないため、新規作成');
      } else {
        throw error;
      }
    }
  }

  async save(): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(this.data, null, 2), 'utf-8');
    this.logger.debug({ path: this.filePath }, 'ポッドキャストデータを保存');
  }

  findPodcastByFeedUrl(feedUrl: string): PodcastRecord | null {
    return this.data.podcasts.find((p) => p.feedUrl === feedUrl) ?? null;
  }

  async getOrCreatePodcast(info: PodcastInfo): Promise<{ podcast: PodcastRecord; created: boolean }> {
    const existing = this.findPodcastByFeedUrl(info.feedUrl);
    if (existing) {
      return { podcast: { ...existing }, created: false };
    }

    const now = new Date().toISOString();
    const podcast: PodcastRecord = {
      id: this.data.nextPodcastId++,
      platform: info.platform,
      title: info.title,
      description: info.description,
      imageUrl: info.imageUrl,
      feedUrl: info.feedUrl,
      sourceUrl: info.sourceUrl,
      author: info.author,
      category: info.category,
      episodeCount: info.episodeCount,
      createdAt: now,
      updatedAt: now,
    };
    this.data.podcasts.push(podcast);

    await this.save();
    this.logger.info({ podcastId: podcast.id, title: podcast.title }, 'ポッドキャストを登録');
    return { podcast: { ...podcast }, created: true };
  }

  async getPodcast(podcastId: number): Promise<PodcastRecord | null> {
    const podcast = this.data.podcasts.find((p) => p.id === podcastId);
    return podcast ? { ...podcast } : null;
  }

  // 更新日時の新しい順
  async listPodcasts(): Promise<PodcastRecord[]> {
    return [...this.data.podcasts]
      .sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt) || b.id - a.id)
      .map((p) => ({ ...p }));
  }

  async updateEpisodeCount(podcastId: number, episodeCount: number): Promise<void> {
    const podcast = this.data.podcasts.find((p) => p.id === podcastId);
    if (!podcast) {
      throw new PodcastNotFoundError(podcastId);
    }

    podcast.episodeCount = episodeCount;
    podcast.updatedAt = new Date().toISOString();
    await this.save();
  }

  async listAudioUrls(podcastId: number): Promise<string[]> {
    return this.data.episodes.filter((e) => e.podcastId === podcastId).map((e) => e.audioUrl);
  }

  // 同じポッドキャストに同じ audioUrl が既にあれば、新しい行は作らない
  async insertEpisode(episode: NewEpisode): Promise<EpisodeRecord> {
    const duplicate = this.data.episodes.find(
      (e) => e.podcastId === episode.podcastId && e.audioUrl === episode.audioUrl
    );
    if (duplicate) {
      this.logger.debug({ podcastId: episode.podcastId, audioUrl: episode.audioUrl }, '登録済みのエピソードです');
      return { ...duplicate };
    }

    const record: EpisodeRecord = {
      id: this.data.nextEpisodeId++,
      podcastId: episode.podcastId,
      title: episode.title,
      description: episode.description,
      audioUrl: episode.audioUrl,
      durationSeconds: episode.durationSeconds,
      pubDate: episode.pubDate.toISOString(),
      episodeNum: episode.episodeNum,
      createdAt: new Date().toISOString(),
      isPlayed: false,
      progress: 0,
      playedAt: null,
    };
    this.data.episodes.push(record);

    await this.save();
    return { ...record };
  }

  // 公開日時の新しい順
  async listEpisodes(podcastId: number): Promise<EpisodeRecord[]> {
    return this.data.episodes
      .filter((e) => e.podcastId === podcastId)
      .sort(byPubDateDesc)
      .map((e) => ({ ...e }));
  }

  async deletePodcast(podcastId: number): Promise<boolean> {
    const before = this.data.podcasts.length;
    this.data.podcasts = this.data.podcasts.filter((p) => p.id !== podcastId);
    if (this.data.podcasts.length === before) {
      return false;
    }

    const episodesBefore = this.data.episodes.length;
    this.data.episodes = this.data.episodes.filter((e) => e.podcastId !== podcastId);
    this.data.favorites = this.data.favorites.filter((f) => f.podcastId !== podcastId);
    this.data.playHistory = this.data.playHistory.filter((h) => h.podcastId !== podcastId);

    await this.save();
    this.logger.info(
      { podcastId, removedEpisodes: episodesBefore - this.data.episodes.length },
      'ポッドキャストを削除'
    );
    return true;
  }

  async getEpisode(episodeId: number): Promise<EpisodeRecord | null> {
    const episode = this.data.episodes.find((e) => e.id === episodeId);
    return episode ? { ...episode } : null;
  }

  async recordPlay(episodeId: number): Promise<PlayHistoryRecord | null> {
    const episode = this.data.episodes.find((e) => e.id === episodeId);
    if (!episode) {
      return null;
    }

    episode.isPlayed = true;
    const history: PlayHistoryRecord = {
      id: this.data.nextHistoryId++,
      episodeId,
      podcastId: episode.podcastId,
      playedAt: new Date().toISOString(),
      progress: 0,
      durationSeconds: episode.durationSeconds,
    };
    this.data.playHistory.push(history);

    await this.save();
    return { ...history };
  }

  async updateProgress(episodeId: number, progress: number): Promise<EpisodeRecord | null> {
    const episode = this.data.episodes.find((e) => e.id === episodeId);
    if (!episode) {
      return null;
    }

    episode.progress = progress;
    episode.playedAt = new Date().toISOString();
    await this.save();
    return { ...episode };
  }

  async listPlayHistory(limit: number): Promise<PlayHistoryRecord[]> {
    return [...this.data.playHistory]
      .sort(newestFirst((h) => h.playedAt))
      .slice(0, limit)
      .map((h) => ({ ...h }));
  }

  async getPlayTotals(topLimit: number): Promise<PlayTotals> {
    const counts = new Map<number, number>();
    let totalDurationSeconds = 0;
    for (const history of this.data.playHistory) {
      counts.set(history.podcastId, (counts.get(history.podcastId) ?? 0) + 1);
      totalDurationSeconds += history.durationSeconds;
    }

    const topPodcasts = [...counts]
      .map(([podcastId, count]) => ({ podcastId, count }))
      .sort((a, b) => b.count - a.count || a.podcastId - b.podcastId)
      .slice(0, topLimit);

    return { totalPlays: this.data.playHistory.length, totalDurationSeconds, topPodcasts };
  }

  async addFavorite(podcastId: number): Promise<{ favorite: FavoriteRecord; created: boolean }> {
    if (!this.data.podcasts.some((p) => p.id === podcastId)) {
      throw new PodcastNotFoundError(podcastId);
    }

    const existing = this.data.favorites.find((f) => f.podcastId === podcastId);
    if (existing) {
      return { favorite: { ...existing }, created: false };
    }

    const favorite: FavoriteRecord = {
      id: this.data.nextFavoriteId++,
      podcastId,
      createdAt: new Date().toISOString(),
    };
    this.data.favorites.push(favorite);

    await this.save();
    return { favorite: { ...favorite }, created: true };
  }

  async removeFavorite(podcastId: number): Promise<boolean> {
    const before = this.data.favorites.length;
    this.data.favorites = this.data.favorites.filter((f) => f.podcastId !== podcastId);
    if (this.data.favorites.length === before) {
      return false;
    }

    await this.save();
    return true;
  }

  // お気に入りに追加した新しい順
  async listFavorites(limit: number): Promise<FavoriteRecord[]> {
    return [...this.data.favorites]
      .sort(newestFirst((f) => f.createdAt))
      .slice(0, limit)
      .map((f) => ({ ...f }));
  }
}
