import type { Config } from '../config/index.js';
import { createEngineContext, type EngineContext } from '../platforms/context.js';
import { isXiaoyuzhouPage } from '../platforms/detector.js';
import { FeedExtractor, XiaoyuzhouPageExtractor } from '../extractors/index.js';
import { PodcastResolver, createResolverRegistry, type PodcastInfo } from '../resolvers/index.js';
import {
  EpisodeSynchronizer,
  type EpisodeRecord,
  type PodcastRecord,
  type PodcastRepository,
  type SyncResult,
} from '../sync/index.js';
import type { PlayHistoryRecord, PlaybackRepository } from '../playback/index.js';
import { JsonStorage } from '../storage/json-storage.js';
import { EpisodeNotFoundError, PodcastNotFoundError, errorMessage } from '../errors.js';
import { formatListeningTime } from '../utils/duration.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface AddPodcastResult {
  podcast: PodcastRecord;
  created: boolean;
  sync?: SyncResult;
}

export interface RefreshResult {
  podcast: PodcastRecord;
  sync: SyncResult;
}

export interface PlaybackTarget {
  episodeId: number;
  audioUrl: string;
  title: string;
  podcastTitle: string;
  imageUrl: string;
}

export interface PlayHistoryEntry extends PlayHistoryRecord {
  title: string;
  podcastTitle: string;
}

export interface PlaybackStats {
  totalPlays: number;
  totalDurationSeconds: number;
  totalDurationLabel: string;
  topPodcasts: { podcastId: number; title: string; count: number }[];
}

export const HISTORY_LIMIT = 50;
export const FAVORITES_LIMIT = 100;
export const TOP_PODCASTS_LIMIT = 5;

export type PipelineRepository = PodcastRepository & PlaybackRepository & { load?(): Promise<void> };

export interface PipelineDependencies {
  logger?: Logger;
  repository?: PipelineRepository;
  resolver?: PodcastResolver;
  synchronizer?: EpisodeSynchronizer;
}

// 共有リンクの登録とエピソード更新の流れをまとめる
export class PodcastPipeline {
  private context: EngineContext;
  private repository: PipelineRepository;
  private resolver: PodcastResolver;
  private synchronizer: EpisodeSynchronizer;
  private logger: Logger;
  private isRefreshing = false;

  constructor(config: Config, deps: PipelineDependencies = {}) {
    this.logger = deps.logger ?? getLogger();
    this.context = createEngineContext({
      http: config.http,
      endpoints: config.platforms,
      logger: this.logger,
    });

    const feedExtractor = new FeedExtractor(this.context);
    const pageExtractor = new XiaoyuzhouPageExtractor(this.context);

    this.repository = deps.repository ?? new JsonStorage(config.storage.dataDir, this.logger);
    this.resolver =
      deps.resolver ??
      new PodcastResolver(this.context, createResolverRegistry(this.context, { feed: feedExtractor, page: pageExtractor }));
    this.synchronizer =
      deps.synchronizer ??
      new EpisodeSynchronizer({
        repository: this.repository,
        feedExtractor,
        pageExtractor,
        logger: this.logger,
      });
  }

  async initialize(): Promise<void> {
    await this.repository.load?.();
    this.logger.info('パイプラインを初期化しました');
  }

  // 保存せずに共有リンクを解析する
  async resolve(url: string): Promise<PodcastInfo> {
    return this.resolver.resolve(url);
  }

  async addPodcast(url: string): Promise<AddPodcastResult> {
    const info = await this.resolver.resolve(url);
    this.logger.info({ title: info.title, platform: info.platform }, 'ポッドキャストを解析しました');

    const { podcast, created } = await this.repository.getOrCreatePodcast(info);
    if (!created) {
      this.logger.info({ podcastId: podcast.id }, '登録済みのポッドキャストです');
      return { podcast, created };
    }

    const sync = await this.synchronizer.sync(podcast.id, info.feedUrl, info.episodes);
    return { podcast: await this.requirePodcast(podcast.id), created, sync };
  }

  async refreshPodcast(podcastId: number): Promise<RefreshResult> {
    const podcast = await this.requirePodcast(podcastId);

    // 小宇宙の番組ページから登録したものはページを取得し直す
    const url = isXiaoyuzhouPage(podcast.sourceUrl) ? podcast.sourceUrl : podcast.feedUrl;
    const sync = await this.synchronizer.sync(podcastId, url);

    return { podcast: await this.requirePodcast(podcastId), sync };
  }

  // 登録済みのポッドキャストを順番に更新する
  async refreshAll(): Promise<RefreshResult[]> {
    if (this.isRefreshing) {
      this.logger.warn('更新処理が既に実行中です');
      return [];
    }

    this.isRefreshing = true;
    try {
      const podcasts = await this.repository.listPodcasts();
      this.logger.info({ count: podcasts.length }, '全ポッドキャストの更新を開始');

      const results: RefreshResult[] = [];
      for (const podcast of podcasts) {
        try {
          results.push(await this.refreshPodcast(podcast.id));
        } catch (error) {
          this.logger.error({ podcastId: podcast.id, error: errorMessage(error) }, 'ポッドキャストの更新に失敗');
        }
      }

      const inserted = results.reduce((sum, r) => sum + r.sync.inserted, 0);
      this.logger.info({ count: results.length, inserted }, '全ポッドキャストの更新が完了');
      return results;
    } finally {
      this.isRefreshing = false;
    }
  }

  async removePodcast(podcastId: number): Promise<void> {
    const removed = await this.repository.deletePodcast(podcastId);
    if (!removed) {
      throw new PodcastNotFoundError(podcastId);
    }
  }

  async listPodcasts(): Promise<PodcastRecord[]> {
    return this.repository.listPodcasts();
  }

  async listEpisodes(podcastId: number): Promise<EpisodeRecord[]> {
    await this.requirePodcast(podcastId);
    return this.repository.listEpisodes(podcastId);
  }

  // 再生済みにして履歴に残し、再生に必要な情報を返す
  async playEpisode(episodeId: number): Promise<PlaybackTarget> {
    const history = await this.repository.recordPlay(episodeId);
    if (!history) {
      throw new EpisodeNotFoundError(episodeId);
    }

    const episode = await this.requireEpisode(episodeId);
    const podcast = await this.repository.getPodcast(episode.podcastId);
    this.logger.info({ episodeId, podcastId: episode.podcastId }, '再生を記録しました');

    return {
      episodeId,
      audioUrl: episode.audioUrl,
      title: episode.title,
      podcastTitle: podcast?.title ?? '',
      imageUrl: podcast?.imageUrl ?? '',
    };
  }

  async updateProgress(episodeId: number, progressSeconds: number): Promise<EpisodeRecord> {
    const progress = Number.isFinite(progressSeconds) ? Math.max(0, Math.floor(progressSeconds)) : 0;
    const episode = await this.repository.updateProgress(episodeId, progress);
    if (!episode) {
      throw new EpisodeNotFoundError(episodeId);
    }
    return episode;
  }

  // 新しい順
  async listHistory(limit = HISTORY_LIMIT): Promise<PlayHistoryEntry[]> {
    const history = await this.repository.listPlayHistory(limit);
    const entries: PlayHistoryEntry[] = [];
    for (const record of history) {
      const episode = await this.repository.getEpisode(record.episodeId);
      const podcast = await this.repository.getPodcast(record.podcastId);
      entries.push({ ...record, title: episode?.title ?? '', podcastTitle: podcast?.title ?? '' });
    }
    return entries;
  }

  async getStats(): Promise<PlaybackStats> {
    const totals = await this.repository.getPlayTotals(TOP_PODCASTS_LIMIT);

    const topPodcasts: PlaybackStats['topPodcasts'] = [];
    for (const { podcastId, count } of totals.topPodcasts) {
      const podcast = await this.repository.getPodcast(podcastId);
      if (podcast) {
        topPodcasts.push({ podcastId, title: podcast.title, count });
      }
    }

    return {
      totalPlays: totals.totalPlays,
      totalDurationSeconds: totals.totalDurationSeconds,
      totalDurationLabel: formatListeningTime(totals.totalDurationSeconds),
      topPodcasts,
    };
  }

  // 追加した場合はtrue、登録済みならfalse
  async addFavorite(podcastId: number): Promise<boolean> {
    await this.requirePodcast(podcastId);
    const { created } = await this.repository.addFavorite(podcastId);
    return created;
  }

  async removeFavorite(podcastId: number): Promise<boolean> {
    return this.repository.removeFavorite(podcastId);
  }

  async listFavorites(limit = FAVORITES_LIMIT): Promise<PodcastRecord[]> {
    const favorites = await this.repository.listFavorites(limit);
    const podcasts: PodcastRecord[] = [];
    for (const favorite of favorites) {
      const podcast = await this.repository.getPodcast(favorite.podcastId);
      if (podcast) {
        podcasts.push(podcast);
      }
    }
    return podcasts;
  }

  private async requireEpisode(episodeId: number): Promise<EpisodeRecord> {
    const episode = await this.repository.getEpisode(episodeId);
    if (!episode) {
      throw new EpisodeNotFoundError(episodeId);
    }
    return episode;
  }

  private async requirePodcast(podcastId: number): Promise<PodcastRecord> {
    const podcast = await this.repository.getPodcast(podcastId);
    if (!podcast) {
      throw new PodcastNotFoundError(podcastId);
    }
    return podcast;
  }
}
