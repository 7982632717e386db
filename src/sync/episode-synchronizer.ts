import type { EpisodeEntry } from '../extractors/types.js';
import type { FeedExtractor } from '../extractors/feed.js';
import type { XiaoyuzhouPageExtractor } from '../extractors/xiaoyuzhou-page.js';
import { isXiaoyuzhouPage } from '../platforms/detector.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import type { PodcastRepository } from './repository.js';

// 並び順は公開日時から決めるため、フィード上の位置は保存しない
export const PLACEHOLDER_EPISODE_NUM = 0;

export type BatchSource = 'prefetched' | 'feed' | 'page';

export interface SyncResult {
  podcastId: number;
  source: BatchSource | null;
  fetched: number;   // 保存した episodeCount と同じ値（件数の保存前に失敗した場合は0）
  inserted: number;
  skipped: number;
  error?: string;
}

export interface EpisodeSynchronizerOptions {
  repository: PodcastRepository;
  feedExtractor: Pick<FeedExtractor, 'listEpisodes'>;
  pageExtractor: Pick<XiaoyuzhouPageExtractor, 'listEpisodesFromPage'>;
  logger?: Logger;
  now?: () => Date;
}

// 公開日時を解析。空・不正な値は現在時刻
export function parsePubDate(raw: string | undefined, now: () => Date = () => new Date()): Date {
  if (!raw || !raw.trim()) {
    return now();
  }
  const time = Date.parse(raw.trim());
  return Number.isNaN(time) ? now() : new Date(time);
}

export class EpisodeSynchronizer {
  private repository: PodcastRepository;
  private feedExtractor: Pick<FeedExtractor, 'listEpisodes'>;
  private pageExtractor: Pick<XiaoyuzhouPageExtractor, 'listEpisodesFromPage'>;
  private logger: Logger;
  private now: () => Date;
  private lock = new KeyedLock();

  constructor(options: EpisodeSynchronizerOptions) {
    this.repository = options.repository;
    this.feedExtractor = options.feedExtractor;
    this.pageExtractor = options.pageExtractor;
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 取得したエピソードを保存済みの集合にマージする
   *
   * 同じポッドキャストの同期は直列に実行される。例外は外に出さず、失敗時は0件として扱う
   */
  async sync(podcastId: number, feedUrl: string, prefetched?: readonly EpisodeEntry[]): Promise<SyncResult> {
    return this.lock.runExclusive(String(podcastId), () => this.syncExclusive(podcastId, feedUrl, prefetched));
  }

  private async syncExclusive(
    podcastId: number,
    feedUrl: string,
    prefetched?: readonly EpisodeEntry[]
  ): Promise<SyncResult> {
    let storedCount = 0;
    try {
      const { entries, source } = await this.loadBatch(feedUrl, prefetched);

      // 保存済みの件数ではなく、今回取得したフィードの件数を記録する
      await this.repository.updateEpisodeCount(podcastId, entries.length);
      storedCount = entries.length;

      const knownUrls = new Set(await this.repository.listAudioUrls(podcastId));
      let inserted = 0;

      for (const entry of entries) {
        if (knownUrls.has(entry.audioUrl)) {
          continue;
        }

        await this.repository.insertEpisode({
          podcastId,
          title: entry.title,
          description: entry.description,
          audioUrl: entry.audioUrl,
          durationSeconds: entry.durationSeconds,
          pubDate: parsePubDate(entry.rawPubDate, this.now),
          episodeNum: PLACEHOLDER_EPISODE_NUM,
        });
        // 同じバッチ内で同じURLが繰り返されても1件だけ保存する
        knownUrls.add(entry.audioUrl);
        inserted++;
      }

      this.logger.info({ podcastId, source, count: entries.length, inserted }, 'エピソードを同期しました');

      return { podcastId, source, fetched: entries.length, inserted, skipped: entries.length - inserted };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ podcastId, feedUrl, error: message }, 'エピソードの同期に失敗');
      return { podcastId, source: null, fetched: storedCount, inserted: 0, skipped: 0, error: message };
    }
  }

  private async loadBatch(
    feedUrl: string,
    prefetched?: readonly EpisodeEntry[]
  ): Promise<{ entries: readonly EpisodeEntry[]; source: BatchSource }> {
    if (prefetched && prefetched.length > 0) {
      return { entries: prefetched, source: 'prefetched' };
    }
    if (isXiaoyuzhouPage(feedUrl)) {
      return { entries: await this.pageExtractor.listEpisodesFromPage(feedUrl), source: 'page' };
    }
    return { entries: await this.feedExtractor.listEpisodes(feedUrl), source: 'feed' };
  }
}
