import type { EpisodeEntry } from '../extractors/types.js';
import type { KnownPlatformTag } from '../platforms/detector.js';

// リゾルバーが返すポッドキャスト情報（永続化はしない）
export interface PodcastInfo {
  readonly platform: KnownPlatformTag;
  readonly title: string;
  readonly description: string;
  readonly imageUrl: string;
  readonly feedUrl: string;     // 機械的に取得可能なフィードURL
  readonly sourceUrl: string;   // 元の共有リンク
  readonly author: string;
  readonly category: string;
  readonly episodeCount: number; // 今回の取得で見えたエピソード数
  readonly episodes?: readonly EpisodeEntry[];
}

export interface Resolver {
  readonly platform: KnownPlatformTag;
  resolve(url: string): Promise<PodcastInfo>;
}

export function createPodcastInfo(
  fields: Pick<PodcastInfo, 'platform' | 'title' | 'feedUrl' | 'sourceUrl' | 'category'> &
    Partial<Omit<PodcastInfo, 'platform' | 'title' | 'feedUrl' | 'sourceUrl' | 'category'>>
): PodcastInfo {
  const episodes = fields.episodes ? Object.freeze([...fields.episodes]) : undefined;
  return Object.freeze({
    platform: fields.platform,
    title: fields.title,
    description: fields.description ?? '',
    imageUrl: fields.imageUrl ?? '',
    feedUrl: fields.feedUrl,
    sourceUrl: fields.sourceUrl,
    author: fields.author ?? '',
    category: fields.category,
    episodeCount: fields.episodeCount ?? episodes?.length ?? 0,
    ...(episodes ? { episodes } : {}),
  });
}
