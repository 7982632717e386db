import type { EngineContext } from '../platforms/context.js';
import { toEpisodeEntry, type FeedExtractor, type ParsedFeed } from '../extractors/feed.js';
import { errorMessage } from '../errors.js';
import { displayName } from '../utils/names.js';
import { createPodcastInfo, type PodcastInfo, type Resolver } from './types.js';

const CATEGORY = 'RSS';
const MAX_DESCRIPTION_LENGTH = 500;
const IMAGE_EXTENSIONS = /\.(jpe?g|png|webp)$/i;

export interface CoverImageSource {
  url: string;
  feed: ParsedFeed;
  xml: string;
}

// カバー画像の取得方法。見つからなければnull
export type CoverImageStrategy = (source: CoverImageSource) => string | null;

export const fromFeedImage: CoverImageStrategy = ({ feed }) => {
  const url = feed.image?.url;
  return typeof url === 'string' && url.trim() ? url.trim() : null;
};

export const fromItunesImageTag: CoverImageStrategy = ({ xml }) => {
  const href = xml.match(/<itunes:image[^>]*href="([^"]+)"/i)?.[1];
  if (!href) {
    return null;
  }
  // 拡張子のない画像URLには .png を付ける
  return IMAGE_EXTENSIONS.test(href) ? href : `${href}.png`;
};

export const fromChannelImageTag: CoverImageStrategy = ({ xml }) => {
  const url = xml.match(/<image[^>]*>\s*<url>([^<]+)<\/url>/i)?.[1]?.trim();
  return url || null;
};

// xyzfm系のミラーのみ: URL中の番組IDから画像URLを組み立てる
export const fromXyzfmPodcastId: CoverImageStrategy = ({ url }) => {
  if (!url.includes('xyzfm')) {
    return null;
  }
  const pid = url.match(/\/podcast\/([a-zA-Z0-9]+)/)?.[1];
  return pid ? `https://image.xyzcdn.net/common/${pid.slice(0, 2)}/${pid}.jpg` : null;
};

export const COVER_IMAGE_STRATEGIES: readonly CoverImageStrategy[] = [
  fromFeedImage,
  fromItunesImageTag,
  fromChannelImageTag,
  fromXyzfmPodcastId,
];

export function resolveCoverImage(
  source: CoverImageSource,
  strategies: readonly CoverImageStrategy[] = COVER_IMAGE_STRATEGIES
): string {
  for (const strategy of strategies) {
    const imageUrl = strategy(source);
    if (imageUrl) {
      return imageUrl;
    }
  }
  return '';
}

export class RSSResolver implements Resolver {
  readonly platform = 'rss';

  private context: EngineContext;
  private feedExtractor: FeedExtractor;

  constructor(context: EngineContext, feedExtractor: FeedExtractor) {
    this.context = context;
    this.feedExtractor = feedExtractor;
  }

  async resolve(url: string): Promise<PodcastInfo> {
    const { logger } = this.context;

    const fetched = await this.feedExtractor.fetchFeed(url);
    if (!fetched) {
      logger.warn({ url }, 'RSSを取得できなかったため、最低限の情報を返します');
      return this.stub(url);
    }

    try {
      const { feed, xml } = fetched;
      const episodes = (feed.items ?? []).map(toEpisodeEntry);
      const description = feed.description ?? '';

      logger.info({ url, title: feed.title, episodes: episodes.length }, 'RSSフィードを解析しました');

      return createPodcastInfo({
        platform: this.platform,
        title: feed.title?.trim() || '未知播客',
        description: description.slice(0, MAX_DESCRIPTION_LENGTH),
        imageUrl: resolveCoverImage({ url, feed, xml }),
        feedUrl: url,
        sourceUrl: url,
        author: displayName(feed.itunes?.author) || displayName(feed.author) || displayName(feed.managingEditor),
        category: CATEGORY,
        episodeCount: episodes.length,
        episodes,
      });
    } catch (error) {
      logger.error({ url, error: errorMessage(error) }, 'RSSフィードの解析に失敗');
      return this.stub(url);
    }
  }

  private stub(url: string): PodcastInfo {
    return createPodcastInfo({
      platform: this.platform,
      title: 'RSS 播客',
      feedUrl: url,
      sourceUrl: url,
      category: CATEGORY,
      episodeCount: 0,
    });
  }
}
