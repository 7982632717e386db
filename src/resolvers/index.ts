import type { EngineContext } from '../platforms/context.js';
import { detectPlatform, type KnownPlatformTag } from '../platforms/detector.js';
import { FeedExtractor } from '../extractors/feed.js';
import { XiaoyuzhouPageExtractor } from '../extractors/xiaoyuzhou-page.js';
import { UnsupportedPlatformError } from '../errors.js';
import { XiaoyuzhouResolver } from './xiaoyuzhou.js';
import { NeteaseResolver } from './netease.js';
import { AppleResolver } from './apple.js';
import { SpotifyResolver } from './spotify.js';
import { RSSResolver } from './rss.js';
import type { PodcastInfo, Resolver } from './types.js';

// プラットフォームごとに1つのリゾルバー
export type ResolverRegistry = { readonly [P in KnownPlatformTag]: Resolver & { readonly platform: P } };

export function createResolverRegistry(
  context: EngineContext,
  extractors: { feed?: FeedExtractor; page?: XiaoyuzhouPageExtractor } = {}
): ResolverRegistry {
  const feedExtractor = extractors.feed ?? new FeedExtractor(context);
  const pageExtractor = extractors.page ?? new XiaoyuzhouPageExtractor(context);

  return {
    xiaoyuzhou: new XiaoyuzhouResolver(context, pageExtractor),
    netease: new NeteaseResolver(context),
    apple: new AppleResolver(context),
    spotify: new SpotifyResolver(context),
    rss: new RSSResolver(context, feedExtractor),
  };
}

// 共有リンクを判定し、対応するリゾルバーに処理を渡す
export class PodcastResolver {
  private context: EngineContext;
  private registry: ResolverRegistry;

  constructor(context: EngineContext, registry: ResolverRegistry = createResolverRegistry(context)) {
    this.context = context;
    this.registry = registry;
  }

  async resolve(url: string): Promise<PodcastInfo> {
    const platform = detectPlatform(url);
    if (platform === 'unknown') {
      this.context.logger.warn({ url }, '対応していないプラットフォームです');
      throw new UnsupportedPlatformError(url);
    }

    this.context.logger.debug({ url, platform }, '共有リンクを解析中');
    return this.registry[platform].resolve(url);
  }
}

export { createPodcastInfo, type PodcastInfo, type Resolver } from './types.js';
export { XiaoyuzhouResolver } from './xiaoyuzhou.js';
export { NeteaseResolver, extractNeteaseId } from './netease.js';
export { AppleResolver, extractAppleId } from './apple.js';
export { SpotifyResolver, SPOTIFY_UNSUPPORTED_DESCRIPTION } from './spotify.js';
export { RSSResolver, resolveCoverImage, COVER_IMAGE_STRATEGIES, type CoverImageStrategy } from './rss.js';
