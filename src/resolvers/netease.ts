import type { EngineContext } from '../platforms/context.js';
import { MalformedPlatformIdError } from '../errors.js';
import { createPodcastInfo, type PodcastInfo, type Resolver } from './types.js';

// ?id=123 / /djradio/123 の2形式
const ID_PATTERNS = [/[?&]id=(\d+)/, /\/djradio\/(\d+)/];

export function extractNeteaseId(url: string): string | null {
  for (const pattern of ID_PATTERNS) {
    const id = url.match(pattern)?.[1];
    if (id) {
      return id;
    }
  }
  return null;
}

// URLだけで完結する。エピソードは後で第三者のRSSから取得する
export class NeteaseResolver implements Resolver {
  readonly platform = 'netease';

  private context: EngineContext;

  constructor(context: EngineContext) {
    this.context = context;
  }

  async resolve(url: string): Promise<PodcastInfo> {
    const id = extractNeteaseId(url);
    if (!id) {
      throw new MalformedPlatformIdError('网易云', url);
    }

    const feedUrl = `${this.context.endpoints.neteaseFeedBase}${id}`;
    this.context.logger.debug({ url, id, feedUrl }, '网易云のフィードURLを生成');

    return createPodcastInfo({
      platform: this.platform,
      title: '网易云播客',
      feedUrl,
      sourceUrl: url,
      category: '网易云',
      episodeCount: 0,
    });
  }
}
