import type { EngineContext } from '../platforms/context.js';
import { UNKNOWN_PODCAST_TITLE, type XiaoyuzhouPageExtractor } from '../extractors/xiaoyuzhou-page.js';
import { errorMessage } from '../errors.js';
import { createPodcastInfo, type PodcastInfo, type Resolver } from './types.js';

const CATEGORY = '小宇宙';

export class XiaoyuzhouResolver implements Resolver {
  readonly platform = 'xiaoyuzhou';

  private context: EngineContext;
  private pageExtractor: XiaoyuzhouPageExtractor;

  constructor(context: EngineContext, pageExtractor: XiaoyuzhouPageExtractor) {
    this.context = context;
    this.pageExtractor = pageExtractor;
  }

  async resolve(url: string): Promise<PodcastInfo> {
    const { endpoints, logger } = this.context;

    const html = await this.pageExtractor.fetchPage(url);
    if (html === null) {
      logger.warn({ url }, '小宇宙ページを取得できなかったため、最低限の情報を返します');
      return this.stub(url);
    }

    try {
      const page = this.pageExtractor.extractPage(html);
      // 番組IDが取れなければ共有リンクをそのままフィードとして扱う
      const feedUrl = page.podcastId ? `${endpoints.xiaoyuzhouFeedBase}${page.podcastId}` : url;

      logger.info(
        { url, title: page.title, episodes: page.episodes.length, strategy: page.strategy },
        '小宇宙の番組を解析しました'
      );

      return createPodcastInfo({
        platform: this.platform,
        title: page.title || UNKNOWN_PODCAST_TITLE,
        imageUrl: page.imageUrl,
        feedUrl,
        sourceUrl: url,
        author: page.author,
        category: CATEGORY,
        episodeCount: page.episodes.length,
        episodes: page.episodes,
      });
    } catch (error) {
      logger.error({ url, error: errorMessage(error) }, '小宇宙ページの解析に失敗');
      return this.stub(url);
    }
  }

  private stub(url: string): PodcastInfo {
    return createPodcastInfo({
      platform: this.platform,
      title: UNKNOWN_PODCAST_TITLE,
      feedUrl: url,
      sourceUrl: url,
      category: CATEGORY,
      episodeCount: 0,
    });
  }
}
