import Parser from 'rss-parser';
import { z } from 'zod';
import { createEpisodeEntry, type EpisodeEntry } from './types.js';
import type { EngineContext } from '../platforms/context.js';
import { fetchText } from '../utils/http.js';
import { parseDuration } from '../utils/duration.js';
import { errorMessage } from '../errors.js';

interface FeedFields {
  author?: unknown;          // RSSは文字列、Atomは <author><name> の入れ子
  managingEditor?: unknown;
}

interface ItemFields {
  itunesDuration?: string | number;
  links?: unknown[];         // <link> 要素をすべて（Atomのエンクロージャー用）
}

export type ParsedFeed = FeedFields & Parser.Output<ItemFields>;
export type ParsedFeedItem = ParsedFeed['items'][number];

// 取得したフィードと元のXML（カバー画像のマークアップ走査に使う）
export interface FetchedFeed {
  xml: string;
  feed: ParsedFeed;
}

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8';

const linkSchema = z.object({
  $: z.object({ rel: z.string().optional(), href: z.string().optional() }).passthrough(),
});

// Atom は <link rel="enclosure" href="..."> で音声を示す
export function atomEnclosureUrl(links: readonly unknown[] | undefined): string | undefined {
  for (const link of links ?? []) {
    const parsed = linkSchema.safeParse(link);
    if (parsed.success && parsed.data.$.rel === 'enclosure' && parsed.data.$.href) {
      return parsed.data.$.href;
    }
  }
  return undefined;
}

export function toEpisodeEntry(item: ParsedFeedItem): EpisodeEntry {
  const rawDuration =
    typeof item.itunesDuration === 'string' || typeof item.itunesDuration === 'number'
      ? item.itunesDuration
      : undefined;

  return createEpisodeEntry({
    title: item.title,
    description: item.content ?? item.summary,
    // エンクロージャーがない場合は空文字
    audioUrl: item.enclosure?.url || atomEnclosureUrl(item.links),
    durationSeconds: parseDuration(rawDuration),
    rawPubDate: item.pubDate ?? item.isoDate,
  });
}

export class FeedExtractor {
  private context: EngineContext;
  private parser: Parser<FeedFields, ItemFields>;

  constructor(context: EngineContext) {
    this.context = context;
    this.parser = new Parser<FeedFields, ItemFields>({
      customFields: {
        feed: ['author', 'managingEditor'],
        item: [
          ['itunes:duration', 'itunesDuration'],
          ['link', 'links', { keepArray: true }],
        ],
      },
    });
  }

  async fetchFeed(feedUrl: string): Promise<FetchedFeed | null> {
    const { http, logger } = this.context;

    const response = await fetchText(feedUrl, {
      timeoutMs: http.pageTimeoutMs,
      userAgent: http.desktopUserAgent,
      accept: FEED_ACCEPT,
      logger,
    });
    if (!response) {
      return null;
    }

    try {
      const feed = await this.parser.parseString(response.body);
      return { xml: response.body, feed };
    } catch (error) {
      logger.error({ feedUrl, error: errorMessage(error) }, 'フィードの解析に失敗');
      return null;
    }
  }

  // 取得・解析に失敗した場合は空配列
  async listEpisodes(feedUrl: string): Promise<EpisodeEntry[]> {
    const { logger } = this.context;
    logger.debug({ feedUrl }, 'フィードからエピソードを取得中');

    const fetched = await this.fetchFeed(feedUrl);
    if (!fetched) {
      return [];
    }

    const episodes = (fetched.feed.items ?? []).map(toEpisodeEntry);
    logger.info({ feedUrl, count: episodes.length }, 'フィードからエピソードを取得');
    return episodes;
  }
}
