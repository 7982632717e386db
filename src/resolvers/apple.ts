import { z } from 'zod';
import type { EngineContext } from '../platforms/context.js';
import { fetchText } from '../utils/http.js';
import { MalformedPlatformIdError, UpstreamFetchError } from '../errors.js';
import { createPodcastInfo, type PodcastInfo, type Resolver } from './types.js';

/**
 * iTunes Lookup API のレスポンス（podcastエンティティ）
 */
const lookupResultSchema = z
  .object({
    collectionName: z.string().optional(),
    artistName: z.string().optional(),
    artistViewUrl: z.string().optional(),
    artworkUrl600: z.string().optional(),
    feedUrl: z.string().optional(),
    primaryGenreName: z.string().optional(),
  })
  .passthrough();

const lookupResponseSchema = z.object({
  resultCount: z.number().optional(),
  results: z.array(lookupResultSchema).default([]),
});

export type AppleLookupResult = z.infer<typeof lookupResultSchema>;

const APPLE_ID_PATTERN = /\/id(\d+)/;

// https://podcasts.apple.com/cn/podcast/some-show/id1234567890
// スキームのない共有リンクはURLとして解析できないため、文字列全体から探す
export function extractAppleId(url: string): string | null {
  let target: string;
  try {
    target = new URL(url).pathname;
  } catch {
    target = url;
  }
  return target.match(APPLE_ID_PATTERN)?.[1] ?? null;
}

export class AppleResolver implements Resolver {
  readonly platform = 'apple';

  private context: EngineContext;

  constructor(context: EngineContext) {
    this.context = context;
  }

  /**
   * ディレクトリAPIで番組情報を引く
   *
   * メタデータを一切得られない場合（通信失敗・検索結果0件）は UpstreamFetchError
   */
  async resolve(url: string): Promise<PodcastInfo> {
    const { endpoints, http, logger } = this.context;

    const id = extractAppleId(url);
    if (!id) {
      throw new MalformedPlatformIdError('Apple Podcasts', url);
    }

    const lookupUrl = `${endpoints.appleLookupUrl}?id=${id}&entity=podcast`;
    const response = await fetchText(lookupUrl, {
      timeoutMs: http.lookupTimeoutMs,
      userAgent: http.desktopUserAgent,
      accept: 'application/json',
      logger,
    });
    if (!response) {
      throw new UpstreamFetchError(lookupUrl, 'lookup request failed');
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (error) {
      throw new UpstreamFetchError(lookupUrl, 'invalid JSON', { cause: error });
    }

    const parsed = lookupResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamFetchError(lookupUrl, 'unexpected response', { cause: parsed.error });
    }

    const [info] = parsed.data.results;
    if (!info) {
      throw new UpstreamFetchError(lookupUrl, 'no results');
    }

    logger.debug({ id, collectionName: info.collectionName }, 'Apple Podcastsの番組情報を取得');

    return createPodcastInfo({
      platform: this.platform,
      title: info.collectionName || 'Apple 播客',
      description: info.artistViewUrl ?? '',
      imageUrl: info.artworkUrl600 ?? '',
      // フィードURLがない番組は共有リンクで代用する
      feedUrl: info.feedUrl || url,
      sourceUrl: url,
      author: info.artistName ?? '',
      category: info.primaryGenreName || 'Apple',
      episodeCount: 0,
    });
  }
}
