import { parseHTML } from 'linkedom';
import { z } from 'zod';
import { createEpisodeEntry, type EpisodeEntry } from './types.js';
import type { EngineContext } from '../platforms/context.js';
import { fetchText } from '../utils/http.js';
import { parseDuration } from '../utils/duration.js';
import { displayName } from '../utils/names.js';
import type { Logger } from '../utils/logger.js';
import { UpstreamParseError, errorMessage } from '../errors.js';

export const UNKNOWN_PODCAST_TITLE = '未知播客';

const SHOW_SCHEMA_SELECTOR = 'script[name="schema:podcast-show"]';
const SHOW_SCHEMA_OPEN_TAG = /<script[^>]*name="schema:podcast-show"/;
const SCRIPT_CLOSE_TAG = '</script>';

const AUDIO_URL_PATTERN = /"(https:\/\/media\.xyzcdn\.net\/[^"]+\.m4a[^"]*)"/g;
const SHOW_TITLE_PATTERN = /"title":"([^"]{5,100})"/;
const SHOW_AUTHOR_PATTERN = /"author":"([^"]*)"/;
const QUOTED_TITLE_PATTERN = /"title":"([^"]*)"/g;
const PODCAST_ID_PATTERN = /"podcast":\{"[^}]*"pid":"([a-zA-Z0-9]+)"/;

type PageDocument = ReturnType<typeof parseHTML>['document'];

// 抽出戦略に渡すページ（生のHTMLとパース済みDOM）
export interface PageSource {
  html: string;
  document: PageDocument;
}

export interface PageExtraction {
  title: string;
  author: string;
  episodes: EpisodeEntry[];
}

// 同じページに対する独立した抽出方法。適用できなければnullを返す
export interface PageExtractionStrategy {
  name: string;
  extract(page: PageSource, logger: Logger): PageExtraction | null;
}

export interface XiaoyuzhouPage extends PageExtraction {
  imageUrl: string;
  podcastId: string | null;
  strategy: string | null;
}

// schema:podcast-show の workExample 要素
const workExampleSchema = z
  .object({
    '@type': z.string().optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    duration: z.string().optional(),
    datePublished: z.string().optional(),
  })
  .passthrough();

// name と author の形は問わない（文字列・Person・その配列）。エピソード一覧だけは配列を要求する
const showSchema = z
  .object({
    name: z.unknown(),
    author: z.unknown(),
    workExample: z.array(z.unknown()).optional(),
  })
  .passthrough();

// 音声URLを出現順に重複なく抽出
export function extractAudioUrls(text: string): string[] {
  const urls = new Set<string>();
  for (const match of text.matchAll(AUDIO_URL_PATTERN)) {
    const url = match[1];
    if (url) {
      urls.add(url);
    }
  }
  return [...urls];
}

// 構造化データブロックの</script>より後ろのテキスト
export function textAfterShowSchema(html: string): string {
  const start = html.search(SHOW_SCHEMA_OPEN_TAG);
  if (start < 0) {
    return '';
  }
  const end = html.indexOf(SCRIPT_CLOSE_TAG, start);
  return end < 0 ? '' : html.slice(end + SCRIPT_CLOSE_TAG.length);
}

// i番目のエピソードオブジェクトとi番目の音声URLを対応付ける
// どちらかが尽きた時点で終了する。AudioObject以外の要素は位置だけ消費する
export function pairEpisodesWithAudio(examples: readonly unknown[], audioUrls: readonly string[]): EpisodeEntry[] {
  const episodes: EpisodeEntry[] = [];
  const limit = Math.min(examples.length, audioUrls.length);

  for (let i = 0; i < limit; i++) {
    const parsed = workExampleSchema.safeParse(examples[i]);
    const audioUrl = audioUrls[i];
    if (!parsed.success || parsed.data['@type'] !== 'AudioObject' || audioUrl === undefined) {
      continue;
    }

    episodes.push(
      createEpisodeEntry({
        title: parsed.data.name,
        description: parsed.data.description,
        audioUrl,
        durationSeconds: parseDuration(parsed.data.duration),
        rawPubDate: parsed.data.datePublished,
      })
    );
  }

  return episodes;
}

function readShowSchema(document: PageDocument): z.infer<typeof showSchema> | null {
  const raw = document.querySelector(SHOW_SCHEMA_SELECTOR)?.textContent;
  if (!raw || !raw.trim()) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new UpstreamParseError('schema:podcast-show', { cause: error });
  }

  const parsed = showSchema.safeParse(json);
  if (!parsed.success) {
    throw new UpstreamParseError('schema:podcast-show', { cause: parsed.error });
  }
  return parsed.data;
}

export const showSchemaStrategy: PageExtractionStrategy = {
  name: 'schema:podcast-show',
  extract({ html, document }, logger) {
    let schema: z.infer<typeof showSchema> | null;
    try {
      schema = readShowSchema(document);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, '構造化データの解析に失敗');
      return null;
    }
    if (!schema) {
      return null;
    }

    // ページの他の場所にあるURLを拾わないよう、ブロックの後ろだけを走査する
    const audioUrls = extractAudioUrls(textAfterShowSchema(html));
    const examples = schema.workExample ?? [];

    if (examples.length !== audioUrls.length) {
      logger.debug(
        { examples: examples.length, audioUrls: audioUrls.length },
        'エピソード数と音声URL数が一致しないため、短い方に合わせます'
      );
    }

    return {
      title: displayName(schema.name),
      author: displayName(schema.author),
      episodes: pairEpisodesWithAudio(examples, audioUrls),
    };
  },
};

// 各音声URLの直前に現れる "title" をエピソード名とする
function scanEpisodes(html: string): EpisodeEntry[] {
  const titles = [...html.matchAll(QUOTED_TITLE_PATTERN)].map((m) => ({ index: m.index ?? 0, value: m[1] ?? '' }));
  const seen = new Set<string>();
  const episodes: EpisodeEntry[] = [];

  for (const match of html.matchAll(AUDIO_URL_PATTERN)) {
    const audioUrl = match[1];
    if (!audioUrl || seen.has(audioUrl)) {
      continue;
    }
    seen.add(audioUrl);

    const position = match.index ?? 0;
    let title = '';
    for (const candidate of titles) {
      if (candidate.index >= position) break;
      title = candidate.value;
    }

    episodes.push(createEpisodeEntry({ title, audioUrl }));
  }

  return episodes;
}

export const patternScanStrategy: PageExtractionStrategy = {
  name: 'pattern-scan',
  extract({ html }) {
    return {
      title: html.match(SHOW_TITLE_PATTERN)?.[1] ?? UNKNOWN_PODCAST_TITLE,
      author: html.match(SHOW_AUTHOR_PATTERN)?.[1] ?? '',
      episodes: scanEpisodes(html),
    };
  },
};

export const DEFAULT_PAGE_STRATEGIES: readonly PageExtractionStrategy[] = [showSchemaStrategy, patternScanStrategy];

// エピソードが得られた最初の戦略の結果を採用する
// どの戦略でもエピソードが得られなければ、最後に結果を返した戦略を使う
export function runPageStrategies(
  page: PageSource,
  strategies: readonly PageExtractionStrategy[],
  logger: Logger
): { extraction: PageExtraction; strategy: string | null } {
  let fallback: { extraction: PageExtraction; strategy: string | null } = {
    extraction: { title: UNKNOWN_PODCAST_TITLE, author: '', episodes: [] },
    strategy: null,
  };

  for (const strategy of strategies) {
    const extraction = strategy.extract(page, logger);
    if (!extraction) {
      logger.debug({ strategy: strategy.name }, '抽出戦略が適用できませんでした');
      continue;
    }
    if (extraction.episodes.length > 0) {
      return { extraction, strategy: strategy.name };
    }
    logger.debug({ strategy: strategy.name }, '抽出戦略でエピソードが見つかりませんでした');
    fallback = { extraction, strategy: strategy.name };
  }

  return fallback;
}

export class XiaoyuzhouPageExtractor {
  private context: EngineContext;
  private strategies: readonly PageExtractionStrategy[];

  constructor(context: EngineContext, strategies: readonly PageExtractionStrategy[] = DEFAULT_PAGE_STRATEGIES) {
    this.context = context;
    this.strategies = strategies;
  }

  async fetchPage(pageUrl: string): Promise<string | null> {
    const { http, logger } = this.context;
    const response = await fetchText(pageUrl, {
      timeoutMs: http.pageTimeoutMs,
      userAgent: http.mobileUserAgent,
      accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      logger,
    });
    return response?.body ?? null;
  }

  extractPage(html: string): XiaoyuzhouPage {
    const { logger } = this.context;
    const { document } = parseHTML(html);
    const { extraction, strategy } = runPageStrategies({ html, document }, this.strategies, logger);

    const imageUrl = document.querySelector('meta[property="og:image"]')?.getAttribute('content') ?? '';
    const podcastId = html.match(PODCAST_ID_PATTERN)?.[1] ?? null;

    logger.debug(
      { strategy, episodes: extraction.episodes.length, podcastId },
      '小宇宙ページを解析しました'
    );

    return { ...extraction, imageUrl, podcastId, strategy };
  }

  // 番組ページを取得し直してエピソードだけを返す
  async listEpisodesFromPage(pageUrl: string): Promise<EpisodeEntry[]> {
    const { logger } = this.context;

    const html = await this.fetchPage(pageUrl);
    if (html === null) {
      return [];
    }

    try {
      const { episodes } = this.extractPage(html);
      logger.info({ pageUrl, count: episodes.length }, '小宇宙ページからエピソードを取得');
      return episodes;
    } catch (error) {
      logger.error({ pageUrl, error: errorMessage(error) }, '小宇宙ページの解析に失敗');
      return [];
    }
  }
}
