export const PLATFORM_TAGS = ['xiaoyuzhou', 'netease', 'apple', 'spotify', 'rss', 'unknown'] as const;

export type PlatformTag = (typeof PLATFORM_TAGS)[number];
export type KnownPlatformTag = Exclude<PlatformTag, 'unknown'>;

export interface PlatformRule {
  platform: KnownPlatformTag;
  matches(url: string): boolean;
}

// URL中にいずれかのドメインが含まれていれば一致
export function hostRule(platform: KnownPlatformTag, domains: readonly string[]): PlatformRule {
  return { platform, matches: (url) => domains.some((domain) => url.includes(domain)) };
}

const FEED_FILE_PATTERN = /\.(xml|rss|atom)$/i;
const FEED_SEGMENT_PATTERN = /\/(feed|rss)\/?$/i;

function parsePathname(url: string): string | null {
  try {
    return new URL(url).pathname;
  } catch {
    return null;
  }
}

// スキームなしの共有リンクは https を補って解析する
function pathnameOf(url: string): string | null {
  return parsePathname(url) ?? parsePathname(`https://${url}`);
}

// パスの末尾がフィードらしい場合のみ一致（/feedback や /rss-guide.html は対象外）
export function isFeedPath(url: string): boolean {
  const pathname = pathnameOf(url);
  return pathname !== null && (FEED_FILE_PATTERN.test(pathname) || FEED_SEGMENT_PATTERN.test(pathname));
}

// 上から順に評価し、最初に一致したプラットフォームを採用する
// フィードのホストはページのホストより先に置く（feed.xiaoyuzhoufm.com はRSS）
export const PLATFORM_RULES: readonly PlatformRule[] = [
  hostRule('rss', ['feed.xiaoyuzhoufm.com', 'feed.xyzfm.space', 'feeds.danlirencomedy.com', 'podcastrx.netlify.app']),
  hostRule('xiaoyuzhou', ['xiaoyuzhoufm.com', 'xyzfm.space']),
  hostRule('netease', ['music.163.com']),
  hostRule('apple', ['podcasts.apple.com']),
  hostRule('spotify', ['open.spotify.com']),
  { platform: 'rss', matches: isFeedPath },
];

export function detectPlatform(url: string, rules: readonly PlatformRule[] = PLATFORM_RULES): PlatformTag {
  for (const rule of rules) {
    if (rule.matches(url)) {
      return rule.platform;
    }
  }
  return 'unknown';
}

export function isKnownPlatform(tag: PlatformTag): tag is KnownPlatformTag {
  return tag !== 'unknown';
}

// 小宇宙の番組ページ（フィードではない）かどうか
export function isXiaoyuzhouPage(url: string): boolean {
  return detectPlatform(url) === 'xiaoyuzhou';
}
