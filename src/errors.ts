export type PodcastHubErrorCode =
  | 'UNSUPPORTED_PLATFORM'
  | 'MALFORMED_PLATFORM_ID'
  | 'UPSTREAM_FETCH_FAILURE'
  | 'UPSTREAM_PARSE_FAILURE'
  | 'PODCAST_NOT_FOUND'
  | 'EPISODE_NOT_FOUND';

// 呼び出し側に返すエラーの基底クラス
export class PodcastHubError extends Error {
  readonly code: PodcastHubErrorCode;

  constructor(code: PodcastHubErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// 対応していないプラットフォームのリンク
export class UnsupportedPlatformError extends PodcastHubError {
  readonly url: string;

  constructor(url: string) {
    super('UNSUPPORTED_PLATFORM', `不支持的平台: ${url}`);
    this.url = url;
  }
}

// リンクからプラットフォーム固有のIDを取り出せなかった
export class MalformedPlatformIdError extends PodcastHubError {
  readonly url: string;
  readonly platform: string;

  constructor(platform: string, url: string) {
    super('MALFORMED_PLATFORM_ID', `无法解析 ${platform} 链接: ${url}`);
    this.platform = platform;
    this.url = url;
  }
}

export class UpstreamFetchError extends PodcastHubError {
  readonly url: string;

  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super('UPSTREAM_FETCH_FAILURE', `上游请求失败 (${reason}): ${url}`, options);
    this.url = url;
  }
}

// フォールバック判定用。呼び出し側には伝播させない
export class UpstreamParseError extends PodcastHubError {
  constructor(what: string, options?: { cause?: unknown }) {
    super('UPSTREAM_PARSE_FAILURE', `解析失败: ${what}`, options);
  }
}

export class PodcastNotFoundError extends PodcastHubError {
  readonly podcastId: number;

  constructor(podcastId: number) {
    super('PODCAST_NOT_FOUND', `Podcast not found: ${podcastId}`);
    this.podcastId = podcastId;
  }
}

export class EpisodeNotFoundError extends PodcastHubError {
  readonly episodeId: number;

  constructor(episodeId: number) {
    super('EPISODE_NOT_FOUND', `Episode not found: ${episodeId}`);
    this.episodeId = episodeId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
