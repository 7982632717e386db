import { DESKTOP_USER_AGENT, MOBILE_USER_AGENT } from '../utils/http.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface HttpSettings {
  pageTimeoutMs: number;     // ページ・フィード取得
  lookupTimeoutMs: number;   // ディレクトリAPI
  mobileUserAgent: string;
  desktopUserAgent: string;
}

export interface PlatformEndpoints {
  xiaoyuzhouFeedBase: string;
  neteaseFeedBase: string;
  appleLookupUrl: string;
}

// 抽出エンジン・リゾルバーが共有する設定とロガー
export interface EngineContext {
  http: HttpSettings;
  endpoints: PlatformEndpoints;
  logger: Logger;
}

export const DEFAULT_HTTP_SETTINGS: HttpSettings = {
  pageTimeoutMs: 15000,
  lookupTimeoutMs: 10000,
  mobileUserAgent: MOBILE_USER_AGENT,
  desktopUserAgent: DESKTOP_USER_AGENT,
};

export const DEFAULT_PLATFORM_ENDPOINTS: PlatformEndpoints = {
  xiaoyuzhouFeedBase: 'https://feed.xiaoyuzhoufm.com/podcast/',
  neteaseFeedBase: 'https://podcastrx.netlify.app/feed/netease/',
  appleLookupUrl: 'https://itunes.apple.com/lookup',
};

export function createEngineContext(
  overrides: {
    http?: Partial<HttpSettings>;
    endpoints?: Partial<PlatformEndpoints>;
    logger?: Logger;
  } = {}
): EngineContext {
  return {
    http: { ...DEFAULT_HTTP_SETTINGS, ...overrides.http },
    endpoints: { ...DEFAULT_PLATFORM_ENDPOINTS, ...overrides.endpoints },
    logger: overrides.logger ?? getLogger(),
  };
}
