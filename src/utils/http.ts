import type { Logger } from './logger.js';
import { errorMessage } from '../errors.js';

export const MOBILE_USER_AGENT =
  'Mozilla/5.0 (iPhone; CPU iPhone OS 14_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/14.0 Mobile/15E148 Safari/604.1';
export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface HttpRequestOptions {
  timeoutMs: number;
  userAgent?: string;
  accept?: string;
  logger: Logger;
}

export interface HttpResponse {
  status: number;
  url: string;
  body: string;
}

// GETしてUTF-8としてデコードした本文を返す
// 非2xxと通信エラーはnull（呼び出し側で「結果なし」として扱う）
export async function fetchText(url: string, options: HttpRequestOptions): Promise<HttpResponse | null> {
  const { timeoutMs, userAgent = DESKTOP_USER_AGENT, accept = '*/*', logger } = options;

  try {
    logger.debug({ url, timeoutMs }, 'HTTPリクエストを送信');

    const response = await fetch(url, {
      headers: {
        'User-Agent': userAgent,
        Accept: accept,
        'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
      },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      logger.warn({ url, status: response.status }, 'HTTPリクエスト失敗');
      return null;
    }

    // Content-Typeのcharsetに関わらずUTF-8で読む
    const buffer = await response.arrayBuffer();
    const body = new TextDecoder('utf-8').decode(buffer);

    return { status: response.status, url, body };
  } catch (error) {
    logger.warn({ url, error: errorMessage(error) }, 'HTTPリクエストでエラーが発生');
    return null;
  }
}
