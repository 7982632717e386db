import { z } from 'zod';
import { DEFAULT_HTTP_SETTINGS, DEFAULT_PLATFORM_ENDPOINTS } from '../platforms/context.js';

// HTTP設定（タイムアウトはミリ秒）
const httpSchema = z.object({
  pageTimeoutMs: z.number().int().positive().default(DEFAULT_HTTP_SETTINGS.pageTimeoutMs),
  lookupTimeoutMs: z.number().int().positive().default(DEFAULT_HTTP_SETTINGS.lookupTimeoutMs),
  mobileUserAgent: z.string().min(1).default(DEFAULT_HTTP_SETTINGS.mobileUserAgent),
  desktopUserAgent: z.string().min(1).default(DEFAULT_HTTP_SETTINGS.desktopUserAgent),
});

// プラットフォームごとのフィードURLテンプレート
const platformsSchema = z.object({
  xiaoyuzhouFeedBase: z.string().url().default(DEFAULT_PLATFORM_ENDPOINTS.xiaoyuzhouFeedBase),
  neteaseFeedBase: z.string().url().default(DEFAULT_PLATFORM_ENDPOINTS.neteaseFeedBase),
  appleLookupUrl: z.string().url().default(DEFAULT_PLATFORM_ENDPOINTS.appleLookupUrl),
});

// 定期更新の設定
const scheduleSchema = z.object({
  cron: z.string().default('0 */6 * * *'),
  timezone: z.string().default('Asia/Shanghai'),
});

const storageSchema = z.object({
  dataDir: z.string().min(1).default('./data'),
});

// ログ設定
const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  pretty: z.boolean().default(true),
});

// メイン設定スキーマ
export const configSchema = z.object({
  mode: z.enum(['once', 'batch']).default('once'),
  schedule: scheduleSchema.default({}),
  http: httpSchema.default({}),
  platforms: platformsSchema.default({}),
  storage: storageSchema.default({}),
  logging: loggingSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
