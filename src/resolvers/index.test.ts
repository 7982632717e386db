import { describe, it, expect, vi } from 'vitest';
import { PodcastResolver, createPodcastInfo, type ResolverRegistry } from './index.js';
import { NeteaseResolver, extractNeteaseId } from './netease.js';
import { SpotifyResolver, SPOTIFY_UNSUPPORTED_DESCRIPTION } from './spotify.js';
import { createEngineContext } from '../platforms/context.js';
import { createMemoryLogger } from '../utils/logger.js';
import { MalformedPlatformIdError, UnsupportedPlatformError } from '../errors.js';
import type { KnownPlatformTag } from '../platforms/detector.js';

function newContext() {
  const memory = createMemoryLogger();
  return { ...memory, context: createEngineContext({ logger: memory.logger }) };
}

function fakeResolver<P extends KnownPlatformTag>(platform: P) {
  return {
    platform,
    resolve: vi.fn(async (url: string) =>
      createPodcastInfo({ platform, title: `${platform} show`, feedUrl: url, sourceUrl: url, category: platform })
    ),
  };
}

function fakeRegistry() {
  return {
    xiaoyuzhou: fakeResolver('xiaoyuzhou'),
    netease: fakeResolver('netease'),
    apple: fakeResolver('apple'),
    spotify: fakeResolver('spotify'),
    rss: fakeResolver('rss'),
  } satisfies ResolverRegistry;
}

describe('PodcastResolver', () => {
  it('判定したプラットフォームのリゾルバーだけを呼ぶ', async () => {
    const { context } = newContext();
    const registry = fakeRegistry();
    const resolver = new PodcastResolver(context, registry);

    const info = await resolver.resolve('https://podcasts.apple.com/cn/podcast/show/id1234567890');

    expect(info.title).toBe('apple show');
    expect(registry.apple.resolve).toHaveBeenCalledTimes(1);
    expect(registry.rss.resolve).not.toHaveBeenCalled();
    expect(registry.xiaoyuzhou.resolve).not.toHaveBeenCalled();
  });

  it('小宇宙のフィードホストはRSSとして扱う', async () => {
    const { context } = newContext();
    const registry = fakeRegistry();
    const resolver = new PodcastResolver(context, registry);

    await resolver.resolve('https://feed.xiaoyuzhoufm.com/podcast/abc123');

    expect(registry.rss.resolve).toHaveBeenCalledWith('https://feed.xiaoyuzhoufm.com/podcast/abc123');
    expect(registry.xiaoyuzhou.resolve).not.toHaveBeenCalled();
  });

  it('未対応のリンクは UnsupportedPlatformError を投げる', async () => {
    const { context, entries } = newContext();
    const resolver = new PodcastResolver(context, fakeRegistry());

    await expect(resolver.resolve('https://example.com/show')).rejects.toBeInstanceOf(UnsupportedPlatformError);
    expect(entries.find((e) => e.levelLabel === 'warn')?.url).toBe('https://example.com/show');
  });

  it('エラーコードを持つ', async () => {
    const { context } = newContext();
    const resolver = new PodcastResolver(context, fakeRegistry());

    await expect(resolver.resolve('https://example.com/show')).rejects.toMatchObject({
      code: 'UNSUPPORTED_PLATFORM',
      message: '不支持的平台: https://example.com/show',
    });
  });
});

describe('NeteaseResolver', () => {
  it.each([
    ['https://music.163.com/#/djradio?id=123', '123'],
    ['https://music.163.com/djradio/123', '123'],
    ['https://music.163.com/m/djradio?id=456&userid=789', '456'],
  ])('%s からIDを取り出す', (url, id) => {
    expect(extractNeteaseId(url)).toBe(id);
  });

  it('フィードURLを組み立てる', async () => {
    const { context } = newContext();
    const info = await new NeteaseResolver(context).resolve('https://music.163.com/#/djradio?id=123');

    expect(info).toEqual({
      platform: 'netease',
      title: '网易云播客',
      description: '',
      imageUrl: '',
      feedUrl: 'https://podcastrx.netlify.app/feed/netease/123',
      sourceUrl: 'https://music.163.com/#/djradio?id=123',
      author: '',
      category: '网易云',
      episodeCount: 0,
    });
  });

  it('IDのないリンクは MalformedPlatformIdError', async () => {
    const { context } = newContext();

    await expect(new NeteaseResolver(context).resolve('https://music.163.com/discover')).rejects.toBeInstanceOf(
      MalformedPlatformIdError
    );
  });
});

describe('SpotifyResolver', () => {
  it('未対応であることを示すスタブを返す', async () => {
    const { context } = newContext();
    const url = 'https://open.spotify.com/show/abc';

    const info = await new SpotifyResolver(context).resolve(url);

    expect(info).toMatchObject({
      platform: 'spotify',
      title: 'Spotify 播客',
      description: SPOTIFY_UNSUPPORTED_DESCRIPTION,
      feedUrl: url,
      category: 'Spotify',
      episodeCount: 0,
    });
  });
});
