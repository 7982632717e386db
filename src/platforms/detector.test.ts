import { describe, it, expect } from 'vitest';
import { detectPlatform, isFeedPath, isXiaoyuzhouPage } from './detector.js';

describe('detectPlatform', () => {
  it('各プラットフォームのドメインを判定できる', () => {
    expect(detectPlatform('https://www.xiaoyuzhoufm.com/podcast/abc123')).toBe('xiaoyuzhou');
    expect(detectPlatform('https://music.163.com/#/djradio?id=123')).toBe('netease');
    expect(detectPlatform('https://podcasts.apple.com/cn/podcast/show/id1234567890')).toBe('apple');
    expect(detectPlatform('https://open.spotify.com/show/4rOoJ6Egrf8K2IrywzwOMk')).toBe('spotify');
  });

  it('フィード用のホストはRSSとして扱う', () => {
    expect(detectPlatform('https://feed.xiaoyuzhoufm.com/podcast/abc123')).toBe('rss');
    expect(detectPlatform('https://feed.xyzfm.space/abcdef')).toBe('rss');
    expect(detectPlatform('https://feeds.danlirencomedy.com/podcast.xml')).toBe('rss');
  });

  it('生成したフィードURLのホストはRSSとして扱う', () => {
    expect(detectPlatform('https://podcastrx.netlify.app/feed/netease/123')).toBe('rss');
  });

  it('パスの末尾がフィードらしい場合はRSSとして扱う', () => {
    expect(detectPlatform('https://example.com/podcast/feed.xml')).toBe('rss');
    expect(detectPlatform('https://example.com/show.rss')).toBe('rss');
    expect(detectPlatform('https://example.com/show.atom')).toBe('rss');
    expect(detectPlatform('https://example.com/blog/feed')).toBe('rss');
    expect(detectPlatform('https://example.com/rss/')).toBe('rss');
    expect(detectPlatform('example.com/podcast/feed.xml')).toBe('rss');
  });

  it('パスの途中にfeedやrssが含まれるだけならunknown', () => {
    expect(detectPlatform('https://example.com/feedback')).toBe('unknown');
    expect(detectPlatform('https://example.com/rss-guide.html')).toBe('unknown');
    expect(detectPlatform('https://www.youtube.com/feed/subscriptions')).toBe('unknown');
    expect(detectPlatform('https://example.com/page?next=/feed')).toBe('unknown');
  });

  it('未知のホストはunknownを返す', () => {
    expect(detectPlatform('https://example.com/show/123')).toBe('unknown');
    expect(detectPlatform('not a url')).toBe('unknown');
  });
});

describe('isXiaoyuzhouPage', () => {
  it('番組ページとフィードを区別する', () => {
    expect(isXiaoyuzhouPage('https://www.xiaoyuzhoufm.com/podcast/abc123')).toBe(true);
    expect(isXiaoyuzhouPage('https://feed.xiaoyuzhoufm.com/podcast/abc123')).toBe(false);
  });
});

describe('isFeedPath', () => {
  it('クエリ文字列やフラグメントは判定に使わない', () => {
    expect(isFeedPath('https://example.com/index.html?format=feed.xml')).toBe(false);
    expect(isFeedPath('https://example.com/podcast.xml?token=abc')).toBe(true);
  });
});
