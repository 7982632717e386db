import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FeedExtractor, atomEnclosureUrl } from './feed.js';
import { createEngineContext } from '../platforms/context.js';
import { createMemoryLogger } from '../utils/logger.js';

const FEED_XML = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:itunes="http://www.itunes.com/dtds/podcast-1.0.dtd">
<channel>
<title>测试播客</title>
<description>一档测试节目</description>
<item>
<title>第一期</title>
<description>第一期简介</description>
<enclosure url="https://cdn.example.com/ep1.mp3" type="audio/mpeg" length="1000"/>
<itunes:duration>40:43</itunes:duration>
<pubDate>Mon, 01 Jan 2024 08:00:00 GMT</pubDate>
</item>
<item>
<title>第二期</title>
<description>第二期简介</description>
<enclosure url="https://cdn.example.com/ep2.mp3" type="audio/mpeg" length="2000"/>
<itunes:duration>PT1H2M3S</itunes:duration>
<pubDate>Mon, 08 Jan 2024 08:00:00 GMT</pubDate>
</item>
<item>
<title>没有音频</title>
<itunes:duration>2443</itunes:duration>
</item>
</channel>
</rss>`;

const ATOM_XML = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:itunes="http://www.itunes.com/dtds/podcast-1.0.dtd">
<title>Atom 播客</title>
<author><name>主播甲</name></author>
<entry>
<title>A1</title>
<link rel="alternate" href="https://example.com/episodes/a1"/>
<link rel="enclosure" type="audio/mpeg" href="https://cdn.example.com/a1.mp3"/>
<itunes:duration>12:30</itunes:duration>
</entry>
<entry>
<title>A2</title>
<link rel="enclosure" type="audio/mpeg" href="https://cdn.example.com/a2.mp3"/>
</entry>
<entry>
<title>A3</title>
<link rel="alternate" href="https://example.com/episodes/a3"/>
</entry>
</feed>`;

describe('atomEnclosureUrl', () => {
  it('rel="enclosure" の最初のリンクを返す', () => {
    const links = [
      { $: { rel: 'alternate', href: 'https://example.com/page' } },
      { $: { rel: 'enclosure', href: 'https://cdn.example.com/first.mp3' } },
      { $: { rel: 'enclosure', href: 'https://cdn.example.com/second.mp3' } },
    ];
    expect(atomEnclosureUrl(links)).toBe('https://cdn.example.com/first.mp3');
  });

  it('RSSの文字列リンクやエンクロージャーがない場合はundefined', () => {
    expect(atomEnclosureUrl(['https://example.com/page'])).toBeUndefined();
    expect(atomEnclosureUrl(undefined)).toBeUndefined();
  });
});

describe('FeedExtractor', () => {
  const originalFetch = global.fetch;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('フィードの各エントリーをエピソードに変換する', async () => {
    fetchMock.mockImplementation(async () => new Response(FEED_XML));
    const extractor = new FeedExtractor(createEngineContext({ logger: createMemoryLogger().logger }));

    const episodes = await extractor.listEpisodes('https://example.com/feed.xml');

    expect(episodes).toHaveLength(3);
    expect(episodes[0]).toEqual({
      title: '第一期',
      description: '第一期简介',
      audioUrl: 'https://cdn.example.com/ep1.mp3',
      durationSeconds: 2443,
      rawPubDate: 'Mon, 01 Jan 2024 08:00:00 GMT',
    });
    expect(episodes[1]?.durationSeconds).toBe(3723);
  });

  it('エンクロージャーがないエントリーの音声URLは空文字', async () => {
    fetchMock.mockImplementation(async () => new Response(FEED_XML));
    const extractor = new FeedExtractor(createEngineContext({ logger: createMemoryLogger().logger }));

    const episodes = await extractor.listEpisodes('https://example.com/feed.xml');

    expect(episodes[2]).toEqual({
      title: '没有音频',
      description: '',
      audioUrl: '',
      durationSeconds: 2443,
      rawPubDate: undefined,
    });
  });

  it('Atomフィードは rel="enclosure" のリンクを音声URLにする', async () => {
    fetchMock.mockImplementation(async () => new Response(ATOM_XML));
    const extractor = new FeedExtractor(createEngineContext({ logger: createMemoryLogger().logger }));

    const episodes = await extractor.listEpisodes('https://example.com/feed.atom');

    expect(episodes.map((e) => [e.title, e.audioUrl])).toEqual([
      ['A1', 'https://cdn.example.com/a1.mp3'],
      ['A2', 'https://cdn.example.com/a2.mp3'],
      ['A3', ''],
    ]);
    expect(episodes[0]?.durationSeconds).toBe(750);
  });

  it('デスクトップ用のUser-Agentで取得する', async () => {
    fetchMock.mockImplementation(async () => new Response(FEED_XML));
    const extractor = new FeedExtractor(
      createEngineContext({ logger: createMemoryLogger().logger, http: { desktopUserAgent: 'desktop-test' } })
    );

    await extractor.listEpisodes('https://example.com/feed.xml');

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://example.com/feed.xml');
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ 'User-Agent': 'desktop-test' });
  });

  it('通信エラーの場合は例外を投げずに空配列を返す', async () => {
    fetchMock.mockRejectedValue(new TypeError('connect ECONNREFUSED 127.0.0.1:80'));
    const { logger, entries } = createMemoryLogger();
    const extractor = new FeedExtractor(createEngineContext({ logger }));

    await expect(extractor.listEpisodes('https://example.com/feed.xml')).resolves.toEqual([]);
    expect(entries.some((e) => e.levelLabel === 'warn')).toBe(true);
  });

  it('フィードとして解析できない場合は空配列を返す', async () => {
    fetchMock.mockImplementation(async () => new Response('<html><body>not a feed</body></html>'));
    const { logger, entries } = createMemoryLogger();
    const extractor = new FeedExtractor(createEngineContext({ logger }));

    await expect(extractor.listEpisodes('https://example.com/feed.xml')).resolves.toEqual([]);
    expect(entries.find((e) => e.levelLabel === 'error')?.msg).toBe('フィードの解析に失敗');
  });
});
