import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fetchText } from './http.js';
import { createMemoryLogger } from './logger.js';

describe('fetchText', () => {
  const originalFetch = global.fetch;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('本文をUTF-8として返す', async () => {
    const { logger } = createMemoryLogger();
    const bytes = new TextEncoder().encode('<title>声东击西</title>');
    fetchMock.mockResolvedValue(
      new Response(bytes, { status: 200, headers: { 'Content-Type': 'text/html; charset=iso-8859-1' } })
    );

    const result = await fetchText('https://example.com/page', { timeoutMs: 1000, userAgent: 'test-agent', logger });

    expect(result).toEqual({ status: 200, url: 'https://example.com/page', body: '<title>声东击西</title>' });
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toMatchObject({ 'User-Agent': 'test-agent' });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('成功以外のステータスはnullを返す', async () => {
    const { logger, entries } = createMemoryLogger();
    fetchMock.mockResolvedValue(new Response('not found', { status: 404 }));

    const result = await fetchText('https://example.com/missing', { timeoutMs: 1000, logger });

    expect(result).toBeNull();
    expect(entries.find((e) => e.levelLabel === 'warn')?.status).toBe(404);
  });

  it('通信エラーはnullを返し、例外を投げない', async () => {
    const { logger, entries } = createMemoryLogger();
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const result = await fetchText('https://example.com/down', { timeoutMs: 1000, logger });

    expect(result).toBeNull();
    expect(entries.find((e) => e.levelLabel === 'warn')?.error).toBe('fetch failed');
  });
});
