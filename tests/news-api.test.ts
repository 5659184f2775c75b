/**
 * Tests for the NewsAPI client
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { NewsApiTool } from '../lib/tools/news-api';
import { NewsSourceError } from '../lib/errors';

interface SeenRequest {
  url: string;
  apiKey: string | null;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Stub global fetch, routing by URL substring
 */
function stubFetch(route: (url: string) => Response | Promise<Response>): SeenRequest[] {
  const seen: SeenRequest[] = [];
  vi.stubGlobal('fetch', vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    seen.push({ url, apiKey: new Headers(init?.headers).get('X-Api-Key') });
    return route(url);
  }));
  return seen;
}

const tool = () => new NewsApiTool('test-key', 'https://news.test/v2', 1);

describe('NewsApiTool', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should query each topic and map articles', async () => {
    const seen = stubFetch(url => {
      if (url.includes('q=ai')) {
        return json({
          status: 'ok',
          articles: [{
            title: 'Model release',
            url: 'https://example.com/model',
            source: { id: null, name: 'Example Wire' },
            description: null,
            content: 'Body text',
            publishedAt: '2026-10-18T08:00:00Z',
          }],
        });
      }
      return json({ status: 'error', code: 'unexpectedError', message: 'boom' }, 500);
    });

    const articles = await tool().fetchArticles({ topics: ['ai', 'climate'], region: 'us', hoursBack: 24 });

    expect(articles).toEqual([{
      title: 'Model release',
      url: 'https://example.com/model',
      sourceName: 'Example Wire',
      content: 'Body text',
      publishedAt: '2026-10-18T08:00:00Z',
    }]);
    expect(seen).toHaveLength(2);
    expect(seen[0].url.startsWith('https://news.test/v2/everything?q=ai&from=')).toBe(true);
    expect(seen[0].url).toContain('&language=en&sortBy=publishedAt&pageSize=20');
    expect(seen[0].apiKey).toBe('test-key');
  });

  it('should fall back to top headlines when no topic yields articles', async () => {
    const seen = stubFetch(url => {
      if (url.includes('/top-headlines')) {
        return json({ status: 'ok', articles: [{ title: 'Headline', url: 'https://example.com/h' }] });
      }
      return json({ status: 'ok', totalResults: 0, articles: [] });
    });

    const articles = await tool().fetchArticles({ topics: ['general'], region: 'gb', hoursBack: 24 });

    expect(articles).toEqual([{ title: 'Headline', url: 'https://example.com/h' }]);
    expect(seen.map(request => request.url)[1]).toBe('https://news.test/v2/top-headlines?country=gb&pageSize=20');
  });

  it('should report an API error from the fallback', async () => {
    stubFetch(() => json({ status: 'error', code: 'apiKeyInvalid', message: 'Your API key is invalid.' }, 401));

    const error = await tool()
      .fetchArticles({ topics: ['general'], region: 'us', hoursBack: 24 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NewsSourceError);
    expect(error instanceof Error && error.message).toBe('NewsAPI error: Your API key is invalid.');
  });

  it('should report a connection failure from the fallback', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    await expect(tool().fetchArticles({ topics: ['general'], region: 'us', hoursBack: 24 }))
      .rejects.toThrow('Failed to connect to NewsAPI: fetch failed');
  });

  it('should fail when nothing is found anywhere', async () => {
    stubFetch(() => json({ status: 'ok', articles: [] }));

    await expect(tool().fetchArticles({ topics: ['general'], region: 'us', hoursBack: 24 }))
      .rejects.toThrow('No news articles found. Check your API key or try different topics.');
  });
});
