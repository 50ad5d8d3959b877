import { describe, expect, it, vi } from 'vitest';
import { TavilyNewsClient } from '@/providers/news/tavily';
import { jsonResponse } from '../helpers/http';

const QUERIES = {
  fed_policy: 'fed query',
  geopolitics: 'geo query',
};

describe('TavilyNewsClient', () => {
  it('runs one search per category and maps results', async () => {
    const fetchStub = vi.fn(async (_input: string, init?: RequestInit): Promise<Response> => {
      const body = JSON.parse(String(init?.body));
      if (body.query === 'geo query') return jsonResponse({ detail: 'rate limited' }, 429);
      return jsonResponse({
        results: [
          { title: 'Fed holds rates', url: 'https://example.com/a', content: 'Policy unchanged' },
          { title: '', content: 'untitled' },
        ],
      });
    });
    const client = new TavilyNewsClient('test-secret', QUERIES, fetchStub);

    const news = await client.searchMacroNews(3);

    expect(fetchStub).toHaveBeenCalledTimes(2);
    expect(news.fed_policy).toEqual({
      query: 'fed query',
      success: true,
      results: [{ title: 'Fed holds rates', snippet: 'Policy unchanged', url: 'https://example.com/a' }],
    });
    expect(news.geopolitics?.success).toBe(false);
    expect(news.geopolitics?.results).toEqual([]);
    expect(news.geopolitics?.errorMessage).toBe('News search failed for "geo query" (429)');
  });

  it('sends the query and result limit', async () => {
    const fetchStub = vi.fn(async (_input: string, _init?: RequestInit) => jsonResponse({ results: [] }));
    const client = new TavilyNewsClient('test-secret', { dollar: 'dollar query' }, fetchStub);

    await client.searchMacroNews(5);

    const [url, init] = fetchStub.mock.calls[0];
    expect(url).toBe('https://api.tavily.com/search');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      api_key: 'test-secret',
      query: 'dollar query',
      topic: 'news',
      max_results: 5,
    });
  });
});
