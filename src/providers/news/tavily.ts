/**
 * Tavily search client for macro news.
 * One search per category, run one after another; a failed category is
 * reported with success=false and does not stop the others.
 */

import { createChildLogger } from '@/utils/logger';
import { ProviderError, toError, type FetchLike } from '../types';
import type { MacroNews, NewsItem, NewsSearchClient, NewsSearchResponse } from '@/macro/types';

const logger = createChildLogger('tavily_news');

const SEARCH_URL = 'https://api.tavily.com/search';

export const MACRO_NEWS_QUERIES: Record<string, string> = {
  fed_policy: 'Federal Reserve interest rate decision outlook',
  dollar: 'US dollar index DXY movement',
  inflation: 'US inflation CPI report',
  geopolitics: 'geopolitical tension safe haven demand',
  central_banks: 'central bank gold buying reserves',
};

interface TavilySearchResult {
  title?: string;
  url?: string;
  content?: string;
}

interface TavilySearchResponse {
  results?: TavilySearchResult[];
}

export class TavilyNewsClient implements NewsSearchClient {
  constructor(
    private readonly apiKey: string,
    private readonly queries: Record<string, string> = MACRO_NEWS_QUERIES,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async search(query: string, maxResults: number): Promise<NewsItem[]> {
    let response: Response;
    try {
      response = await this.fetchImpl(SEARCH_URL, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          api_key: this.apiKey,
          query,
          topic: 'news',
          max_results: maxResults,
        }),
      });
    } catch (error) {
      throw new ProviderError(`News search failed for "${query}"`, 'tavily', 'search', toError(error));
    }

    if (!response.ok) {
      throw new ProviderError(`News search failed for "${query}" (${response.status})`, 'tavily', 'search');
    }

    const data: TavilySearchResponse = await response.json();
    return (data.results ?? [])
      .filter((r) => typeof r.title === 'string' && r.title.length > 0)
      .slice(0, maxResults)
      .map((r) => ({
        title: r.title ?? '',
        snippet: r.content ?? '',
        url: r.url,
      }));
  }

  async searchMacroNews(maxResults: number): Promise<MacroNews> {
    const news: MacroNews = {};

    for (const [category, query] of Object.entries(this.queries)) {
      let entry: NewsSearchResponse;
      try {
        const results = await this.search(query, maxResults);
        entry = { query, success: true, results };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn({ category, error: message }, 'Macro news category failed');
        entry = { query, success: false, results: [], errorMessage: message };
      }
      news[category] = entry;
    }

    logger.info(
      { categories: Object.keys(news).length, results: Object.values(news).reduce((n, r) => n + (r?.results.length ?? 0), 0) },
      'Macro news search complete'
    );
    return news;
  }
}
