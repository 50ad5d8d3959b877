/**
 * Yahoo Finance Chart API (v8) client
 *
 * The quote endpoint (v7) answers 401 without a crumb, the chart endpoint
 * does not, so both price bars and index levels come from here.
 */

import { createChildLogger } from '@/utils/logger';
import { unixSecondsToDate } from '@/core/time';
import { ProviderError, toError, type FetchLike } from '../types';
import type { PriceBar } from '@/scoring/types';
import type { IndexPoint } from '@/macro/types';

const logger = createChildLogger('yahoo_chart');

const BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

export type ChartRange = '5d' | '1mo' | '3mo' | '6mo' | '1y' | '2y';

/** Smallest chart range holding the given number of calendar days. */
export function chartRangeForDays(days: number): ChartRange {
  if (days <= 5) return '5d';
  if (days <= 30) return '1mo';
  if (days <= 90) return '3mo';
  if (days <= 180) return '6mo';
  if (days <= 365) return '1y';
  return '2y';
}

type Nullable<T> = Array<T | null | undefined>;

export interface ChartResponse {
  chart?: {
    result?: Array<{
      timestamp?: number[];
      indicators?: {
        quote?: Array<{
          open?: Nullable<number>;
          high?: Nullable<number>;
          low?: Nullable<number>;
          close?: Nullable<number>;
          volume?: Nullable<number>;
        }>;
      };
    }> | null;
    error?: { code?: string; description?: string } | null;
  };
}

function isNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export class YahooChartClient {
  private requestCount = 0;

  constructor(private readonly fetchImpl: FetchLike = fetch) {}

  getRequestCount(): number {
    return this.requestCount;
  }

  private async fetchChart(symbol: string, range: ChartRange): Promise<ChartResponse> {
    const url = `${BASE_URL}/${encodeURIComponent(symbol)}?range=${range}&interval=1d`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          Accept: 'application/json',
          'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
        },
      });
      this.requestCount++;
    } catch (error) {
      throw new ProviderError(`Chart request failed for ${symbol}`, 'yahoo', 'chart', toError(error));
    }

    if (!response.ok) {
      throw new ProviderError(
        `Chart request failed for ${symbol} (${response.status})`,
        'yahoo',
        'chart'
      );
    }

    const data: ChartResponse = await response.json();
    const apiError = data.chart?.error;
    if (apiError) {
      throw new ProviderError(
        `Chart API error for ${symbol}: ${apiError.description ?? apiError.code ?? 'unknown'}`,
        'yahoo',
        'chart'
      );
    }
    return data;
  }

  /**
   * Daily OHLCV bars, oldest first. Rows with a missing field are dropped.
   */
  async getDailyBars(symbol: string, range: ChartRange = '6mo'): Promise<PriceBar[]> {
    const data = await this.fetchChart(symbol, range);
    const result = data.chart?.result?.[0];
    const timestamps = result?.timestamp ?? [];
    const quote = result?.indicators?.quote?.[0] ?? {};

    const bars: PriceBar[] = [];
    timestamps.forEach((ts, i) => {
      const open = quote.open?.[i];
      const high = quote.high?.[i];
      const low = quote.low?.[i];
      const close = quote.close?.[i];
      const volume = quote.volume?.[i] ?? 0;
      if (!isNumber(open) || !isNumber(high) || !isNumber(low) || !isNumber(close)) return;
      bars.push({
        date: unixSecondsToDate(ts),
        open,
        high,
        low,
        close,
        volume: isNumber(volume) && volume > 0 ? volume : 0,
      });
    });

    logger.debug({ symbol, range, bars: bars.length }, 'Fetched daily bars');
    return bars;
  }

  async getCloses(symbol: string, range: ChartRange = '1mo'): Promise<IndexPoint[]> {
    const data = await this.fetchChart(symbol, range);
    const result = data.chart?.result?.[0];
    const timestamps = result?.timestamp ?? [];
    const closes = result?.indicators?.quote?.[0]?.close ?? [];

    const points: IndexPoint[] = [];
    timestamps.forEach((ts, i) => {
      const close = closes[i];
      if (isNumber(close)) {
        points.push({ date: unixSecondsToDate(ts), close });
      }
    });
    return points;
  }
}
