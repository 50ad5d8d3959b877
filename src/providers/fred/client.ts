/**
 * FRED (Federal Reserve Economic Data) client
 * Docs: https://fred.stlouisfed.org/docs/api/fred/series_observations.html
 */

import { createChildLogger } from '@/utils/logger';
import { roundTo } from '@/scoring/normalize';
import { ProviderError, toError, type FetchLike } from '../types';

const logger = createChildLogger('fred_client');

const BASE_URL = 'https://api.stlouisfed.org/fred/series/observations';

export const FRED_SERIES = {
  policyRate: 'FEDFUNDS',
  consumerPrices: 'CPIAUCSL',
} as const;

export interface FredObservation {
  date: string;
  value: number;
}

interface ObservationsResponse {
  observations?: Array<{ date?: string; value?: string }>;
  error_message?: string;
}

/** FRED reports gaps as "." rather than omitting them. */
function parseObservationValue(raw: string | undefined): number | null {
  if (raw === undefined || raw === '.' || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export class FredClient {
  constructor(
    private readonly apiKey: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  /**
   * Latest observations, newest first, with missing values skipped.
   */
  async getObservations(seriesId: string, limit: number): Promise<FredObservation[]> {
    const params = new URLSearchParams({
      series_id: seriesId,
      api_key: this.apiKey,
      file_type: 'json',
      sort_order: 'desc',
      limit: String(limit),
    });

    let response: Response;
    try {
      response = await this.fetchImpl(`${BASE_URL}?${params.toString()}`);
    } catch (error) {
      throw new ProviderError(`FRED request failed for ${seriesId}`, 'fred', 'observations', toError(error));
    }

    if (!response.ok) {
      throw new ProviderError(
        `FRED request failed for ${seriesId} (${response.status})`,
        'fred',
        'observations'
      );
    }

    const data: ObservationsResponse = await response.json();
    if (data.error_message) {
      throw new ProviderError(`FRED error for ${seriesId}: ${data.error_message}`, 'fred', 'observations');
    }

    const observations: FredObservation[] = [];
    for (const row of data.observations ?? []) {
      const value = parseObservationValue(row.value);
      if (value !== null && row.date) {
        observations.push({ date: row.date, value });
      }
    }
    return observations;
  }

  async getLatestValue(seriesId: string): Promise<number | null> {
    const [latest] = await this.getObservations(seriesId, 1);
    return latest ? latest.value : null;
  }

  /** Effective federal funds rate, percent. */
  async getPolicyRate(): Promise<number | null> {
    return this.getLatestValue(FRED_SERIES.policyRate);
  }

  /**
   * Year-over-year CPI change in percent, from the latest monthly index
   * against the one twelve months earlier.
   */
  async getInflationYoY(): Promise<number | null> {
    const observations = await this.getObservations(FRED_SERIES.consumerPrices, 13);
    if (observations.length < 13) {
      logger.warn({ count: observations.length }, 'Not enough CPI observations for a YoY change');
      return null;
    }
    const latest = observations[0].value;
    const yearAgo = observations[12].value;
    if (yearAgo === 0) return null;
    return roundTo(((latest - yearAgo) / yearAgo) * 100);
  }
}
