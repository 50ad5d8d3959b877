/**
 * Macro data provider
 *
 * Market series (dollar index, treasury yields) come from the Yahoo chart
 * endpoint, policy rate and CPI from FRED, and the slow-moving reference
 * figures (central-bank purchases, geopolitical risk) from
 * config/macro/reference.json. Every accessor resolves to null on failure.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { hoursToSeconds, daysToSeconds } from '@/core/time';
import type { CacheTtlConfig } from '@/core/config';
import { roundTo } from '@/scoring/normalize';
import { TtlCache } from '@/macro/cache';
import { validateMacroReference } from '@/validation/ajv_instance';
import { ProviderError } from './types';
import { chartRangeForDays, type YahooChartClient } from './yahoo/chart_client';
import type { FredClient } from './fred/client';
import type {
  CentralBankPurchases,
  IndexSeries,
  MacroDataSource,
  MacroReferenceData,
  TreasuryMaturity,
} from '@/macro/types';

const logger = createChildLogger('macro_provider');

export const DOLLAR_INDEX_SYMBOL = 'DX-Y.NYB';

/** Yahoo yield indices quote the yield itself, in percent. */
export const TREASURY_SYMBOLS: Record<TreasuryMaturity, string> = {
  '3M': '^IRX',
  '5Y': '^FVX',
  '10Y': '^TNX',
  '30Y': '^TYX',
};

export const DEFAULT_INFLATION_RATE = 2.5;

export const DEFAULT_MACRO_CACHE_TTL: CacheTtlConfig = {
  shortLivedSeconds: hoursToSeconds(1),
  slowMovingSeconds: daysToSeconds(1),
};

export interface MarketMacroDataProviderOptions {
  chartClient: YahooChartClient;
  /** Without a FRED key the policy rate and inflation stay unavailable. */
  fredClient: FredClient | null;
  referencePath?: string;
  ttl?: CacheTtlConfig;
  now?: () => number;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class MarketMacroDataProvider implements MacroDataSource {
  private readonly series: TtlCache<IndexSeries>;
  private readonly rates: TtlCache<number>;
  private readonly reference: TtlCache<MacroReferenceData>;
  private readonly ttl: CacheTtlConfig;
  private readonly referencePath: string;

  constructor(private readonly options: MarketMacroDataProviderOptions) {
    this.series = new TtlCache(options.now);
    this.rates = new TtlCache(options.now);
    this.reference = new TtlCache(options.now);
    this.ttl = options.ttl ?? DEFAULT_MACRO_CACHE_TTL;
    this.referencePath =
      options.referencePath ?? join(process.cwd(), 'config', 'macro', 'reference.json');
  }

  async getDollarIndex(days: number = 30): Promise<IndexSeries | null> {
    try {
      return await this.series.getOrLoad(`dxy_${days}`, this.ttl.shortLivedSeconds, async () => {
        const points = await this.options.chartClient.getCloses(DOLLAR_INDEX_SYMBOL, chartRangeForDays(days));
        if (points.length === 0) {
          logger.warn({ symbol: DOLLAR_INDEX_SYMBOL }, 'Dollar index returned no data');
          return null;
        }
        return { symbol: DOLLAR_INDEX_SYMBOL, points: points.slice(-days) };
      });
    } catch (error) {
      logger.error({ error: describe(error) }, 'Failed to fetch dollar index');
      return null;
    }
  }

  async getTreasuryYield(maturity: TreasuryMaturity = '10Y'): Promise<number | null> {
    const symbol = TREASURY_SYMBOLS[maturity];
    try {
      return await this.rates.getOrLoad(`treasury_${maturity}`, this.ttl.shortLivedSeconds, async () => {
        const points = await this.options.chartClient.getCloses(symbol, '5d');
        const latest = points[points.length - 1];
        if (!latest) {
          logger.warn({ maturity, symbol }, 'Treasury yield returned no data');
          return null;
        }
        return roundTo(latest.close);
      });
    } catch (error) {
      logger.error({ maturity, error: describe(error) }, 'Failed to fetch treasury yield');
      return null;
    }
  }

  async getPolicyRate(): Promise<number | null> {
    const { fredClient } = this.options;
    if (!fredClient) return null;
    try {
      return await this.rates.getOrLoad('policy_rate', this.ttl.slowMovingSeconds, () =>
        fredClient.getPolicyRate()
      );
    } catch (error) {
      logger.error({ error: describe(error) }, 'Failed to fetch policy rate');
      return null;
    }
  }

  async getInflationRate(): Promise<number | null> {
    const { fredClient } = this.options;
    if (!fredClient) return null;
    try {
      return await this.rates.getOrLoad('inflation', this.ttl.slowMovingSeconds, () =>
        fredClient.getInflationYoY()
      );
    } catch (error) {
      logger.error({ error: describe(error) }, 'Failed to fetch inflation rate');
      return null;
    }
  }

  async getRealInterestRate(): Promise<number | null> {
    return this.rates.getOrLoad('real_rate', this.ttl.shortLivedSeconds, async () => {
      const nominal = await this.getTreasuryYield('10Y');
      if (nominal === null) {
        logger.warn('10Y yield unavailable, cannot compute real rate');
        return null;
      }
      let inflation = await this.getInflationRate();
      if (inflation === null) {
        inflation = DEFAULT_INFLATION_RATE;
        logger.info({ inflation }, 'Inflation unavailable, using default');
      }
      const realRate = roundTo(nominal - inflation);
      logger.debug({ realRate, nominal, inflation }, 'Computed real interest rate');
      return realRate;
    });
  }

  private async loadReference(ttlSeconds: number): Promise<MacroReferenceData | null> {
    try {
      return await this.reference.getOrLoad('reference', ttlSeconds, async () => {
        const raw: unknown = JSON.parse(readFileSync(this.referencePath, 'utf-8'));
        const validation = validateMacroReference(raw);
        if (!validation.valid) {
          throw new ProviderError(
            `Macro reference data invalid: ${validation.errors.join('; ')}`,
            'reference',
            'load'
          );
        }
        return validation.data;
      });
    } catch (error) {
      logger.error({ path: this.referencePath, error: describe(error) }, 'Failed to load macro reference data');
      return null;
    }
  }

  async getCentralBankPurchases(): Promise<CentralBankPurchases | null> {
    const reference = await this.loadReference(this.ttl.slowMovingSeconds);
    return reference ? reference.centralBankPurchases : null;
  }

  async getGeopoliticalRiskIndex(): Promise<number | null> {
    const reference = await this.loadReference(this.ttl.shortLivedSeconds);
    return reference ? reference.geopoliticalRisk.index : null;
  }

  clearCache(): void {
    this.series.clear();
    this.rates.clear();
    this.reference.clear();
  }
}
