/**
 * Collaborator contracts for macro data and news search.
 * Every accessor resolves to null when its source has nothing to offer.
 */

export type TreasuryMaturity = '3M' | '5Y' | '10Y' | '30Y';

export interface IndexPoint {
  date: string;
  close: number;
}

export interface IndexSeries {
  symbol: string;
  points: IndexPoint[];
}

export interface CentralBankPurchaser {
  country: string;
  amount: number;
  percentage: number;
}

export interface CentralBankPurchases {
  latestQuarter: string;
  /** Tonnes bought in the latest quarter. */
  totalPurchases: number;
  topPurchasers: CentralBankPurchaser[];
  yearToDate: number;
  yoyChange: number;
  asOf: string;
}

export interface MacroReferenceData {
  centralBankPurchases: CentralBankPurchases;
  geopoliticalRisk: {
    index: number;
    asOf: string;
  };
}

export interface MacroDataSource {
  getDollarIndex(days?: number): Promise<IndexSeries | null>;
  getTreasuryYield(maturity?: TreasuryMaturity): Promise<number | null>;
  getPolicyRate(): Promise<number | null>;
  getInflationRate(): Promise<number | null>;
  /** 10Y yield minus inflation. */
  getRealInterestRate(): Promise<number | null>;
  getCentralBankPurchases(): Promise<CentralBankPurchases | null>;
  /** 0-100 */
  getGeopoliticalRiskIndex(): Promise<number | null>;
}

export interface NewsItem {
  title: string;
  snippet: string;
  url?: string;
}

export interface NewsSearchResponse {
  query: string;
  success: boolean;
  results: NewsItem[];
  errorMessage?: string;
}

export type MacroNews = Record<string, NewsSearchResponse | null | undefined>;

export interface NewsSearchClient {
  searchMacroNews(maxResults: number): Promise<MacroNews>;
}
