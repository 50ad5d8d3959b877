/**
 * Shared types for the technical analysis pipeline
 */

export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type PriceSeries = readonly PriceBar[];

export type TrendStatus = 'STRONG_BULL' | 'BULL' | 'NEUTRAL' | 'BEAR' | 'STRONG_BEAR';

export type VolumeStatus =
  | 'HEAVY_VOLUME_UP'
  | 'HEAVY_VOLUME_DOWN'
  | 'SHRINK_VOLUME_UP'
  | 'SHRINK_VOLUME_DOWN'
  | 'NORMAL';

export type MacdStatus =
  | 'GOLDEN_CROSS_ABOVE_ZERO'
  | 'GOLDEN_CROSS'
  | 'BULLISH'
  | 'NEUTRAL'
  | 'BEARISH'
  | 'DEAD_CROSS';

export type RsiStatus = 'OVERBOUGHT' | 'OVERSOLD' | 'NEUTRAL';

export type BuySignal = 'STRONG_BUY' | 'BUY' | 'HOLD' | 'SELL' | 'STRONG_SELL';

export const TREND_LABELS: Record<TrendStatus, string> = {
  STRONG_BULL: 'Strong bull',
  BULL: 'Bull',
  NEUTRAL: 'Neutral',
  BEAR: 'Bear',
  STRONG_BEAR: 'Strong bear',
};

export const VOLUME_LABELS: Record<VolumeStatus, string> = {
  HEAVY_VOLUME_UP: 'Heavy volume up',
  HEAVY_VOLUME_DOWN: 'Heavy volume down',
  SHRINK_VOLUME_UP: 'Shrinking volume up',
  SHRINK_VOLUME_DOWN: 'Shrinking volume down',
  NORMAL: 'Normal volume',
};

export const MACD_LABELS: Record<MacdStatus, string> = {
  GOLDEN_CROSS_ABOVE_ZERO: 'Golden cross above zero',
  GOLDEN_CROSS: 'Golden cross',
  BULLISH: 'Bullish',
  NEUTRAL: 'Neutral',
  BEARISH: 'Bearish',
  DEAD_CROSS: 'Dead cross',
};

export const RSI_LABELS: Record<RsiStatus, string> = {
  OVERBOUGHT: 'Overbought',
  OVERSOLD: 'Oversold',
  NEUTRAL: 'Neutral',
};

export const SIGNAL_LABELS: Record<BuySignal, string> = {
  STRONG_BUY: 'Strong buy',
  BUY: 'Buy',
  HOLD: 'Hold',
  SELL: 'Sell',
  STRONG_SELL: 'Strong sell',
};

export type MacroImpact =
  | 'strongly_bullish'
  | 'bullish'
  | 'slightly_bullish'
  | 'neutral'
  | 'bearish'
  | 'strongly_bearish';

export interface MacroFactor {
  value: number;
  change?: number;
  impact: MacroImpact;
  score: number;
}

export type MacroFactorName = 'dxy' | 'real_rate' | 'inflation' | 'central_bank' | 'geopolitical';

export type MacroFactors = Partial<Record<MacroFactorName, MacroFactor>>;

export interface MacroScoreReport {
  totalScore: number;
  factors: MacroFactors;
  summary: string;
  timestamp: string;
}

/**
 * Present on a result only after macro fusion ran.
 * `technicalScore` is the pre-fusion signal score.
 */
export interface MacroExtension {
  macroScore: number;
  macroFactors: MacroFactors;
  macroSummary: string;
  macroTimestamp: string;
  technicalScore: number;
  macroNewsScore: number;
  macroDataScore: number;
  totalMacroScore: number;
}

export interface AnalysisResult {
  code: string;

  currentPrice: number;
  ma5: number;
  ma10: number;
  ma20: number;
  biasMa5: number;
  biasMa10: number;
  biasMa20: number;

  trendStatus: TrendStatus;
  trendStrength: number;
  maAlignment: string;

  volumeStatus: VolumeStatus;
  volumeRatio5d: number;
  /** False until the volume stage had enough history to classify. */
  volumeClassified: boolean;
  volumeTrend: string;

  macdDif: number;
  macdDea: number;
  macdBar: number;
  macdStatus: MacdStatus;
  macdSignal: string;

  rsi6: number;
  rsi12: number;
  rsi24: number;
  rsiStatus: RsiStatus;
  rsiSignal: string;

  buySignal: BuySignal;
  signalScore: number;
  signalReasons: string[];
  riskFactors: string[];

  macro: MacroExtension | null;
}

export function createEmptyResult(code: string): AnalysisResult {
  return {
    code,
    currentPrice: 0,
    ma5: 0,
    ma10: 0,
    ma20: 0,
    biasMa5: 0,
    biasMa10: 0,
    biasMa20: 0,
    trendStatus: 'NEUTRAL',
    trendStrength: 50,
    maAlignment: 'Insufficient history for MA alignment',
    volumeStatus: 'NORMAL',
    volumeRatio5d: 0,
    volumeClassified: false,
    volumeTrend: 'Insufficient history for volume analysis',
    macdDif: 0,
    macdDea: 0,
    macdBar: 0,
    macdStatus: 'NEUTRAL',
    macdSignal: 'Insufficient history for MACD',
    rsi6: 50,
    rsi12: 50,
    rsi24: 50,
    rsiStatus: 'NEUTRAL',
    rsiSignal: 'Insufficient history for RSI',
    buySignal: 'HOLD',
    signalScore: 50,
    signalReasons: [],
    riskFactors: [],
    macro: null,
  };
}

export function isBuyClass(signal: BuySignal): boolean {
  return signal === 'STRONG_BUY' || signal === 'BUY';
}

export function isSellClass(signal: BuySignal): boolean {
  return signal === 'SELL' || signal === 'STRONG_SELL';
}

export function isBullishTrend(status: TrendStatus): boolean {
  return status === 'STRONG_BULL' || status === 'BULL';
}

export function isBearishTrend(status: TrendStatus): boolean {
  return status === 'STRONG_BEAR' || status === 'BEAR';
}
