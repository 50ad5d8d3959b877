/**
 * Trend / Volume / Momentum classification
 * Each stage reads the indicator snapshot and writes its state onto the result.
 */

import { bias } from './indicators';
import { clamp } from './normalize';
import type { IndicatorSnapshot } from './indicators';
import type { InstrumentThresholds } from '@/instruments/types';
import type { AnalysisResult, MacdStatus, RsiStatus, TrendStatus, VolumeStatus } from './types';

const PERSISTENCE_BARS = 3;
const STRENGTH_WINDOW = 5;
const RSI_OVERBOUGHT = 70;
const RSI_OVERSOLD = 30;

type Alignment = 'bullish' | 'bearish' | 'mixed';

function alignmentAt(snapshot: IndicatorSnapshot, index: number): Alignment {
  const ma5 = snapshot.maSeries.ma5[index];
  const ma10 = snapshot.maSeries.ma10[index];
  const ma20 = snapshot.maSeries.ma20[index];
  if (ma5 == null || ma10 == null || ma20 == null) return 'mixed';
  if (ma5 > ma10 && ma10 > ma20) return 'bullish';
  if (ma5 < ma10 && ma10 < ma20) return 'bearish';
  return 'mixed';
}

function countAligned(snapshot: IndicatorSnapshot, direction: Alignment, bars: number): number {
  let count = 0;
  const last = snapshot.barCount - 1;
  for (let i = last; i > last - bars && i >= 0; i--) {
    if (alignmentAt(snapshot, i) === direction) count++;
  }
  return count;
}

export function applyMovingAverages(result: AnalysisResult, snapshot: IndicatorSnapshot): void {
  result.currentPrice = snapshot.close;
  result.ma5 = snapshot.ma5 ?? 0;
  result.ma10 = snapshot.ma10 ?? 0;
  result.ma20 = snapshot.ma20 ?? 0;
  result.biasMa5 = bias(snapshot.close, snapshot.ma5);
  result.biasMa10 = bias(snapshot.close, snapshot.ma10);
  result.biasMa20 = bias(snapshot.close, snapshot.ma20);
}

export function classifyTrend(
  result: AnalysisResult,
  snapshot: IndicatorSnapshot,
  thresholds: InstrumentThresholds
): void {
  const { ma5, ma10, ma20 } = snapshot;
  if (ma5 === null || ma10 === null || ma20 === null || ma20 === 0) {
    return;
  }

  const direction = alignmentAt(snapshot, snapshot.barCount - 1);
  const spread = ((ma5 - ma20) / ma20) * 100;

  if (direction === 'mixed') {
    result.trendStatus = 'NEUTRAL';
    result.trendStrength = 50;
    result.maAlignment = 'MAs intertwined, no clear direction';
    return;
  }

  const persistent = countAligned(snapshot, direction, PERSISTENCE_BARS) === PERSISTENCE_BARS;
  const strong = persistent && Math.abs(spread) >= thresholds.strongTrendSpreadPct;
  const aligned = countAligned(snapshot, direction, STRENGTH_WINDOW);
  const cleanliness = 60 + aligned * 4 + Math.min(Math.abs(spread), 5) * 4;

  let status: TrendStatus;
  if (direction === 'bullish') {
    status = strong ? 'STRONG_BULL' : 'BULL';
    result.trendStrength = Math.round(clamp(cleanliness));
    result.maAlignment = strong
      ? 'Strong bullish alignment MA5>MA10>MA20, MAs fanning out'
      : 'Bullish alignment MA5>MA10>MA20';
  } else {
    status = strong ? 'STRONG_BEAR' : 'BEAR';
    result.trendStrength = Math.round(clamp(100 - cleanliness));
    result.maAlignment = strong
      ? 'Strong bearish alignment MA5<MA10<MA20, MAs fanning out'
      : 'Bearish alignment MA5<MA10<MA20';
  }
  result.trendStatus = status;
}

export function volumeStatusFor(
  ratio: number,
  changePercent: number,
  thresholds: InstrumentThresholds
): VolumeStatus {
  if (ratio >= thresholds.volumeHeavyRatio) {
    return changePercent > 0 ? 'HEAVY_VOLUME_UP' : 'HEAVY_VOLUME_DOWN';
  }
  if (ratio <= thresholds.volumeShrinkRatio) {
    return changePercent > 0 ? 'SHRINK_VOLUME_UP' : 'SHRINK_VOLUME_DOWN';
  }
  return 'NORMAL';
}

const VOLUME_TREND_TEXT: Record<VolumeStatus, string> = {
  HEAVY_VOLUME_UP: 'Heavy volume advance, buyers in control',
  HEAVY_VOLUME_DOWN: 'Heavy volume decline, watch for distribution',
  SHRINK_VOLUME_UP: 'Advance on shrinking volume, momentum lacking',
  SHRINK_VOLUME_DOWN: 'Pullback on shrinking volume, selling pressure fading',
  NORMAL: 'Volume in normal range',
};

export function classifyVolume(
  result: AnalysisResult,
  snapshot: IndicatorSnapshot,
  thresholds: InstrumentThresholds
): void {
  if (snapshot.volumeRatio5d === null || snapshot.changePercent === null) {
    return;
  }

  result.volumeRatio5d = snapshot.volumeRatio5d;
  result.volumeClassified = true;
  result.volumeStatus = volumeStatusFor(snapshot.volumeRatio5d, snapshot.changePercent, thresholds);
  result.volumeTrend = VOLUME_TREND_TEXT[result.volumeStatus];
}

export function macdStatusFor(dif: number, dea: number, prevDif: number, prevDea: number): MacdStatus {
  const diff = dif - dea;
  const prevDiff = prevDif - prevDea;

  if (prevDiff <= 0 && diff > 0) {
    return dif > 0 ? 'GOLDEN_CROSS_ABOVE_ZERO' : 'GOLDEN_CROSS';
  }
  if (prevDiff >= 0 && diff < 0) {
    return 'DEAD_CROSS';
  }
  if (diff > 0) return 'BULLISH';
  if (diff < 0) return 'BEARISH';
  return 'NEUTRAL';
}

const MACD_SIGNAL_TEXT: Record<MacdStatus, string> = {
  GOLDEN_CROSS_ABOVE_ZERO: 'DIF crossed above DEA above the zero line, strong buy signal',
  GOLDEN_CROSS: 'DIF crossed above DEA, momentum turning up',
  BULLISH: 'DIF above DEA, bullish momentum intact',
  NEUTRAL: 'DIF and DEA flat, no momentum signal',
  BEARISH: 'DIF below DEA, bearish momentum',
  DEAD_CROSS: 'DIF crossed below DEA, momentum turning down',
};

export function classifyMacd(result: AnalysisResult, snapshot: IndicatorSnapshot): void {
  const { macd } = snapshot;
  if (!macd) return;

  result.macdDif = macd.dif;
  result.macdDea = macd.dea;
  result.macdBar = macd.bar;
  result.macdStatus = macdStatusFor(macd.dif, macd.dea, macd.prevDif, macd.prevDea);
  result.macdSignal = MACD_SIGNAL_TEXT[result.macdStatus];
}

/**
 * Oversold in any window wins over overbought in another.
 */
export function rsiStatusFor(values: readonly (number | null)[]): RsiStatus {
  const present = values.filter((v): v is number => v !== null);
  if (present.some((v) => v < RSI_OVERSOLD)) return 'OVERSOLD';
  if (present.some((v) => v > RSI_OVERBOUGHT)) return 'OVERBOUGHT';
  return 'NEUTRAL';
}

const RSI_SIGNAL_TEXT: Record<RsiStatus, string> = {
  OVERBOUGHT: `RSI above ${RSI_OVERBOUGHT}, overbought, pullback risk`,
  OVERSOLD: `RSI below ${RSI_OVERSOLD}, oversold, rebound potential`,
  NEUTRAL: 'RSI in neutral range',
};

export function classifyRsi(result: AnalysisResult, snapshot: IndicatorSnapshot): void {
  const windows = [snapshot.rsi6, snapshot.rsi12, snapshot.rsi24];
  if (windows.every((v) => v === null)) return;

  result.rsi6 = snapshot.rsi6 ?? result.rsi6;
  result.rsi12 = snapshot.rsi12 ?? result.rsi12;
  result.rsi24 = snapshot.rsi24 ?? result.rsi24;
  result.rsiStatus = rsiStatusFor(windows);
  result.rsiSignal = RSI_SIGNAL_TEXT[result.rsiStatus];
}
