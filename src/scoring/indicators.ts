/**
 * Indicator Engine
 * Moving averages, bias, MACD, RSI and volume ratio computed from daily bars.
 * Every function is pure; windows that lack history come back as null.
 */

import { mean } from './normalize';
import type { PriceSeries } from './types';

export const MACD_FAST = 12;
export const MACD_SLOW = 26;
export const MACD_SIGNAL = 9;
export const VOLUME_LOOKBACK = 5;

export interface MacdSnapshot {
  dif: number;
  dea: number;
  bar: number;
  prevDif: number;
  prevDea: number;
}

export interface IndicatorSnapshot {
  barCount: number;
  close: number;
  prevClose: number | null;
  changePercent: number | null;
  ma5: number | null;
  ma10: number | null;
  ma20: number | null;
  /** Trailing SMA series aligned to the input; null where the window is incomplete. */
  maSeries: {
    ma5: (number | null)[];
    ma10: (number | null)[];
    ma20: (number | null)[];
  };
  macd: MacdSnapshot | null;
  rsi6: number | null;
  rsi12: number | null;
  rsi24: number | null;
  volumeRatio5d: number | null;
}

export function smaSeries(values: readonly number[], period: number): (number | null)[] {
  const out: (number | null)[] = [];
  let windowSum = 0;
  for (let i = 0; i < values.length; i++) {
    windowSum += values[i];
    if (i >= period) {
      windowSum -= values[i - period];
    }
    out.push(i >= period - 1 ? windowSum / period : null);
  }
  return out;
}

export function sma(values: readonly number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  return mean(values.slice(-period));
}

/**
 * Exponential moving average with alpha = 2 / (period + 1), seeded with the first value.
 */
export function emaSeries(values: readonly number[], period: number): number[] {
  const alpha = 2 / (period + 1);
  const out: number[] = [];
  for (let i = 0; i < values.length; i++) {
    out.push(i === 0 ? values[0] : alpha * values[i] + (1 - alpha) * out[i - 1]);
  }
  return out;
}

export function bias(price: number, movingAverage: number | null): number {
  if (movingAverage === null || movingAverage === 0) return 0;
  return ((price - movingAverage) / movingAverage) * 100;
}

export function computeMacd(closes: readonly number[]): MacdSnapshot | null {
  if (closes.length < MACD_SLOW) return null;

  const fast = emaSeries(closes, MACD_FAST);
  const slow = emaSeries(closes, MACD_SLOW);
  const difSeries = fast.map((value, i) => value - slow[i]);
  const deaSeries = emaSeries(difSeries, MACD_SIGNAL);

  const last = closes.length - 1;
  const dif = difSeries[last];
  const dea = deaSeries[last];

  return {
    dif,
    dea,
    bar: 2 * (dif - dea),
    prevDif: difSeries[last - 1],
    prevDea: deaSeries[last - 1],
  };
}

/**
 * RSI from simple average gain / loss over the last `period` changes.
 * A window without losses is 100.
 */
export function computeRsi(closes: readonly number[], period: number): number | null {
  if (closes.length < period + 1) return null;

  let gains = 0;
  let losses = 0;
  for (let i = closes.length - period; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    if (change > 0) gains += change;
    else losses -= change;
  }

  const avgGain = gains / period;
  const avgLoss = losses / period;
  if (avgLoss === 0) return 100;

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Latest volume over the mean of the preceding five sessions (latest excluded).
 */
export function computeVolumeRatio(volumes: readonly number[]): number | null {
  if (volumes.length < VOLUME_LOOKBACK + 1) return null;

  const previous = volumes.slice(-(VOLUME_LOOKBACK + 1), -1);
  const avg = mean(previous);
  if (avg === null || avg <= 0) return null;

  return volumes[volumes.length - 1] / avg;
}

export function computeIndicators(series: PriceSeries): IndicatorSnapshot {
  const closes = series.map((bar) => bar.close);
  const volumes = series.map((bar) => bar.volume);
  const count = series.length;

  const close = count > 0 ? closes[count - 1] : 0;
  const prevClose = count > 1 ? closes[count - 2] : null;
  const changePercent =
    prevClose !== null && prevClose !== 0 ? ((close - prevClose) / prevClose) * 100 : null;

  return {
    barCount: count,
    close,
    prevClose,
    changePercent,
    ma5: sma(closes, 5),
    ma10: sma(closes, 10),
    ma20: sma(closes, 20),
    maSeries: {
      ma5: smaSeries(closes, 5),
      ma10: smaSeries(closes, 10),
      ma20: smaSeries(closes, 20),
    },
    macd: computeMacd(closes),
    rsi6: computeRsi(closes, 6),
    rsi12: computeRsi(closes, 12),
    rsi24: computeRsi(closes, 24),
    volumeRatio5d: computeVolumeRatio(volumes),
  };
}
