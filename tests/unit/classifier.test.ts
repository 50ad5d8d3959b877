import { describe, expect, it } from 'vitest';
import {
  applyMovingAverages,
  classifyTrend,
  classifyVolume,
  macdStatusFor,
  rsiStatusFor,
  volumeStatusFor,
} from '@/scoring/classifier';
import { computeIndicators } from '@/scoring/indicators';
import { createEmptyResult } from '@/scoring/types';
import type { AnalysisResult, PriceSeries } from '@/scoring/types';
import type { InstrumentThresholds } from '@/instruments/types';
import { DEFAULT_THRESHOLDS, makeSeries, ramp } from '../helpers/series';

const GOLD_THRESHOLDS: InstrumentThresholds = {
  ...DEFAULT_THRESHOLDS,
  biasThreshold: 3,
  volumeHeavyRatio: 1.8,
  strongTrendSpreadPct: 3,
};

function classify(series: PriceSeries, thresholds: InstrumentThresholds = DEFAULT_THRESHOLDS): AnalysisResult {
  const result = createEmptyResult('TEST');
  const snapshot = computeIndicators(series);
  applyMovingAverages(result, snapshot);
  classifyTrend(result, snapshot, thresholds);
  classifyVolume(result, snapshot, thresholds);
  return result;
}

describe('trend classification', () => {
  it('marks a persistent wide bullish spread as STRONG_BULL', () => {
    const result = classify(makeSeries(ramp(100, 30)));

    expect(result.trendStatus).toBe('STRONG_BULL');
    expect(result.trendStrength).toBe(100);
    expect(result.maAlignment).toBe('Strong bullish alignment MA5>MA10>MA20, MAs fanning out');
  });

  it('marks a fresh alignment as plain BULL', () => {
    const result = classify(makeSeries(ramp(100, 20)));

    expect(result.trendStatus).toBe('BULL');
    expect(result.trendStrength).toBe(84);
    expect(result.maAlignment).toBe('Bullish alignment MA5>MA10>MA20');
  });

  it('mirrors strength for bearish alignment', () => {
    const result = classify(makeSeries(ramp(129, 30, -1)));

    expect(result.trendStatus).toBe('STRONG_BEAR');
    expect(result.trendStrength).toBe(0);
  });

  it('is NEUTRAL when the averages are intertwined', () => {
    const result = classify(makeSeries(Array.from({ length: 30 }, () => 100)));

    expect(result.trendStatus).toBe('NEUTRAL');
    expect(result.trendStrength).toBe(50);
    expect(result.maAlignment).toBe('MAs intertwined, no clear direction');
  });

  it('keeps defaults below 20 bars', () => {
    const result = classify(makeSeries(ramp(100, 19)));

    expect(result.trendStatus).toBe('NEUTRAL');
    expect(result.trendStrength).toBe(50);
    expect(result.ma20).toBe(0);
    expect(result.ma5).toBe(116);
  });
});

describe('volume classification', () => {
  it('applies the heavy and shrink ratios inclusively', () => {
    expect(volumeStatusFor(1.8, 1, GOLD_THRESHOLDS)).toBe('HEAVY_VOLUME_UP');
    expect(volumeStatusFor(1.79, 1, GOLD_THRESHOLDS)).toBe('NORMAL');
    expect(volumeStatusFor(0.7, -0.5, GOLD_THRESHOLDS)).toBe('SHRINK_VOLUME_DOWN');
    expect(volumeStatusFor(0.71, -0.5, GOLD_THRESHOLDS)).toBe('NORMAL');
  });

  it('treats an unchanged close as down', () => {
    expect(volumeStatusFor(2, 0, DEFAULT_THRESHOLDS)).toBe('HEAVY_VOLUME_DOWN');
    expect(volumeStatusFor(0.5, 0, DEFAULT_THRESHOLDS)).toBe('SHRINK_VOLUME_DOWN');
  });

  it('uses the profile ratio', () => {
    const volumes = [...Array.from({ length: 29 }, () => 1000), 1600];
    const series = makeSeries(ramp(100, 30), volumes);

    expect(classify(series, DEFAULT_THRESHOLDS).volumeStatus).toBe('HEAVY_VOLUME_UP');
    expect(classify(series, GOLD_THRESHOLDS).volumeStatus).toBe('NORMAL');
  });

  it('keeps the sentinel ratio with fewer than six bars', () => {
    const result = classify(makeSeries([100, 101, 102, 103, 104]));

    expect(result.volumeRatio5d).toBe(0);
    expect(result.volumeClassified).toBe(false);
    expect(result.volumeStatus).toBe('NORMAL');
    expect(result.volumeTrend).toBe('Insufficient history for volume analysis');
  });
});

describe('MACD status', () => {
  it('detects crosses from the previous bar', () => {
    expect(macdStatusFor(1, 0.5, -0.1, 0)).toBe('GOLDEN_CROSS_ABOVE_ZERO');
    expect(macdStatusFor(-0.5, -1, -1, -0.9)).toBe('GOLDEN_CROSS');
    expect(macdStatusFor(0.5, 1, 1, 0.9)).toBe('DEAD_CROSS');
  });

  it('falls back to the side of DEA without a cross', () => {
    expect(macdStatusFor(1, 0.5, 1, 0.6)).toBe('BULLISH');
    expect(macdStatusFor(0.5, 1, 0.5, 0.9)).toBe('BEARISH');
    expect(macdStatusFor(0, 0, 0, 0)).toBe('NEUTRAL');
  });
});

describe('RSI status', () => {
  it('lets oversold win over overbought', () => {
    expect(rsiStatusFor([25, 75, 50])).toBe('OVERSOLD');
  });

  it('flags overbought above 70', () => {
    expect(rsiStatusFor([75, 60, null])).toBe('OVERBOUGHT');
    expect(rsiStatusFor([70, 30, 50])).toBe('NEUTRAL');
  });

  it('is neutral without data', () => {
    expect(rsiStatusFor([null, null, null])).toBe('NEUTRAL');
  });
});
