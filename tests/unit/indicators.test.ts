import { describe, expect, it } from 'vitest';
import {
  bias,
  computeIndicators,
  computeMacd,
  computeRsi,
  computeVolumeRatio,
  emaSeries,
  sma,
  smaSeries,
} from '@/scoring/indicators';
import { makeSeries, ramp } from '../helpers/series';

describe('moving averages', () => {
  it('averages the trailing window', () => {
    expect(sma([1, 2, 3, 4, 5], 5)).toBe(3);
    expect(sma([1, 2, 3, 4, 5, 6], 5)).toBe(4);
  });

  it('returns null when the window is incomplete', () => {
    expect(sma([1, 2, 3], 5)).toBeNull();
  });

  it('aligns the SMA series with its input', () => {
    expect(smaSeries([1, 2, 3, 4], 2)).toEqual([null, 1.5, 2.5, 3.5]);
  });

  it('seeds the EMA with the first value', () => {
    expect(emaSeries([10, 20], 3)).toEqual([10, 15]);
  });
});

describe('bias', () => {
  it('is the percent distance from the average', () => {
    expect(bias(105, 100)).toBe(5);
    expect(bias(95, 100)).toBe(-5);
  });

  it('is 0 without a usable average', () => {
    expect(bias(100, null)).toBe(0);
    expect(bias(100, 0)).toBe(0);
  });
});

describe('RSI', () => {
  it('is 100 when the window has no losses', () => {
    expect(computeRsi(ramp(1, 7), 6)).toBe(100);
  });

  it('is 50 when gains and losses balance', () => {
    expect(computeRsi([10, 11, 10, 11, 10, 11, 10], 6)).toBe(50);
  });

  it('needs period + 1 closes', () => {
    expect(computeRsi(ramp(1, 6), 6)).toBeNull();
  });
});

describe('volume ratio', () => {
  it('compares the latest volume with the previous five', () => {
    expect(computeVolumeRatio([100, 100, 100, 100, 100, 300])).toBe(3);
  });

  it('ignores volumes older than the lookback', () => {
    expect(computeVolumeRatio([9999, 200, 200, 200, 200, 200, 100])).toBe(0.5);
  });

  it('needs six bars and a positive average', () => {
    expect(computeVolumeRatio([100, 100, 100, 100, 100])).toBeNull();
    expect(computeVolumeRatio([0, 0, 0, 0, 0, 100])).toBeNull();
  });
});

describe('MACD', () => {
  it('needs 26 closes', () => {
    expect(computeMacd(ramp(100, 25))).toBeNull();
  });

  it('is flat for a constant series', () => {
    const macd = computeMacd(Array.from({ length: 30 }, () => 100));
    expect(macd?.dif).toBeCloseTo(0, 10);
    expect(macd?.dea).toBeCloseTo(0, 10);
    expect(macd?.bar).toBeCloseTo(0, 10);
  });

  it('keeps DIF above DEA on a steady advance', () => {
    const macd = computeMacd(ramp(100, 30));
    expect(macd).not.toBeNull();
    expect(macd?.dif).toBeGreaterThan(0);
    expect(macd?.dif).toBeGreaterThan(macd?.dea ?? Infinity);
    expect(macd?.bar).toBeCloseTo(2 * ((macd?.dif ?? 0) - (macd?.dea ?? 0)), 10);
  });
});

describe('computeIndicators', () => {
  it('fills every indicator for a long series', () => {
    const snapshot = computeIndicators(makeSeries(ramp(100, 30)));

    expect(snapshot.barCount).toBe(30);
    expect(snapshot.close).toBe(129);
    expect(snapshot.prevClose).toBe(128);
    expect(snapshot.changePercent).toBeCloseTo(100 / 128, 10);
    expect(snapshot.ma5).toBe(127);
    expect(snapshot.ma10).toBe(124.5);
    expect(snapshot.ma20).toBe(119.5);
    expect(snapshot.rsi6).toBe(100);
    expect(snapshot.volumeRatio5d).toBe(1);
    expect(snapshot.macd).not.toBeNull();
  });

  it('leaves windows without history as null', () => {
    const snapshot = computeIndicators(makeSeries([100, 101, 102]));

    expect(snapshot.ma5).toBeNull();
    expect(snapshot.ma20).toBeNull();
    expect(snapshot.macd).toBeNull();
    expect(snapshot.rsi6).toBeNull();
    expect(snapshot.volumeRatio5d).toBeNull();
  });

  it('handles an empty series', () => {
    const snapshot = computeIndicators([]);

    expect(snapshot.close).toBe(0);
    expect(snapshot.prevClose).toBeNull();
    expect(snapshot.changePercent).toBeNull();
  });
});
