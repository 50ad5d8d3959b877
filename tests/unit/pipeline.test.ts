import { describe, expect, it } from 'vitest';
import { createAnalysisPipeline } from '@/scoring/pipeline';
import { NO_ADJUSTMENTS } from '@/instruments/adjustments';
import { loadProfile } from '@/instruments/profiles';
import type { InstrumentProfile } from '@/instruments/types';
import { DEFAULT_THRESHOLDS, makeSeries, ramp } from '../helpers/series';

function makeProfile(overrides: Partial<InstrumentProfile> = {}): InstrumentProfile {
  return {
    name: 'test',
    displayName: 'Test',
    description: 'test profile',
    thresholds: DEFAULT_THRESHOLDS,
    commentary: { marketNotes: [] },
    ...overrides,
  };
}

describe('analysis pipeline', () => {
  it('returns a low-confidence HOLD for a very short series', () => {
    const result = createAnalysisPipeline(makeProfile()).analyze(makeSeries([100, 101, 102]), 'SHORT');

    expect(result.code).toBe('SHORT');
    expect(result.currentPrice).toBe(102);
    expect(result.trendStatus).toBe('NEUTRAL');
    expect(result.volumeStatus).toBe('NORMAL');
    expect(result.macdStatus).toBe('NEUTRAL');
    expect(result.rsiStatus).toBe('NEUTRAL');
    expect(result.rsi6).toBe(50);
    expect(result.signalScore).toBe(45);
    expect(result.buySignal).toBe('HOLD');
    expect(result.macro).toBeNull();
  });

  it('rates a steady advance as STRONG_BUY with the default profile', () => {
    const result = loadAndAnalyze('default');

    expect(result.trendStatus).toBe('STRONG_BULL');
    expect(result.macdStatus).toBe('BULLISH');
    expect(result.rsiStatus).toBe('OVERBOUGHT');
    expect(result.signalScore).toBe(79);
    expect(result.buySignal).toBe('STRONG_BUY');
    expect(result.signalReasons).toEqual([
      'Strong bullish MA alignment (strength 100/100)',
      'Price close to MA5 (bias 1.57%)',
      'Price holding MA5 support',
      'MACD momentum bullish',
    ]);
    expect(result.riskFactors).toEqual(['RSI overbought (RSI6 100.0), pullback risk']);
  });

  it('applies the gold thresholds and commentary', () => {
    const result = loadAndAnalyze('gold');

    expect(result.trendStatus).toBe('STRONG_BULL');
    expect(result.maAlignment).toBe(
      'Strong bullish alignment MA5>MA10>MA20, MAs fanning out (gold uptrends tend to persist)'
    );
    expect(result.volumeTrend).toBe('Volume in normal range (gold)');
    expect(result.signalScore).toBe(71);
    expect(result.buySignal).toBe('BUY');
    expect(result.signalReasons).toEqual([
      'Strong bullish MA alignment (strength 100/100)',
      'Price holding MA5 support',
      'MACD momentum bullish',
      '✅ Gold buy signal, safe-haven demand adds reliability',
    ]);
  });

  it('never lets commentary change a status or the score', () => {
    const gold = loadProfile('gold');
    const profile = makeProfile({ commentary: gold.commentary });
    const volumes = [...Array.from({ length: 29 }, () => 1000), 400];
    const series = makeSeries([...ramp(100, 25), 120, 118, 116, 114, 112], volumes);

    const base = createAnalysisPipeline(profile, NO_ADJUSTMENTS).analyze(series, 'X');
    const specialized = createAnalysisPipeline(profile).analyze(series, 'X');

    expect(specialized.trendStatus).toBe(base.trendStatus);
    expect(specialized.volumeStatus).toBe(base.volumeStatus);
    expect(specialized.macdStatus).toBe(base.macdStatus);
    expect(specialized.rsiStatus).toBe(base.rsiStatus);
    expect(specialized.signalScore).toBe(base.signalScore);
    expect(specialized.buySignal).toBe(base.buySignal);
    expect(specialized.volumeStatus).toBe('SHRINK_VOLUME_DOWN');
    expect(specialized.volumeTrend).toBe(
      'Pullback on shrinking volume, a clear shake-out pattern (gold, constructive)'
    );
    expect(base.volumeTrend).toBe('Pullback on shrinking volume, selling pressure fading');
  });

  it('applies the profile phrasing when the latest bar traded no volume', () => {
    const gold = loadProfile('gold');
    const volumes = [...Array.from({ length: 29 }, () => 1000), 0];
    const series = makeSeries([...ramp(100, 25), 120, 118, 116, 114, 112], volumes);

    const result = createAnalysisPipeline(gold).analyze(series, 'GC=F');

    expect(result.volumeRatio5d).toBe(0);
    expect(result.volumeClassified).toBe(true);
    expect(result.volumeStatus).toBe('SHRINK_VOLUME_DOWN');
    expect(result.volumeTrend).toBe(
      'Pullback on shrinking volume, a clear shake-out pattern (gold, constructive)'
    );
  });

  it('does not rewrite volume text when volume was never classified', () => {
    const gold = loadProfile('gold');
    const result = createAnalysisPipeline(gold).analyze(makeSeries([100, 101, 102]), 'GC=F');

    expect(result.volumeTrend).toBe('Insufficient history for volume analysis');
  });
});

function loadAndAnalyze(name: string) {
  return createAnalysisPipeline(loadProfile(name)).analyze(makeSeries(ramp(100, 30)), 'TEST');
}
