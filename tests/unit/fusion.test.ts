import { describe, expect, it, vi } from 'vitest';
import { MacroFusionEngine, fuseScores, type MacroContext } from '@/macro/fusion';
import { createEmptyResult } from '@/scoring/types';
import type { AnalysisResult } from '@/scoring/types';
import type { MacroDataSource, NewsSearchClient } from '@/macro/types';

function makeResult(signalScore: number): AnalysisResult {
  return { ...createEmptyResult('GC=F'), signalScore };
}

function failingSource(): MacroDataSource {
  const fail = async (): Promise<never> => {
    throw new Error('provider down');
  };
  return {
    getDollarIndex: fail,
    getTreasuryYield: fail,
    getPolicyRate: fail,
    getInflationRate: fail,
    getRealInterestRate: fail,
    getCentralBankPurchases: fail,
    getGeopoliticalRiskIndex: fail,
  };
}

describe('fuseScores', () => {
  it('blends news, data and technical scores', () => {
    expect(fuseScores(80, 60, 75)).toEqual({ totalMacro: 71, finalScore: 76 });
  });

  it('stays within 0-100', () => {
    expect(fuseScores(100, 100, 100)).toEqual({ totalMacro: 100, finalScore: 100 });
    expect(fuseScores(0, 0, 0)).toEqual({ totalMacro: 0, finalScore: 0 });
  });
});

describe('MacroFusionEngine', () => {
  it('records every intermediate score on the result', () => {
    const engine = new MacroFusionEngine({ macroSource: null, newsClient: null });
    const context: MacroContext = {
      report: { totalScore: 75, factors: {}, summary: 'test summary', timestamp: '2025-01-31T00:00:00Z' },
      news: {},
      newsScore: 60,
    };
    const result = makeResult(80);

    engine.applyContext(result, context);

    expect(result.signalScore).toBe(76);
    expect(result.macro).toEqual({
      macroScore: 75,
      macroFactors: {},
      macroSummary: 'test summary',
      macroTimestamp: '2025-01-31T00:00:00Z',
      technicalScore: 80,
      macroNewsScore: 60,
      macroDataScore: 75,
      totalMacroScore: 71,
    });
  });

  it('keeps the technical buy decision', () => {
    const engine = new MacroFusionEngine({ macroSource: null, newsClient: null });
    const result = { ...makeResult(62), buySignal: 'BUY' as const };

    engine.applyContext(result, {
      report: { totalScore: 20, factors: {}, summary: 's', timestamp: 't' },
      news: {},
      newsScore: 50,
    });

    expect(result.buySignal).toBe('BUY');
  });

  it('degrades to neutral when both collaborators fail', async () => {
    const newsClient: NewsSearchClient = {
      searchMacroNews: vi.fn(async () => {
        throw new Error('search down');
      }),
    };
    const engine = new MacroFusionEngine({ macroSource: failingSource(), newsClient });

    const result = await engine.apply(makeResult(80));

    expect(result.macro?.macroDataScore).toBe(50);
    expect(result.macro?.macroNewsScore).toBe(50);
    expect(result.macro?.totalMacroScore).toBe(50);
    expect(result.signalScore).toBe(68);
  });

  it('runs without any collaborators configured', async () => {
    const engine = new MacroFusionEngine({ macroSource: null, newsClient: null });

    const context = await engine.loadContext();

    expect(context.report.totalScore).toBe(50);
    expect(context.news).toEqual({});
    expect(context.newsScore).toBe(50);
  });

  it('asks the news client for the configured number of results', async () => {
    const newsClient: NewsSearchClient = { searchMacroNews: vi.fn(async () => ({})) };
    const engine = new MacroFusionEngine({ macroSource: null, newsClient, newsMaxResults: 3 });

    await engine.loadNews();

    expect(newsClient.searchMacroNews).toHaveBeenCalledWith(3);
  });

  it('refuses to fuse the same result twice', async () => {
    const engine = new MacroFusionEngine({ macroSource: null, newsClient: null });
    const result = await engine.apply(makeResult(70));

    await expect(engine.apply(result)).rejects.toThrow('Macro fusion already applied to GC=F');
  });
});
