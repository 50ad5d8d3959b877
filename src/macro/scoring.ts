/**
 * Macro factor scoring
 *
 * Each factor maps onto a fixed band; the total is the mean of the factors
 * that were actually available (50 when none were).
 */

import { createChildLogger } from '@/utils/logger';
import { nowIso } from '@/core/time';
import { mean, roundTo, toScore } from '@/scoring/normalize';
import type { MacroFactor, MacroFactors, MacroImpact, MacroScoreReport } from '@/scoring/types';
import type { MacroDataSource } from './types';

const logger = createChildLogger('macro_scoring');

export const NEUTRAL_SCORE = 50;

/** Inputs already reduced to plain numbers; null marks a missing factor. */
export interface MacroSnapshot {
  dxy: { value: number; changePercent: number } | null;
  realRate: number | null;
  inflation: number | null;
  centralBankPurchases: number | null;
  geopoliticalRisk: number | null;
}

type Band = readonly [score: number, impact: MacroImpact];

/** A DXY move beyond ±0.5% in a day counts as directional. */
export function scoreDollarChange(changePercent: number): Band {
  if (changePercent > 0.5) return [30, 'bearish'];
  if (changePercent < -0.5) return [70, 'bullish'];
  return [50, 'neutral'];
}

export function scoreRealRate(rate: number): Band {
  if (rate > 2.0) return [20, 'strongly_bearish'];
  if (rate > 1.0) return [35, 'bearish'];
  if (rate > 0) return [50, 'neutral'];
  return [75, 'bullish'];
}

export function scoreInflation(rate: number): Band {
  if (rate > 4.0) return [80, 'strongly_bullish'];
  if (rate > 3.0) return [70, 'bullish'];
  if (rate > 2.0) return [50, 'neutral'];
  return [30, 'bearish'];
}

export function scoreCentralBankPurchases(tonnes: number): Band {
  if (tonnes > 300) return [85, 'strongly_bullish'];
  if (tonnes > 150) return [75, 'bullish'];
  if (tonnes > 50) return [60, 'slightly_bullish'];
  return [50, 'neutral'];
}

export function scoreGeopoliticalRisk(index: number): Band {
  if (index > 70) return [80, 'strongly_bullish'];
  if (index > 50) return [65, 'bullish'];
  if (index > 30) return [50, 'neutral'];
  return [30, 'bearish'];
}

function factor(value: number, [score, impact]: Band, change?: number): MacroFactor {
  return change === undefined ? { value, impact, score } : { value, change, impact, score };
}

export function scoreMacroFactors(snapshot: MacroSnapshot): MacroFactors {
  const factors: MacroFactors = {};

  if (snapshot.dxy) {
    const { value, changePercent } = snapshot.dxy;
    factors.dxy = factor(roundTo(value), scoreDollarChange(changePercent), roundTo(changePercent));
  }
  if (snapshot.realRate !== null) {
    factors.real_rate = factor(snapshot.realRate, scoreRealRate(snapshot.realRate));
  }
  if (snapshot.inflation !== null) {
    factors.inflation = factor(snapshot.inflation, scoreInflation(snapshot.inflation));
  }
  if (snapshot.centralBankPurchases !== null) {
    factors.central_bank = factor(
      snapshot.centralBankPurchases,
      scoreCentralBankPurchases(snapshot.centralBankPurchases)
    );
  }
  if (snapshot.geopoliticalRisk !== null) {
    factors.geopolitical = factor(
      snapshot.geopoliticalRisk,
      scoreGeopoliticalRisk(snapshot.geopoliticalRisk)
    );
  }

  return factors;
}

export function presentFactors(factors: MacroFactors): MacroFactor[] {
  return Object.values(factors).filter((f): f is MacroFactor => f !== undefined);
}

export function totalMacroScore(factors: MacroFactors): number {
  const scores = presentFactors(factors).map((f) => f.score);
  return toScore(mean(scores) ?? NEUTRAL_SCORE);
}

const BULLISH_IMPACTS: ReadonlySet<MacroImpact> = new Set([
  'bullish',
  'strongly_bullish',
  'slightly_bullish',
]);
const BEARISH_IMPACTS: ReadonlySet<MacroImpact> = new Set(['bearish', 'strongly_bearish']);

export function summarizeMacroFactors(factors: MacroFactors): string {
  const entries = presentFactors(factors);
  if (entries.length === 0) {
    return 'No macro data available, staying neutral';
  }

  const bullish = entries.filter((f) => BULLISH_IMPACTS.has(f.impact)).length;
  const bearish = entries.filter((f) => BEARISH_IMPACTS.has(f.impact)).length;

  if (bullish > 0 && bearish === 0) {
    return `Macro backdrop overall bullish (${bullish} bullish factors)`;
  }
  if (bearish > 0 && bullish === 0) {
    return `Macro backdrop overall bearish (${bearish} bearish factors)`;
  }
  if (bullish > bearish) {
    return `Macro backdrop leaning bullish (${bullish} bullish vs ${bearish} bearish)`;
  }
  if (bearish > bullish) {
    return `Macro backdrop leaning bearish (${bullish} bullish vs ${bearish} bearish)`;
  }
  return 'Macro backdrop neutral, watch technical signals';
}

export function buildMacroReport(snapshot: MacroSnapshot, now: Date = new Date()): MacroScoreReport {
  const factors = scoreMacroFactors(snapshot);
  return {
    totalScore: totalMacroScore(factors),
    factors,
    summary: summarizeMacroFactors(factors),
    timestamp: nowIso(now),
  };
}

async function attempt<T>(label: string, load: () => Promise<T | null>): Promise<T | null> {
  try {
    return await load();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ factor: label, error: message }, 'Macro factor unavailable');
    return null;
  }
}

/**
 * Collects every factor from the data source one after another.
 * A failing accessor simply leaves its factor out.
 */
export async function collectMacroSnapshot(source: MacroDataSource): Promise<MacroSnapshot> {
  const dollar = await attempt('dxy', () => source.getDollarIndex(5));
  let dxy: MacroSnapshot['dxy'] = null;
  if (dollar && dollar.points.length >= 2) {
    const current = dollar.points[dollar.points.length - 1].close;
    const previous = dollar.points[dollar.points.length - 2].close;
    if (previous !== 0) {
      dxy = { value: current, changePercent: ((current - previous) / previous) * 100 };
    }
  }

  const realRate = await attempt('real_rate', () => source.getRealInterestRate());
  const inflation = await attempt('inflation', () => source.getInflationRate());
  const purchases = await attempt('central_bank', () => source.getCentralBankPurchases());
  const geopoliticalRisk = await attempt('geopolitical', () => source.getGeopoliticalRiskIndex());

  return {
    dxy,
    realRate,
    inflation,
    centralBankPurchases: purchases ? purchases.totalPurchases : null,
    geopoliticalRisk,
  };
}

export async function getMacroScore(source: MacroDataSource): Promise<MacroScoreReport> {
  const snapshot = await collectMacroSnapshot(source);
  const report = buildMacroReport(snapshot);
  logger.info(
    { totalScore: report.totalScore, factors: Object.keys(report.factors) },
    'Macro score computed'
  );
  return report;
}
