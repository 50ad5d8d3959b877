/**
 * Signal Generator
 * Weighted rubric over the classified states:
 *   trend 30, bias 20, MA support 10, volume 15, MACD 15, RSI 10
 */

import { toScore } from './normalize';
import { SIGNAL_LABELS, isBullishTrend, isBuyClass } from './types';
import type { InstrumentThresholds } from '@/instruments/types';
import type {
  AnalysisResult,
  BuySignal,
  MacdStatus,
  RsiStatus,
  TrendStatus,
  VolumeStatus,
} from './types';

const TREND_POINTS: Record<TrendStatus, number> = {
  STRONG_BULL: 30,
  BULL: 24,
  NEUTRAL: 12,
  BEAR: 4,
  STRONG_BEAR: 0,
};

const VOLUME_POINTS: Record<VolumeStatus, number> = {
  SHRINK_VOLUME_DOWN: 15,
  HEAVY_VOLUME_UP: 12,
  NORMAL: 9,
  SHRINK_VOLUME_UP: 6,
  HEAVY_VOLUME_DOWN: 0,
};

const MACD_POINTS: Record<MacdStatus, number> = {
  GOLDEN_CROSS_ABOVE_ZERO: 15,
  GOLDEN_CROSS: 12,
  BULLISH: 10,
  NEUTRAL: 6,
  BEARISH: 3,
  DEAD_CROSS: 0,
};

const RSI_POINTS: Record<RsiStatus, number> = {
  OVERSOLD: 10,
  NEUTRAL: 6,
  OVERBOUGHT: 0,
};

/**
 * Collects reasons and risks for one stage, dropping repeats.
 */
class FindingList {
  readonly reasons: string[] = [];
  readonly risks: string[] = [];

  reason(text: string): void {
    if (!this.reasons.includes(text)) this.reasons.push(text);
  }

  risk(text: string): void {
    if (!this.risks.includes(text)) this.risks.push(text);
  }
}

function scoreTrend(result: AnalysisResult, findings: FindingList): number {
  switch (result.trendStatus) {
    case 'STRONG_BULL':
      findings.reason(`Strong bullish MA alignment (strength ${result.trendStrength}/100)`);
      break;
    case 'BULL':
      findings.reason('Bullish MA alignment MA5>MA10>MA20');
      break;
    case 'BEAR':
      findings.risk('Bearish MA alignment, trading against the trend');
      break;
    case 'STRONG_BEAR':
      findings.risk('Strong bearish MA alignment, avoid new longs');
      break;
    case 'NEUTRAL':
      break;
  }
  return TREND_POINTS[result.trendStatus];
}

function scoreBias(
  result: AnalysisResult,
  thresholds: InstrumentThresholds,
  findings: FindingList
): number {
  const biasMa5 = result.biasMa5;
  const limit = thresholds.biasThreshold;

  if (result.ma5 <= 0) {
    return 12;
  }
  if (biasMa5 > limit) {
    findings.risk(
      `Price ${biasMa5.toFixed(2)}% above MA5 exceeds the ${limit}% no-chase threshold`
    );
    return 0;
  }
  if (biasMa5 < -limit) {
    findings.risk(`Price ${Math.abs(biasMa5).toFixed(2)}% below MA5, short-term trend breaking`);
    return 8;
  }
  if (biasMa5 < 0) {
    findings.reason(`Pullback toward MA5 (bias ${biasMa5.toFixed(2)}%), favorable entry`);
    return 18;
  }
  if (biasMa5 <= limit / 2) {
    findings.reason(`Price close to MA5 (bias ${biasMa5.toFixed(2)}%)`);
    return 20;
  }
  return 12;
}

function isOnSupport(price: number, movingAverage: number, tolerance: number): boolean {
  if (movingAverage <= 0) return false;
  return Math.abs(price - movingAverage) / movingAverage <= tolerance;
}

function scoreSupport(
  result: AnalysisResult,
  thresholds: InstrumentThresholds,
  findings: FindingList
): number {
  if (!isBullishTrend(result.trendStatus)) return 0;

  if (isOnSupport(result.currentPrice, result.ma5, thresholds.maSupportTolerance)) {
    findings.reason('Price holding MA5 support');
    return 10;
  }
  if (isOnSupport(result.currentPrice, result.ma10, thresholds.maSupportTolerance)) {
    findings.reason('Price holding MA10 support');
    return 6;
  }
  return 0;
}

function scoreVolume(result: AnalysisResult, findings: FindingList): number {
  switch (result.volumeStatus) {
    case 'SHRINK_VOLUME_DOWN':
      findings.reason('Pullback on shrinking volume, sellers exhausted');
      break;
    case 'HEAVY_VOLUME_UP':
      findings.reason('Advance confirmed by heavy volume');
      break;
    case 'SHRINK_VOLUME_UP':
      findings.risk('Advance on shrinking volume, weak participation');
      break;
    case 'HEAVY_VOLUME_DOWN':
      findings.risk('Heavy volume sell-off');
      break;
    case 'NORMAL':
      break;
  }
  return VOLUME_POINTS[result.volumeStatus];
}

function scoreMacd(result: AnalysisResult, findings: FindingList): number {
  switch (result.macdStatus) {
    case 'GOLDEN_CROSS_ABOVE_ZERO':
      findings.reason('MACD golden cross above the zero line');
      break;
    case 'GOLDEN_CROSS':
      findings.reason('MACD golden cross');
      break;
    case 'BULLISH':
      findings.reason('MACD momentum bullish');
      break;
    case 'BEARISH':
      findings.risk('MACD momentum bearish');
      break;
    case 'DEAD_CROSS':
      findings.risk('MACD dead cross');
      break;
    case 'NEUTRAL':
      break;
  }
  return MACD_POINTS[result.macdStatus];
}

function scoreRsi(result: AnalysisResult, findings: FindingList): number {
  if (result.rsiStatus === 'OVERSOLD') {
    findings.reason(`RSI oversold (RSI6 ${result.rsi6.toFixed(1)}), rebound potential`);
  } else if (result.rsiStatus === 'OVERBOUGHT') {
    findings.risk(`RSI overbought (RSI6 ${result.rsi6.toFixed(1)}), pullback risk`);
  }
  return RSI_POINTS[result.rsiStatus];
}

export function signalForScore(score: number, trend: TrendStatus): BuySignal {
  if (score >= 75 && isBullishTrend(trend)) return 'STRONG_BUY';
  if (score >= 60) return 'BUY';
  if (score >= 45) return 'HOLD';
  if (score >= 30) return 'SELL';
  return 'STRONG_SELL';
}

export function generateSignal(result: AnalysisResult, thresholds: InstrumentThresholds): void {
  const findings = new FindingList();

  const total =
    scoreTrend(result, findings) +
    scoreBias(result, thresholds, findings) +
    scoreSupport(result, thresholds, findings) +
    scoreVolume(result, findings) +
    scoreMacd(result, findings) +
    scoreRsi(result, findings);

  const score = toScore(total);
  let signal = signalForScore(score, result.trendStatus);

  if (isBuyClass(signal) && result.biasMa5 > thresholds.biasThreshold) {
    findings.risk(
      `No-chase rule: ${SIGNAL_LABELS[signal]} downgraded to Hold while price is extended above MA5`
    );
    signal = 'HOLD';
  }

  result.signalScore = score;
  result.buySignal = signal;
  for (const reason of findings.reasons) result.signalReasons.push(reason);
  for (const risk of findings.risks) result.riskFactors.push(risk);
}
