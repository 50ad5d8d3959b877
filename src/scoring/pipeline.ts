/**
 * Technical analysis pipeline
 *
 * One generic pipeline parameterised by an instrument profile. Stages run in a
 * fixed order and each base stage is followed by the profile's adjustments:
 *
 *   indicators -> trend (+afterTrend) -> volume (+afterVolume)
 *     -> MACD -> RSI -> signal (+afterSignal)
 */

import { createChildLogger } from '@/utils/logger';
import { buildAdjustments } from '@/instruments/adjustments';
import {
  applyMovingAverages,
  classifyMacd,
  classifyRsi,
  classifyTrend,
  classifyVolume,
} from './classifier';
import { computeIndicators } from './indicators';
import { generateSignal } from './signal';
import { createEmptyResult } from './types';
import type { InstrumentProfile, StageAdjustment, StageAdjustments } from '@/instruments/types';
import type { AnalysisResult, PriceSeries } from './types';

const logger = createChildLogger('pipeline');

export const MIN_BARS_FOR_TREND = 20;

function runAdjustments(result: AnalysisResult, adjustments: StageAdjustment[]): void {
  for (const adjust of adjustments) {
    adjust(result);
  }
}

export interface AnalysisPipeline {
  readonly profile: InstrumentProfile;
  analyze(series: PriceSeries, code: string): AnalysisResult;
}

export function createAnalysisPipeline(
  profile: InstrumentProfile,
  adjustments: StageAdjustments = buildAdjustments(profile)
): AnalysisPipeline {
  const { thresholds } = profile;

  return {
    profile,
    analyze(series: PriceSeries, code: string): AnalysisResult {
      const result = createEmptyResult(code);

      if (series.length < MIN_BARS_FOR_TREND) {
        logger.warn(
          { code, bars: series.length, profile: profile.name },
          'Short price history, analysis will be partial'
        );
      }

      const snapshot = computeIndicators(series);
      applyMovingAverages(result, snapshot);

      classifyTrend(result, snapshot, thresholds);
      runAdjustments(result, adjustments.afterTrend);

      classifyVolume(result, snapshot, thresholds);
      runAdjustments(result, adjustments.afterVolume);

      classifyMacd(result, snapshot);
      classifyRsi(result, snapshot);

      generateSignal(result, thresholds);
      runAdjustments(result, adjustments.afterSignal);

      logger.debug(
        { code, profile: profile.name, signal: result.buySignal, score: result.signalScore },
        'Technical analysis complete'
      );
      return result;
    },
  };
}
