import type { AnalysisResult, VolumeStatus } from '@/scoring/types';

export interface InstrumentThresholds {
  /** Max % above MA5 before a buy is refused (no-chase rule). */
  biasThreshold: number;
  volumeHeavyRatio: number;
  volumeShrinkRatio: number;
  /** Fractional distance from an MA still counted as sitting on support. */
  maSupportTolerance: number;
  /** MA5-MA20 spread (%) separating STRONG_* trends from plain ones. */
  strongTrendSpreadPct: number;
}

export interface InstrumentCommentary {
  bullishTrend?: string;
  bearishTrend?: string;
  volumeTrend?: Partial<Record<VolumeStatus, string>>;
  buyReason?: string;
  sellRisk?: string;
  marketNotes: string[];
}

export interface InstrumentProfile {
  name: string;
  displayName: string;
  description: string;
  thresholds: InstrumentThresholds;
  commentary: InstrumentCommentary;
}

export type StageAdjustment = (result: AnalysisResult) => void;

/**
 * Post-processing applied after each base stage, in list order.
 */
export interface StageAdjustments {
  afterTrend: StageAdjustment[];
  afterVolume: StageAdjustment[];
  afterSignal: StageAdjustment[];
}
