/**
 * Builds the post-stage adjustment lists from a profile's commentary.
 * Adjustments only touch descriptive text and the reason / risk lists.
 */

import { isBearishTrend, isBullishTrend, isBuyClass, isSellClass } from '@/scoring/types';
import type { InstrumentProfile, StageAdjustment, StageAdjustments } from './types';

export const NO_ADJUSTMENTS: StageAdjustments = {
  afterTrend: [],
  afterVolume: [],
  afterSignal: [],
};

function trendCommentary(profile: InstrumentProfile): StageAdjustment | null {
  const { bullishTrend, bearishTrend } = profile.commentary;
  if (!bullishTrend && !bearishTrend) return null;

  return (result) => {
    if (bullishTrend && isBullishTrend(result.trendStatus)) {
      result.maAlignment += bullishTrend;
    } else if (bearishTrend && isBearishTrend(result.trendStatus)) {
      result.maAlignment += bearishTrend;
    }
  };
}

function volumePhrasing(profile: InstrumentProfile): StageAdjustment | null {
  const phrasing = profile.commentary.volumeTrend;
  if (!phrasing) return null;

  return (result) => {
    // Regime stays as computed.
    if (!result.volumeClassified) return;
    const text = phrasing[result.volumeStatus];
    if (text) result.volumeTrend = text;
  };
}

function signalCommentary(profile: InstrumentProfile): StageAdjustment | null {
  const { buyReason, sellRisk } = profile.commentary;
  if (!buyReason && !sellRisk) return null;

  return (result) => {
    if (buyReason && isBuyClass(result.buySignal) && !result.signalReasons.includes(buyReason)) {
      result.signalReasons.push(buyReason);
    } else if (sellRisk && isSellClass(result.buySignal) && !result.riskFactors.includes(sellRisk)) {
      result.riskFactors.push(sellRisk);
    }
  };
}

function present(items: (StageAdjustment | null)[]): StageAdjustment[] {
  return items.filter((item): item is StageAdjustment => item !== null);
}

export function buildAdjustments(profile: InstrumentProfile): StageAdjustments {
  return {
    afterTrend: present([trendCommentary(profile)]),
    afterVolume: present([volumePhrasing(profile)]),
    afterSignal: present([signalCommentary(profile)]),
  };
}
