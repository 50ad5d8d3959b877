/**
 * Single-instrument analysis: technical pipeline, optional macro fusion,
 * then the rendered report.
 */

import { createChildLogger } from '@/utils/logger';
import { loadProfile } from '@/instruments/profiles';
import { createAnalysisPipeline } from '@/scoring/pipeline';
import { formatAnalysis } from '@/report/formatter';
import type { MacroContext, MacroFusionEngine } from '@/macro/fusion';
import type { InstrumentProfile } from '@/instruments/types';
import type { AnalysisResult, PriceSeries } from '@/scoring/types';

const logger = createChildLogger('analysis_service');

export interface AnalyzeInstrumentInput {
  code: string;
  series: PriceSeries;
  /** A loaded profile or the name of one under config/instruments. */
  profile: InstrumentProfile | string;
  /** When given, the technical score is fused with macro data and news. */
  macro?: MacroFusionEngine | null;
}

export interface AnalyzeInstrumentOutput {
  result: Readonly<AnalysisResult>;
  report: string;
  profile: InstrumentProfile;
  macroContext: MacroContext | null;
}

export async function analyzeInstrument(input: AnalyzeInstrumentInput): Promise<AnalyzeInstrumentOutput> {
  const profile = typeof input.profile === 'string' ? loadProfile(input.profile) : input.profile;
  const pipeline = createAnalysisPipeline(profile);
  const result = pipeline.analyze(input.series, input.code);

  let macroContext: MacroContext | null = null;
  if (input.macro) {
    macroContext = await input.macro.loadContext();
    input.macro.applyContext(result, macroContext);
  }

  logger.info(
    {
      code: input.code,
      profile: profile.name,
      signal: result.buySignal,
      score: result.signalScore,
      macro: macroContext !== null,
    },
    'Instrument analyzed'
  );

  const report = formatAnalysis(result, profile);
  return { result, report, profile, macroContext };
}
