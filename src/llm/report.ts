/**
 * Investment report assembly: technical result, macro report and the
 * generated narrative in one envelope.
 */

import { createChildLogger } from '@/utils/logger';
import { nowIso } from '@/core/time';
import { buildMacroPrompt, type PromptOptions } from './templates';
import type { NarrativeGenerator } from './adapter';
import type { AnalysisResult, MacroScoreReport } from '@/scoring/types';
import type { MacroNews } from '@/macro/types';

const logger = createChildLogger('investment_report');

export const REPORT_GENERATOR_NAME = 'Instrument Macro Analyzer';

export interface InvestmentReport {
  technical: Readonly<AnalysisResult> | null;
  macro: MacroScoreReport | null;
  aiAnalysis: string;
  timestamp: string;
  generatedBy: string;
}

export interface InvestmentReportError {
  error: string;
  timestamp: string;
}

export type InvestmentReportOutcome = InvestmentReport | InvestmentReportError;

export function isReportError(outcome: InvestmentReportOutcome): outcome is InvestmentReportError {
  return 'error' in outcome;
}

export async function generateInvestmentReport(
  generator: NarrativeGenerator,
  technical: Readonly<AnalysisResult> | null,
  macro: MacroScoreReport | null,
  news: MacroNews,
  options: PromptOptions = {}
): Promise<InvestmentReportOutcome> {
  try {
    const prompt = buildMacroPrompt(technical, macro, news, options);
    const aiAnalysis = await generator.generate(prompt);
    logger.info({ generator: generator.name }, 'Investment report generated');
    return {
      technical,
      macro,
      aiAnalysis,
      timestamp: nowIso(),
      generatedBy: REPORT_GENERATOR_NAME,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, 'Failed to generate investment report');
    return { error: message, timestamp: nowIso() };
  }
}
