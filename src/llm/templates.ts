/**
 * LLM prompt templates for the macro narrative
 */

import { SIGNAL_LABELS, TREND_LABELS } from '@/scoring/types';
import type { AnalysisResult, MacroScoreReport } from '@/scoring/types';
import type { MacroNews } from '@/macro/types';

export const MAX_PROMPT_HEADLINES = 5;
export const SNIPPET_LENGTH = 100;

export interface PromptOptions {
  instrumentName?: string;
}

export function buildTechnicalSection(technical: Readonly<AnalysisResult>): string[] {
  const technicalScore = technical.macro?.technicalScore ?? technical.signalScore;
  return [
    '[Technical analysis]',
    `Trend: ${TREND_LABELS[technical.trendStatus]}`,
    `Trend strength: ${technical.trendStrength}/100`,
    `MA alignment: ${technical.maAlignment}`,
    `Current price: ${technical.currentPrice}`,
    `Technical score: ${technicalScore}/100`,
    `Recommendation: ${SIGNAL_LABELS[technical.buySignal]}`,
    '',
  ];
}

export function buildMacroSection(macro: MacroScoreReport): string[] {
  const lines = [
    '[Macro data]',
    `Macro score: ${macro.totalScore}/100`,
    `Macro summary: ${macro.summary}`,
  ];
  const factors = Object.entries(macro.factors);
  if (factors.length > 0) {
    lines.push('Key macro factors:');
    for (const [name, factor] of factors) {
      if (!factor) continue;
      lines.push(`- ${name}: ${factor.value} (${factor.impact}) - ${factor.score}/100`);
    }
  }
  lines.push('');
  return lines;
}

/**
 * First headline of each successful category, at most five overall.
 */
export function selectHeadlines(news: MacroNews): string[] {
  const headlines: string[] = [];
  for (const response of Object.values(news)) {
    if (headlines.length >= MAX_PROMPT_HEADLINES) break;
    const first = response?.success ? response.results[0] : undefined;
    if (!first) continue;
    headlines.push(`- ${first.title}: ${first.snippet.slice(0, SNIPPET_LENGTH)}...`);
  }
  return headlines;
}

export function buildMacroPrompt(
  technical: Readonly<AnalysisResult> | null,
  macro: MacroScoreReport | null,
  news: MacroNews,
  options: PromptOptions = {}
): string {
  const instrument = options.instrumentName ?? 'the instrument';
  const lines: string[] = [
    `Based on the data below, give a professional and objective investment analysis of ${instrument}.`,
    '',
  ];

  if (technical) lines.push(...buildTechnicalSection(technical));
  if (macro) lines.push(...buildMacroSection(macro));

  const headlines = selectHeadlines(news);
  if (headlines.length > 0) {
    lines.push('[Macro news]', ...headlines, '');
  }

  lines.push(
    'Please cover:',
    `1. Overall impact of the current macro environment on ${instrument} (bullish / bearish / neutral)`,
    '2. The two or three drivers with the largest price impact',
    '3. Short-term (1-2 weeks) price outlook',
    '4. Positioning advice (size, entry timing, stop-loss)',
    '5. Key risks',
    '',
    'Requirements:',
    '- Stay professional and objective',
    '- Use only the data provided, do not invent figures',
    '- Keep it concise and actionable'
  );

  return lines.join('\n');
}
