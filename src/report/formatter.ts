/**
 * Plain-text rendering of an analysis result.
 * Rendering freezes the result, so it has to be the last step.
 */

import {
  MACD_LABELS,
  RSI_LABELS,
  SIGNAL_LABELS,
  TREND_LABELS,
  VOLUME_LABELS,
} from '@/scoring/types';
import type { AnalysisResult, MacroExtension } from '@/scoring/types';
import type { InstrumentProfile } from '@/instruments/types';
import { presentFactors } from '@/macro/scoring';

function signed(value: number, digits = 2): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;
}

export function freezeResult(result: AnalysisResult): Readonly<AnalysisResult> {
  Object.freeze(result.signalReasons);
  Object.freeze(result.riskFactors);
  if (result.macro) {
    for (const factor of presentFactors(result.macro.macroFactors)) {
      Object.freeze(factor);
    }
    Object.freeze(result.macro.macroFactors);
    Object.freeze(result.macro);
  }
  return Object.freeze(result);
}

function formatMacroBlock(macro: MacroExtension): string[] {
  const lines = [
    '',
    '🌐 Macro fusion:',
    `   Technical score: ${macro.technicalScore}/100`,
    `   Macro data score: ${macro.macroDataScore}/100`,
    `   News score: ${macro.macroNewsScore}/100`,
    `   Combined macro: ${macro.totalMacroScore}/100`,
    `   Summary: ${macro.macroSummary}`,
  ];
  for (const [name, factor] of Object.entries(macro.macroFactors)) {
    if (!factor) continue;
    const change = factor.change === undefined ? '' : `, ${signed(factor.change)}%`;
    lines.push(`   - ${name}: ${factor.value}${change} (${factor.impact}) ${factor.score}/100`);
  }
  return lines;
}

export function formatAnalysis(result: AnalysisResult, profile: InstrumentProfile): string {
  const lines = [
    `=== ${result.code} ${profile.displayName} trend analysis ===`,
    '',
    `📊 Trend: ${TREND_LABELS[result.trendStatus]}`,
    `   MA alignment: ${result.maAlignment}`,
    `   Trend strength: ${result.trendStrength}/100`,
    '',
    '📈 Moving averages:',
    `   Price: ${result.currentPrice.toFixed(2)}`,
    `   MA5:  ${result.ma5.toFixed(2)} (bias ${signed(result.biasMa5)}%)`,
    `   MA10: ${result.ma10.toFixed(2)} (bias ${signed(result.biasMa10)}%)`,
    `   MA20: ${result.ma20.toFixed(2)} (bias ${signed(result.biasMa20)}%)`,
    '',
    `📊 Volume: ${VOLUME_LABELS[result.volumeStatus]}`,
    `   Ratio vs 5d: ${result.volumeRatio5d.toFixed(2)}`,
    `   Volume trend: ${result.volumeTrend}`,
    '',
    `📈 MACD: ${MACD_LABELS[result.macdStatus]}`,
    `   DIF: ${result.macdDif.toFixed(4)}`,
    `   DEA: ${result.macdDea.toFixed(4)}`,
    `   MACD: ${result.macdBar.toFixed(4)}`,
    `   Signal: ${result.macdSignal}`,
    '',
    `📊 RSI: ${RSI_LABELS[result.rsiStatus]}`,
    `   RSI(6): ${result.rsi6.toFixed(1)}`,
    `   RSI(12): ${result.rsi12.toFixed(1)}`,
    `   RSI(24): ${result.rsi24.toFixed(1)}`,
    `   Signal: ${result.rsiSignal}`,
    '',
    `🎯 Recommendation: ${SIGNAL_LABELS[result.buySignal]}`,
    `   Score: ${result.signalScore}/100`,
  ];

  if (result.signalReasons.length > 0) {
    lines.push('', '✅ Reasons:');
    for (const reason of result.signalReasons) lines.push(`   ${reason}`);
  }

  if (result.riskFactors.length > 0) {
    lines.push('', '⚠️ Risks:');
    for (const risk of result.riskFactors) lines.push(`   ${risk}`);
  }

  if (result.macro) {
    lines.push(...formatMacroBlock(result.macro));
  }

  const notes = profile.commentary.marketNotes;
  if (notes.length > 0) {
    lines.push('', `💡 ${profile.displayName} market notes:`);
    for (const note of notes) lines.push(`   - ${note}`);
  }

  freezeResult(result);
  return lines.join('\n');
}
