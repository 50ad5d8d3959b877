/**
 * Macro / news fusion
 *
 *   totalMacro = round(clamp(news * 0.3 + data * 0.7))
 *   final      = round(clamp(technical * 0.6 + totalMacro * 0.4))
 *
 * Either input that cannot be fetched falls back to 50 and the analysis
 * carries on.
 */

import { createChildLogger } from '@/utils/logger';
import { nowIso } from '@/core/time';
import { toScore } from '@/scoring/normalize';
import { scoreNewsSentiment } from './news';
import { NEUTRAL_SCORE, getMacroScore } from './scoring';
import type { AnalysisResult, MacroScoreReport } from '@/scoring/types';
import type { MacroDataSource, MacroNews, NewsSearchClient } from './types';

const logger = createChildLogger('macro_fusion');

export const FUSION_WEIGHTS = {
  news: 0.3,
  data: 0.7,
  technical: 0.6,
  macro: 0.4,
} as const;

export interface FusedScores {
  totalMacro: number;
  finalScore: number;
}

export function fuseScores(technicalScore: number, newsScore: number, dataScore: number): FusedScores {
  const totalMacro = toScore(newsScore * FUSION_WEIGHTS.news + dataScore * FUSION_WEIGHTS.data);
  const finalScore = toScore(technicalScore * FUSION_WEIGHTS.technical + totalMacro * FUSION_WEIGHTS.macro);
  return { totalMacro, finalScore };
}

export interface MacroFusionOptions {
  macroSource: MacroDataSource | null;
  newsClient: NewsSearchClient | null;
  newsMaxResults?: number;
}

export interface MacroContext {
  report: MacroScoreReport;
  news: MacroNews;
  newsScore: number;
}

function neutralReport(): MacroScoreReport {
  return {
    totalScore: NEUTRAL_SCORE,
    factors: {},
    summary: 'Macro data unavailable, staying neutral',
    timestamp: nowIso(),
  };
}

export class MacroFusionEngine {
  private readonly newsMaxResults: number;

  constructor(private readonly options: MacroFusionOptions) {
    this.newsMaxResults = options.newsMaxResults ?? 5;
  }

  async loadMacroReport(): Promise<MacroScoreReport> {
    const { macroSource } = this.options;
    if (!macroSource) {
      logger.info('No macro data source configured, using neutral macro score');
      return neutralReport();
    }
    try {
      return await getMacroScore(macroSource);
    } catch (error) {
      logger.error({ error }, 'Macro data scoring failed, using neutral macro score');
      return neutralReport();
    }
  }

  async loadNews(): Promise<MacroNews> {
    const { newsClient } = this.options;
    if (!newsClient) {
      logger.info('No news client configured, using neutral news score');
      return {};
    }
    try {
      return await newsClient.searchMacroNews(this.newsMaxResults);
    } catch (error) {
      logger.error({ error }, 'Macro news search failed, using neutral news score');
      return {};
    }
  }

  /** Macro report and news for callers that also want the raw inputs. */
  async loadContext(): Promise<MacroContext> {
    const news = await this.loadNews();
    const report = await this.loadMacroReport();
    return { report, news, newsScore: this.scoreNews(news) };
  }

  private scoreNews(news: MacroNews): number {
    try {
      return scoreNewsSentiment(news).score;
    } catch (error) {
      logger.error({ error }, 'Malformed news response, using neutral news score');
      return NEUTRAL_SCORE;
    }
  }

  /**
   * Blends the context into the result. The technical score is kept on
   * `result.macro.technicalScore`; `signalScore` becomes the fused score.
   */
  applyContext(result: AnalysisResult, context: MacroContext): AnalysisResult {
    if (result.macro) {
      throw new Error(`Macro fusion already applied to ${result.code}`);
    }

    const technicalScore = result.signalScore;
    const dataScore = context.report.totalScore;
    const { totalMacro, finalScore } = fuseScores(technicalScore, context.newsScore, dataScore);

    result.macro = {
      macroScore: dataScore,
      macroFactors: context.report.factors,
      macroSummary: context.report.summary,
      macroTimestamp: context.report.timestamp,
      technicalScore,
      macroNewsScore: context.newsScore,
      macroDataScore: dataScore,
      totalMacroScore: totalMacro,
    };
    result.signalScore = finalScore;

    logger.info(
      { code: result.code, technicalScore, newsScore: context.newsScore, dataScore, totalMacro, finalScore },
      'Macro fusion applied'
    );
    return result;
  }

  async apply(result: AnalysisResult): Promise<AnalysisResult> {
    const context = await this.loadContext();
    return this.applyContext(result, context);
  }
}
