/**
 * Keyword-count news sentiment.
 * Each category can move the neutral baseline by at most ±3 points.
 */

import { clamp, toScore } from '@/scoring/normalize';
import type { MacroNews, NewsItem } from './types';

export const BULLISH_KEYWORDS: readonly string[] = [
  'rate cut',
  'dovish',
  'easing',
  'safe haven',
  'safe-haven',
  'geopolitical tension',
  'conflict',
  'recession',
  'inflation rises',
  'weaker dollar',
  'dollar weakens',
  'central bank buying',
  'record high',
];

export const BEARISH_KEYWORDS: readonly string[] = [
  'rate hike',
  'hawkish',
  'tightening',
  'stronger dollar',
  'dollar strengthens',
  'yields rise',
  'rising yields',
  'ceasefire',
  'risk-on',
  'outflows',
  'profit taking',
  'sell-off',
];

const CATEGORY_STEP = 10;
const CATEGORY_CAP = 30;
const CATEGORY_WEIGHT = 0.1;

export interface CategorySentiment {
  category: string;
  bullishHits: number;
  bearishHits: number;
  score: number;
}

export interface NewsSentiment {
  score: number;
  categories: CategorySentiment[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word matches only, so "easing" does not count inside "increasing". */
export function countOccurrences(text: string, keyword: string): number {
  if (!keyword) return 0;
  const pattern = new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'g');
  return text.match(pattern)?.length ?? 0;
}

function countKeywords(text: string, keywords: readonly string[]): number {
  return keywords.reduce((sum, keyword) => sum + countOccurrences(text, keyword.toLowerCase()), 0);
}

export function scoreCategory(items: readonly NewsItem[]): Omit<CategorySentiment, 'category'> {
  const text = items.map((item) => `${item.title} ${item.snippet}`).join(' ').toLowerCase();
  const bullishHits = countKeywords(text, BULLISH_KEYWORDS);
  const bearishHits = countKeywords(text, BEARISH_KEYWORDS);
  const score = 50 + clamp((bullishHits - bearishHits) * CATEGORY_STEP, -CATEGORY_CAP, CATEGORY_CAP);
  return { bullishHits, bearishHits, score };
}

/**
 * Failed or empty categories are skipped; nothing usable leaves the score at 50.
 */
export function scoreNewsSentiment(news: MacroNews): NewsSentiment {
  const categories: CategorySentiment[] = [];

  for (const [category, response] of Object.entries(news)) {
    if (!response || !response.success || response.results.length === 0) continue;
    categories.push({ category, ...scoreCategory(response.results) });
  }

  const nudge = categories.reduce((sum, c) => sum + (c.score - 50) * CATEGORY_WEIGHT, 0);
  return { score: toScore(50 + nudge), categories };
}
