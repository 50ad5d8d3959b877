/**
 * Single-instrument analysis
 * Fetches daily bars, runs the technical pipeline and optionally the macro
 * fusion and AI narrative, then prints the report.
 *
 * Usage: npx tsx scripts/analyze.ts GC=F --profile=gold --macro --narrative
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getEnvConfig } from '../src/core/env';
import { getConfig } from '../src/core/config';
import { analyzeInstrument } from '../src/analysis/service';
import { CliArgsError, parseAnalyzeArgs } from '../src/analysis/cli_args';
import { MacroFusionEngine } from '../src/macro/fusion';
import { YahooChartClient, chartRangeForDays } from '../src/providers/yahoo/chart_client';
import { FredClient } from '../src/providers/fred/client';
import { MarketMacroDataProvider } from '../src/providers/macro_provider';
import { TavilyNewsClient } from '../src/providers/news/tavily';
import { createNarrativeGenerator } from '../src/llm/adapter';
import { generateInvestmentReport, isReportError } from '../src/llm/report';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('analyze');

/** Trading days to calendar days, with room for holidays. */
function calendarDaysFor(tradingDays: number): number {
  return Math.ceil((tradingDays * 7) / 5) + 10;
}

async function main(): Promise<void> {
  const args = parseAnalyzeArgs(process.argv.slice(2));
  const env = getEnvConfig();
  const config = getConfig();
  const profileName = args.profile ?? config.defaultProfile;

  const chartClient = new YahooChartClient();
  const bars = await chartClient.getDailyBars(args.symbol, chartRangeForDays(calendarDaysFor(args.days)));
  if (bars.length === 0) {
    throw new Error(`No price data returned for ${args.symbol}`);
  }
  const series = bars.slice(-args.days);
  logger.info({ symbol: args.symbol, bars: series.length, profile: profileName }, 'Price history loaded');

  let engine: MacroFusionEngine | null = null;
  if (args.macro) {
    if (!env.fredApiKey) logger.warn('FRED_API_KEY not set, policy rate and inflation unavailable');
    if (!env.tavilyApiKey) logger.warn('TAVILY_API_KEY not set, news score stays neutral');
    engine = new MacroFusionEngine({
      macroSource: new MarketMacroDataProvider({
        chartClient,
        fredClient: env.fredApiKey ? new FredClient(env.fredApiKey) : null,
        ttl: config.cacheTtl,
      }),
      newsClient: env.tavilyApiKey ? new TavilyNewsClient(env.tavilyApiKey) : null,
      newsMaxResults: config.newsMaxResults,
    });
  }

  const { result, report, profile, macroContext } = await analyzeInstrument({
    code: args.symbol,
    series,
    profile: profileName,
    macro: engine,
  });

  console.log(report);

  if (args.narrative) {
    const outcome = await generateInvestmentReport(
      createNarrativeGenerator(env),
      result,
      macroContext?.report ?? null,
      macroContext?.news ?? {},
      { instrumentName: profile.displayName }
    );
    if (isReportError(outcome)) {
      logger.error({ error: outcome.error }, 'Narrative report failed');
    } else {
      console.log('\n=== AI analysis ===\n');
      console.log(outcome.aiAnalysis);
    }
  }
}

main().catch((error: unknown) => {
  if (error instanceof CliArgsError) {
    console.error(error.message);
  } else {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Analysis failed');
  }
  process.exitCode = 1;
});
