/**
 * Argument parsing for scripts/analyze.ts
 */

export interface AnalyzeCliArgs {
  symbol: string;
  profile: string | null;
  macro: boolean;
  narrative: boolean;
  days: number;
}

export const DEFAULT_DAYS = 120;
const MIN_DAYS = 30;

export const ANALYZE_USAGE =
  'Usage: tsx scripts/analyze.ts <symbol> [--profile=gold] [--macro] [--days=120] [--narrative]';

export class CliArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgsError';
  }
}

function flagValue(args: string[], name: string): string | undefined {
  const eqArg = args.find((arg) => arg.startsWith(`${name}=`));
  if (eqArg) return eqArg.slice(name.length + 1);
  const index = args.indexOf(name);
  if (index >= 0) {
    const next = args[index + 1];
    if (next !== undefined && !next.startsWith('--')) return next;
  }
  return undefined;
}

export function parseAnalyzeArgs(args: string[]): AnalyzeCliArgs {
  const valueFlags = new Set(['--profile', '--days']);
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (valueFlags.has(arg)) i++;
      continue;
    }
    positional.push(arg);
  }

  const symbol = positional[0]?.trim();
  if (!symbol) {
    throw new CliArgsError(`Missing symbol. ${ANALYZE_USAGE}`);
  }

  const daysRaw = flagValue(args, '--days');
  let days = DEFAULT_DAYS;
  if (daysRaw !== undefined) {
    const parsed = Number.parseInt(daysRaw, 10);
    if (!Number.isFinite(parsed) || parsed < MIN_DAYS) {
      throw new CliArgsError(`--days must be an integer of at least ${MIN_DAYS}, got "${daysRaw}"`);
    }
    days = parsed;
  }

  return {
    symbol: symbol.toUpperCase(),
    profile: flagValue(args, '--profile') ?? null,
    macro: args.includes('--macro'),
    narrative: args.includes('--narrative'),
    days,
  };
}
