import { describe, expect, it } from 'vitest';
import { CliArgsError, DEFAULT_DAYS, parseAnalyzeArgs } from '@/analysis/cli_args';

describe('parseAnalyzeArgs', () => {
  it('uses defaults for a bare symbol', () => {
    expect(parseAnalyzeArgs(['aapl'])).toEqual({
      symbol: 'AAPL',
      profile: null,
      macro: false,
      narrative: false,
      days: DEFAULT_DAYS,
    });
  });

  it('accepts both flag forms', () => {
    expect(parseAnalyzeArgs(['--profile', 'gold', 'GC=F', '--macro', '--days=60', '--narrative'])).toEqual({
      symbol: 'GC=F',
      profile: 'gold',
      macro: true,
      narrative: true,
      days: 60,
    });
    expect(parseAnalyzeArgs(['GC=F', '--profile=gold', '--days', '45']).days).toBe(45);
  });

  it('rejects a missing symbol', () => {
    expect(() => parseAnalyzeArgs(['--macro'])).toThrow(CliArgsError);
  });

  it('rejects a history window below 30 days', () => {
    expect(() => parseAnalyzeArgs(['AAPL', '--days=10'])).toThrow(
      '--days must be an integer of at least 30, got "10"'
    );
    expect(() => parseAnalyzeArgs(['AAPL', '--days=abc'])).toThrow(CliArgsError);
  });
});
