/**
 * Score normalization utilities
 * All scores are integers on a 0-100 scale
 */

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

export function roundTo(value: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Clamp to [0,100] and round half up to an integer.
 * Values are first trimmed to 6 decimals so 70.49999999999999 rounds like 70.5.
 */
export function toScore(value: number): number {
  if (!Number.isFinite(value)) return 50;
  return Math.round(Number(clamp(value).toFixed(6)));
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
