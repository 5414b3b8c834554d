/**
 * Score normalization utilities
 * All scores live on a 0-100 scale
 */

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

export function roundScore(score: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}
