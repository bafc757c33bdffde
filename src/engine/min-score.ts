import type { MarketCondition } from '../types/portfolio.js';

/** Slot usage at which screening gets one point stricter. */
const CROWDED_SLOT_RATIO = 0.7;

/**
 * Minimum buy score for this cycle: looser in a bull market, stricter in a bear
 * market, and one point stricter again once the portfolio is 70% full.
 */
export function resolveMinScore(params: {
  base: number;
  marketCondition: MarketCondition;
  openCount: number;
  capacity: number;
}): number {
  const { base, marketCondition, openCount, capacity } = params;

  let score = base;
  if (marketCondition === 'bull') score -= 1;
  else if (marketCondition === 'bear') score += 1;

  if (capacity > 0 && openCount / capacity >= CROWDED_SLOT_RATIO) score += 1;

  return Math.min(10, Math.max(0, score));
}
