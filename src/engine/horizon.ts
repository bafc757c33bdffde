import type { InvestmentHorizon } from '../types/portfolio.js';

// Holding-period exits. They ride on the scenario as ordinary sell triggers, so
// the judgment producer fires them by name and the processor closes on them.
const ANY_HORIZON = [
  'held 30+ days at a loss',
  'held 60+ days with a gain of 3% or more',
];

const BY_HORIZON: Record<InvestmentHorizon, string[]> = {
  short: [
    'short horizon: held 15+ days with a gain of 5% or more',
    'short horizon: held 10+ days with a loss of 3% or more',
  ],
  mid: [],
  long: ['long horizon: held 90+ days at a loss'],
};

export function horizonSellTriggers(horizon: InvestmentHorizon): string[] {
  return [...BY_HORIZON[horizon], ...ANY_HORIZON];
}

/** `triggers` followed by the horizon exits it does not already name (case-insensitive). */
export function withHorizonTriggers(triggers: readonly string[], horizon: InvestmentHorizon): string[] {
  const seen = new Set(triggers.map(t => t.trim().toLowerCase()));
  return [...triggers, ...horizonSellTriggers(horizon).filter(t => !seen.has(t.toLowerCase()))];
}
