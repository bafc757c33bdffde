import type { CycleContext, MarketCondition, Position } from './portfolio.js';

export interface JudgmentContext {
  cycle: CycleContext;
  currentPrice: number | undefined;
  marketCondition: MarketCondition;
}

/** Produces an untrusted judgment for one open position. */
export interface JudgmentProducer {
  judge(position: Position, context: JudgmentContext): Promise<unknown>;
}

/** Latest prices keyed by ticker. Tickers without a quote are simply absent. */
export interface PriceFeed {
  getPrices(tickers: string[]): Promise<Map<string, number>>;
}
