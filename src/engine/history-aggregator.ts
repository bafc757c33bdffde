import { KeyedMutex } from '../lib/keyed-mutex.js';
import type { PortfolioStore, PortfolioTransaction } from '../db/store.js';
import type { ClosedTrade, TradingStats } from '../types/portfolio.js';

/**
 * Statistics over a list of closed trades. Pure: the same list always yields the
 * same numbers, and sums run in list order.
 */
export function computeStats(trades: readonly ClosedTrade[]): TradingStats {
  const count = trades.length;
  let winCount = 0;
  let lossCount = 0;
  let breakEvenCount = 0;
  let profitSum = 0;
  let holdingDaysSum = 0;
  let best: number | null = null;
  let worst: number | null = null;

  for (const t of trades) {
    if (t.outcome === 'Win') winCount++;
    else if (t.outcome === 'Loss') lossCount++;
    else breakEvenCount++;

    profitSum += t.profitRatePercent;
    holdingDaysSum += t.holdingDays;
    best = best === null ? t.profitRatePercent : Math.max(best, t.profitRatePercent);
    worst = worst === null ? t.profitRatePercent : Math.min(worst, t.profitRatePercent);
  }

  return {
    count,
    winCount,
    lossCount,
    breakEvenCount,
    winRate: count > 0 ? (winCount / count) * 100 : 0,
    avgProfitRate: count > 0 ? profitSum / count : 0,
    avgHoldingDays: count > 0 ? holdingDaysSum / count : 0,
    cumulativeProfitRate: profitSum,
    bestProfitRate: best,
    worstProfitRate: worst,
  };
}

export class HistoryAggregator {
  private readonly appendLock = new KeyedMutex();

  constructor(private readonly store: PortfolioStore) {}

  /**
   * Append a closed trade. Pass `tx` to commit it together with the position
   * removal; without one the append runs in its own transaction.
   */
  async record(trade: ClosedTrade, tx?: PortfolioTransaction): Promise<void> {
    const append = async (target: PortfolioTransaction): Promise<void> => {
      const result = await target.appendClosedTrade(trade);
      if (result === 'duplicate') {
        throw new Error(`Closed trade ${trade.id} (${trade.ticker}) already recorded`);
      }
    };

    if (tx) {
      await append(tx);
      return;
    }
    await this.appendLock.run('closed-trades', () => this.store.transaction(append));
  }

  async listTrades(): Promise<ClosedTrade[]> {
    return this.store.listClosedTrades();
  }

  /** Recomputed from the full trade log on every call. */
  async stats(): Promise<TradingStats> {
    return computeStats(await this.store.listClosedTrades());
  }
}
