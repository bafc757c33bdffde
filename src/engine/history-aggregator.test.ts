import { describe, expect, it } from 'vitest';
import { MemoryPortfolioStore } from '../db/memory-store.js';
import { draft } from '../testing/fixtures.js';
import type { ClosedTrade, TradeOutcome } from '../types/portfolio.js';
import { HistoryAggregator, computeStats } from './history-aggregator.js';

function trade(id: string, profitRatePercent: number, outcome: TradeOutcome, holdingDays: number): ClosedTrade {
  return {
    id,
    ticker: `T${id}`,
    companyName: `Company ${id}`,
    sector: 'Software',
    quantity: 1,
    buyPrice: 100,
    sellPrice: 100 + profitRatePercent,
    buyDate: '2025-03-03',
    sellDate: '2025-03-10',
    holdingDays,
    profitRatePercent,
    outcome,
    sellReason: 'test',
    closeKind: 'manual',
    closedCycleId: null,
    finalScenario: { ...draft(), kind: 'scenario', revision: 1 },
  };
}

describe('computeStats', () => {
  it('returns zeros and nulls for an empty log', () => {
    expect(computeStats([])).toEqual({
      count: 0,
      winCount: 0,
      lossCount: 0,
      breakEvenCount: 0,
      winRate: 0,
      avgProfitRate: 0,
      avgHoldingDays: 0,
      cumulativeProfitRate: 0,
      bestProfitRate: null,
      worstProfitRate: null,
    });
  });

  it('sums, averages and counts outcomes', () => {
    const stats = computeStats([
      trade('1', 20, 'Win', 2),
      trade('2', -5, 'Loss', 4),
      trade('3', 0, 'BreakEven', 6),
    ]);

    expect(stats.count).toBe(3);
    expect(stats.winCount).toBe(1);
    expect(stats.lossCount).toBe(1);
    expect(stats.breakEvenCount).toBe(1);
    expect(stats.winRate).toBeCloseTo(33.333, 2);
    expect(stats.cumulativeProfitRate).toBe(15);
    expect(stats.avgProfitRate).toBe(5);
    expect(stats.avgHoldingDays).toBe(4);
    expect(stats.bestProfitRate).toBe(20);
    expect(stats.worstProfitRate).toBe(-5);
  });
});

describe('HistoryAggregator', () => {
  it('appends trades in order and recomputes stats from the log', async () => {
    const history = new HistoryAggregator(new MemoryPortfolioStore());
    await history.record(trade('1', 10, 'Win', 1));
    await history.record(trade('2', -4, 'Loss', 3));

    expect((await history.listTrades()).map(t => t.id)).toEqual(['1', '2']);
    const stats = await history.stats();
    expect(stats.count).toBe(2);
    expect(stats.winRate).toBe(50);
    expect(stats.cumulativeProfitRate).toBe(6);
  });

  it('refuses to record the same trade twice', async () => {
    const history = new HistoryAggregator(new MemoryPortfolioStore());
    await history.record(trade('1', 10, 'Win', 1));
    await expect(history.record(trade('1', 10, 'Win', 1))).rejects.toThrow('Closed trade 1 (T1) already recorded');
    expect(await history.listTrades()).toHaveLength(1);
  });
});
