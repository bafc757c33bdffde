import { describe, expect, it } from 'vitest';
import { draft } from '../testing/fixtures.js';
import type { PositionRecord } from '../types/portfolio.js';
import { MemoryPortfolioStore } from './memory-store.js';

function record(ticker: string, buyDate = '2025-03-03', sector = 'Software'): PositionRecord {
  return {
    ticker,
    companyName: ticker,
    sector,
    quantity: 1,
    buyPrice: 100,
    buyDate,
    currentPrice: 100,
    priceUpdatedAt: `${buyDate}T14:00:00.000Z`,
    openedCycleId: null,
    scenario: { ...draft({ targetPrice: 120, stopLoss: 90 }), kind: 'scenario', revision: 1 },
  };
}

describe('MemoryPortfolioStore', () => {
  it('commits a transaction only when it resolves', async () => {
    const store = new MemoryPortfolioStore();
    await store.transaction(tx => tx.insertPosition(record('AAA'), 5));

    await expect(
      store.transaction(async tx => {
        await tx.insertPosition(record('BBB'), 5);
        await tx.deletePosition('AAA');
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    expect((await store.listPositions()).map(p => p.ticker)).toEqual(['AAA']);
  });

  it('checks duplicates and capacity in the insert', async () => {
    const store = new MemoryPortfolioStore();
    await store.transaction(tx => tx.insertPosition(record('AAA'), 1));

    expect(await store.transaction(tx => tx.insertPosition(record('AAA'), 5))).toEqual({ ok: false, reason: 'duplicate' });
    expect(await store.transaction(tx => tx.insertPosition(record('BBB'), 1))).toEqual({
      ok: false,
      reason: 'capacity',
      openCount: 1,
    });
  });

  it('lists positions oldest first, then by ticker, and counts by sector', async () => {
    const store = new MemoryPortfolioStore();
    await store.transaction(async tx => {
      await tx.insertPosition(record('CCC', '2025-03-04', 'Energy'), 5);
      await tx.insertPosition(record('BBB', '2025-03-03'), 5);
      await tx.insertPosition(record('AAA', '2025-03-04'), 5);
    });

    expect((await store.listPositions()).map(p => p.ticker)).toEqual(['BBB', 'AAA', 'CCC']);
    expect(await store.countPositionsInSector('Software')).toBe(2);
    expect(await store.countPositionsInSector('Energy')).toBe(1);
  });

  it('hands out copies', async () => {
    const store = new MemoryPortfolioStore();
    await store.transaction(tx => tx.insertPosition(record('AAA'), 5));

    const copy = await store.getPosition('AAA');
    if (copy) copy.scenario.stopLoss = 1;
    expect((await store.getPosition('AAA'))?.scenario.stopLoss).toBe(90);
  });
});
