import { describe, expect, it } from 'vitest';
import { MemoryPortfolioStore } from '../db/memory-store.js';
import type { PortfolioTransaction } from '../db/store.js';
import { cycleIdFor } from '../lib/dates.js';
import { candidateInput, cycle, draft, judgment, makeEngine, openPosition, testClock } from '../testing/fixtures.js';
import { PortfolioEngine } from './index.js';
import {
  CapacityExceeded,
  DuplicatePosition,
  InvalidCandidate,
  InvalidScenario,
  UnknownPosition,
} from './errors.js';
import { classifyOutcome, profitRatePercent } from './position-ledger.js';

describe('profitRatePercent / classifyOutcome', () => {
  it('computes the rate against the buy price', () => {
    expect(profitRatePercent(10000, 9500)).toBe(-5);
    expect(profitRatePercent(10000, 12000)).toBe(20);
  });

  it('classifies by sign', () => {
    expect(classifyOutcome(0.01)).toBe('Win');
    expect(classifyOutcome(-5)).toBe('Loss');
    expect(classifyOutcome(0)).toBe('BreakEven');
  });
});

describe('PositionLedger.open', () => {
  it('opens at the candidate price with scenario revision 1', async () => {
    const { engine, events } = makeEngine();
    const position = await openPosition(engine);

    expect(position).toMatchObject({
      ticker: 'AAA',
      companyName: 'Alpha Analytics',
      buyPrice: 10000,
      currentPrice: 10000,
      buyDate: '2025-03-03',
      holdingDays: 0,
      quantity: 1,
      openedCycleId: '2025-03-03#1400',
    });
    expect(position.scenario).toMatchObject({ kind: 'scenario', revision: 1, targetPrice: 12000, stopLoss: 9000 });
    expect(events.map(e => e.type)).toEqual(['candidate_screened', 'position_opened']);
  });

  it('rejects a second position for the same ticker', async () => {
    const { engine } = makeEngine();
    await openPosition(engine);

    await expect(openPosition(engine)).rejects.toBeInstanceOf(DuplicatePosition);
    expect(await engine.ledger.listOpen()).toHaveLength(1);
  });

  it('rejects a candidate screened as Skip', async () => {
    const { engine } = makeEngine();
    const skipped = await engine.gate.evaluate(candidateInput({ buyScore: 3 }), 8, cycle('2025-03-03#1400'));

    await expect(engine.ledger.open(skipped, draft())).rejects.toBeInstanceOf(InvalidCandidate);
  });

  it('rejects levels that do not bracket the buy price', async () => {
    const { engine } = makeEngine();

    await expect(openPosition(engine, {}, { stopLoss: 10500 })).rejects.toBeInstanceOf(InvalidScenario);
    await expect(openPosition(engine, {}, { targetPrice: 9800, stopLoss: 9000 })).rejects.toBeInstanceOf(InvalidScenario);
    expect(await engine.ledger.listOpen()).toEqual([]);
  });

  it('throws CapacityExceeded when the slot filled after screening', async () => {
    const { engine } = makeEngine({ maxPortfolioSize: 1 });
    const late = await engine.gate.evaluate(candidateInput({ ticker: 'BBB' }), 0, cycle('2025-03-03#1400'));
    expect(late.decision).toBe('Enter');

    await openPosition(engine, {}, { maxPortfolioSize: 1 });
    const attempt = engine.ledger.open(late, draft({ maxPortfolioSize: 1 }));

    await expect(attempt).rejects.toBeInstanceOf(CapacityExceeded);
    await expect(attempt).rejects.toThrow('No free slot for BBB: 1/1 positions open');
  });

  it('never overfills under concurrent opens', async () => {
    const { engine } = makeEngine({ maxPortfolioSize: 2 });
    const c = cycle('2025-03-03#1400');
    const screened = await Promise.all(
      ['AAA', 'BBB', 'CCC'].map(ticker => engine.gate.evaluate(candidateInput({ ticker }), 0, c)),
    );

    const results = await Promise.allSettled(
      screened.map(candidate => engine.ledger.open(candidate, draft({ maxPortfolioSize: 2 }))),
    );

    expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(2);
    const rejected = results.filter(r => r.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.status === 'rejected' && rejected[0].reason).toBeInstanceOf(CapacityExceeded);
    expect(await engine.capacity.openCount()).toBe(2);
  });

  it('picks up a new limit carried by the scenario', async () => {
    const { engine } = makeEngine({ maxPortfolioSize: 10 });
    await openPosition(engine, {}, { maxPortfolioSize: 4 });
    expect(engine.capacity.capacity).toBe(4);
  });

  it('keeps the limit when a duplicate open is rejected', async () => {
    const { engine } = makeEngine({ maxPortfolioSize: 10 });
    await openPosition(engine);

    await expect(openPosition(engine, {}, { maxPortfolioSize: 1 })).rejects.toBeInstanceOf(DuplicatePosition);
    expect(engine.capacity.capacity).toBe(10);

    const next = await engine.gate.evaluate(candidateInput({ ticker: 'BBB' }), 8, cycle('2025-03-03#1400'));
    expect(next.decision).toBe('Enter');
  });

  it('keeps the limit when an open is rejected for capacity', async () => {
    const { engine } = makeEngine({ maxPortfolioSize: 2 });
    const late = await engine.gate.evaluate(candidateInput({ ticker: 'CCC' }), 0, cycle('2025-03-03#1400'));
    await openPosition(engine, {}, { maxPortfolioSize: 2 });
    await openPosition(engine, { ticker: 'BBB' }, { maxPortfolioSize: 2 });

    await expect(engine.ledger.open(late, draft({ maxPortfolioSize: 1 }))).rejects.toBeInstanceOf(CapacityExceeded);
    expect(engine.capacity.capacity).toBe(2);
  });

  it('lets a larger limit on the scenario admit its own entry', async () => {
    const { engine } = makeEngine({ maxPortfolioSize: 1 });
    const second = await engine.gate.evaluate(candidateInput({ ticker: 'BBB' }), 0, cycle('2025-03-03#1400'));
    await openPosition(engine, {}, { maxPortfolioSize: 1 });

    await engine.ledger.open(second, draft({ maxPortfolioSize: 3 }));
    expect(engine.capacity.capacity).toBe(3);
    expect(await engine.capacity.openCount()).toBe(2);
  });
});

describe('PositionLedger cycle dates', () => {
  it('dates the entry by the cycle day in the configured zone', async () => {
    const { engine, time } = makeEngine({ start: '2025-03-04T00:00:00Z', timeZone: 'America/New_York' });
    const entry = cycleIdFor(new Date('2025-03-04T00:00:00Z'), 'America/New_York');
    expect(entry).toEqual({ cycleId: '2025-03-03#1900', cycleDate: '2025-03-03' });

    const opened = await openPosition(engine, {}, {}, entry.cycleId);
    expect(opened).toMatchObject({ buyDate: '2025-03-03', holdingDays: 0 });

    time.set('2025-03-04T14:00:00Z');
    expect((await engine.ledger.get('AAA'))?.holdingDays).toBe(1);

    time.set('2025-03-06T00:00:00Z');
    const exit = await engine.processor.process('AAA', judgment(), 8000, cycle('2025-03-05#1900'));
    expect(exit.outcome).toBe('closed');
    if (exit.outcome !== 'closed') return;
    expect(exit.trade).toMatchObject({ buyDate: '2025-03-03', sellDate: '2025-03-05', holdingDays: 2 });
  });

  it('dates a manual close by the clock day in the configured zone', async () => {
    const { engine, time } = makeEngine({ timeZone: 'America/New_York' });
    await openPosition(engine);

    time.set('2025-03-07T02:00:00Z');
    const trade = await engine.ledger.close('AAA', 10500, 'manual exit');
    expect(trade).toMatchObject({ sellDate: '2025-03-06', holdingDays: 3, closedCycleId: null });
  });

  it('dates a close by the cycle it is given', async () => {
    const { engine } = makeEngine();
    await openPosition(engine);

    const trade = await engine.ledger.close('AAA', 10500, 'manual exit', { cycle: cycle('2025-03-10#1400') });
    expect(trade).toMatchObject({ sellDate: '2025-03-10', holdingDays: 7, closedCycleId: '2025-03-10#1400' });
  });
});

describe('PositionLedger reads and updates', () => {
  it('derives holdingDays from the clock', async () => {
    const { engine, time } = makeEngine();
    await openPosition(engine);

    time.set('2025-03-06T09:00:00Z');
    expect((await engine.ledger.get('AAA'))?.holdingDays).toBe(3);
  });

  it('revises the scenario without touching entry fields', async () => {
    const { engine, time, events } = makeEngine();
    await openPosition(engine);

    time.set('2025-03-05T14:00:00Z');
    const revised = await engine.ledger.revise('AAA', draft({ stopLoss: 9500 }));

    expect(revised.buyPrice).toBe(10000);
    expect(revised.buyDate).toBe('2025-03-03');
    expect(revised.scenario.revision).toBe(2);
    expect(revised.scenario.stopLoss).toBe(9500);
    expect(events.at(-1)).toMatchObject({ type: 'position_revised', previousStop: 9000, previousTarget: 12000 });
  });

  it('rejects an inverted revision and keeps the old scenario', async () => {
    const { engine } = makeEngine();
    await openPosition(engine);

    await expect(engine.ledger.revise('AAA', draft({ stopLoss: 13000 }))).rejects.toBeInstanceOf(InvalidScenario);
    expect((await engine.ledger.get('AAA'))?.scenario.revision).toBe(1);
  });

  it('updates the market price only', async () => {
    const { engine } = makeEngine();
    await openPosition(engine);

    const marked = await engine.ledger.markPrice('AAA', 10250);
    expect(marked.currentPrice).toBe(10250);
    expect(marked.scenario.revision).toBe(1);
  });

  it('closes into a trade and frees the slot', async () => {
    const { engine, time } = makeEngine();
    await openPosition(engine);

    time.set('2025-03-13T14:00:00Z');
    const trade = await engine.ledger.close('AAA', 11000, 'took profit early');

    expect(trade).toMatchObject({
      ticker: 'AAA',
      buyPrice: 10000,
      sellPrice: 11000,
      buyDate: '2025-03-03',
      sellDate: '2025-03-13',
      holdingDays: 10,
      profitRatePercent: 10,
      outcome: 'Win',
      closeKind: 'manual',
      sellReason: 'took profit early',
    });
    expect(trade.finalScenario.revision).toBe(1);
    expect(await engine.ledger.get('AAA')).toBeNull();
    expect(await engine.history.listTrades()).toEqual([trade]);
  });

  it('fails on positions that are not open', async () => {
    const { engine } = makeEngine();

    await expect(engine.ledger.close('ZZZ', 10, 'gone')).rejects.toBeInstanceOf(UnknownPosition);
    await expect(engine.ledger.revise('ZZZ', draft())).rejects.toBeInstanceOf(UnknownPosition);
    await expect(engine.ledger.markPrice('ZZZ', 10)).rejects.toBeInstanceOf(UnknownPosition);
  });
});

/** Transactions that find the row already gone by the time they write to it. */
class LostRaceStore extends MemoryPortfolioStore {
  override async transaction<T>(fn: (tx: PortfolioTransaction) => Promise<T>): Promise<T> {
    return super.transaction(tx => {
      tx.deletePosition = async () => false;
      tx.replaceScenario = async () => false;
      return fn(tx);
    });
  }
}

describe('PositionLedger with a concurrent writer', () => {
  function engineOver(store: MemoryPortfolioStore): PortfolioEngine {
    return new PortfolioEngine({ store, maxPortfolioSize: 10, clock: testClock().clock });
  }

  it('books no trade when the position was removed first', async () => {
    const engine = engineOver(new LostRaceStore());
    await openPosition(engine);

    await expect(engine.ledger.close('AAA', 11000, 'manual exit')).rejects.toBeInstanceOf(UnknownPosition);
    expect(await engine.history.listTrades()).toEqual([]);
    expect(await engine.ledger.get('AAA')).not.toBeNull();
  });

  it('reports no revision that was not written', async () => {
    const engine = engineOver(new LostRaceStore());
    await openPosition(engine);

    await expect(engine.ledger.revise('AAA', draft({ stopLoss: 9500 }))).rejects.toBeInstanceOf(UnknownPosition);
    expect((await engine.ledger.get('AAA'))?.scenario.revision).toBe(1);
  });
});
