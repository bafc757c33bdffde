/**
 * Position Ledger — the only writer of open positions, their scenarios and the
 * daily decision log.
 *
 * Every mutation runs under the ticker's lock and commits as one store
 * transaction, so an interrupted cycle never leaves a half-applied transition:
 *   open   : capacity check + uniqueness check + insert
 *   revise : scenario replacement (+ price refresh + decision append)
 *   close  : position removal + closed-trade append (+ decision append)
 */

import { v4 as uuidv4 } from 'uuid';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import { cycleIdFor, daysBetween, systemClock, type Clock } from '../lib/dates.js';
import type { PortfolioStore, PortfolioTransaction } from '../db/store.js';
import type { DailyDecision } from '../types/decision.js';
import type {
  ClosedTrade,
  CloseKind,
  CycleContext,
  Position,
  PositionRecord,
  Scenario,
  ScenarioDraft,
  TradeOutcome,
  WatchlistCandidate,
} from '../types/portfolio.js';
import type { CapacityManager } from './capacity-manager.js';
import type { HistoryAggregator } from './history-aggregator.js';
import type { Emit } from './events.js';
import {
  CapacityExceeded,
  DuplicateDecision,
  DuplicatePosition,
  InvalidCandidate,
  InvalidScenario,
  UnknownPosition,
} from './errors.js';

export interface LedgerOptions {
  store: PortfolioStore;
  capacity: CapacityManager;
  history: HistoryAggregator;
  clock?: Clock;
  /** Zone that dates positions and trades outside a cycle; cycles carry their own date. */
  timeZone?: string;
  emit?: Emit;
}

export interface CloseOptions {
  closeKind?: CloseKind;
  /** Cycle the close belongs to; dates the trade when no decision is given. */
  cycle?: CycleContext;
  decision?: DailyDecision;
}

export interface ReviseOptions {
  currentPrice?: number;
  decision?: DailyDecision;
}

/**
 * Mutation surface handed out by `PositionLedger.transact`. Calls made through a
 * session run while the ticker's lock is held.
 */
export interface TickerSession {
  readonly ticker: string;
  /** `asOf` is the date holding days are counted to. */
  get(asOf?: string): Promise<Position | null>;
  hasDecision(cycleId: string): Promise<boolean>;
  hold(decision: DailyDecision): Promise<Position>;
  revise(draft: ScenarioDraft, options?: ReviseOptions): Promise<Position>;
  close(sellPrice: number, reason: string, options?: CloseOptions): Promise<ClosedTrade>;
}

export function profitRatePercent(buyPrice: number, sellPrice: number): number {
  return ((sellPrice - buyPrice) * 100) / buyPrice;
}

export function classifyOutcome(profitRate: number): TradeOutcome {
  if (profitRate > 0) return 'Win';
  if (profitRate < 0) return 'Loss';
  return 'BreakEven';
}

function isPositiveNumber(n: number): boolean {
  return Number.isFinite(n) && n > 0;
}

/** Level checks shared by open and revise; returns the violations found. */
function levelViolations(draft: ScenarioDraft): string[] {
  const issues: string[] = [];
  if (!isPositiveNumber(draft.targetPrice)) issues.push(`targetPrice ${draft.targetPrice} is not a positive number`);
  if (!isPositiveNumber(draft.stopLoss)) issues.push(`stopLoss ${draft.stopLoss} is not a positive number`);
  if (issues.length === 0 && draft.stopLoss >= draft.targetPrice) {
    issues.push(`stopLoss ${draft.stopLoss} must be below targetPrice ${draft.targetPrice}`);
  }
  return issues;
}

export class PositionLedger {
  private readonly store: PortfolioStore;
  private readonly capacity: CapacityManager;
  private readonly history: HistoryAggregator;
  private readonly clock: Clock;
  private readonly timeZone: string;
  private readonly emit: Emit;
  private readonly locks = new KeyedMutex();

  constructor(options: LedgerOptions) {
    this.store = options.store;
    this.capacity = options.capacity;
    this.history = options.history;
    this.clock = options.clock ?? systemClock;
    this.timeZone = options.timeZone ?? 'UTC';
    this.emit = options.emit ?? (async () => {});
  }

  // ── Reads ─────────────────────────────────────────────────────────────────

  /** Calendar date of the clock in the ledger's zone. */
  today(): string {
    return cycleIdFor(this.clock(), this.timeZone).cycleDate;
  }

  async get(ticker: string, asOf?: string): Promise<Position | null> {
    const record = await this.store.getPosition(ticker);
    return record ? this.toPosition(record, asOf) : null;
  }

  async listOpen(asOf?: string): Promise<Position[]> {
    const records = await this.store.listPositions();
    return records.map(r => this.toPosition(r, asOf));
  }

  async listDecisions(ticker?: string): Promise<DailyDecision[]> {
    return this.store.listDecisions(ticker);
  }

  async listCandidates(ticker?: string): Promise<WatchlistCandidate[]> {
    return this.store.listCandidates(ticker);
  }

  // ── Mutations ─────────────────────────────────────────────────────────────

  async open(
    candidate: WatchlistCandidate,
    draft: ScenarioDraft,
    options: { quantity?: number } = {},
  ): Promise<Position> {
    const { ticker } = candidate;
    if (candidate.decision !== 'Enter') {
      throw new InvalidCandidate(`Candidate ${ticker} was screened as ${candidate.decision}`, ticker, candidate.cycleId);
    }

    const quantity = options.quantity ?? 1;
    if (!isPositiveNumber(quantity)) {
      throw new InvalidCandidate(`Quantity ${quantity} for ${ticker} is not a positive number`, ticker, candidate.cycleId);
    }

    const buyPrice = candidate.currentPrice;
    const issues = levelViolations(draft);
    if (issues.length === 0 && !(draft.stopLoss < buyPrice && buyPrice < draft.targetPrice)) {
      issues.push(`levels must satisfy stopLoss ${draft.stopLoss} < buyPrice ${buyPrice} < targetPrice ${draft.targetPrice}`);
    }
    if (issues.length > 0) {
      throw new InvalidScenario(`Cannot open ${ticker}: ${issues.join('; ')}`, ticker, candidate.cycleId);
    }

    const now = this.clock();
    const record: PositionRecord = {
      ticker,
      companyName: candidate.companyName,
      sector: candidate.sector,
      quantity,
      buyPrice,
      buyDate: candidate.cycleDate,
      currentPrice: buyPrice,
      priceUpdatedAt: now.toISOString(),
      openedCycleId: candidate.cycleId,
      scenario: { ...draft, kind: 'scenario', revision: 1 },
    };

    // The scenario's limit gates its own insert but only sticks once the insert commits.
    await this.locks.run(ticker, async () => {
      const capacity = this.capacity.candidate(draft.maxPortfolioSize);
      const result = await this.store.transaction(tx => tx.insertPosition(record, capacity));
      if (!result.ok) {
        if (result.reason === 'duplicate') throw new DuplicatePosition(ticker);
        throw new CapacityExceeded(ticker, result.openCount, capacity);
      }
      this.capacity.observe(draft.maxPortfolioSize);
    });

    const position = this.toPosition(record, candidate.cycleDate);
    console.log(
      `[Ledger] OPEN ${ticker} @ ${buyPrice} (target=${draft.targetPrice}, stop=${draft.stopLoss}, ` +
      `horizon=${draft.investmentHorizon})`,
    );
    await this.emit({ type: 'position_opened', position });
    return position;
  }

  async revise(ticker: string, draft: ScenarioDraft): Promise<Position> {
    return this.transact(ticker, session => session.revise(draft));
  }

  async close(ticker: string, sellPrice: number, reason: string, options: CloseOptions = {}): Promise<ClosedTrade> {
    return this.transact(ticker, session => session.close(sellPrice, reason, options));
  }

  /** Refresh the market price of an open position without touching its scenario. */
  async markPrice(ticker: string, price: number): Promise<Position> {
    if (!isPositiveNumber(price)) throw new RangeError(`Price ${price} for ${ticker} is not a positive number`);
    return this.locks.run(ticker, async () => {
      const at = this.clock().toISOString();
      const record = await this.store.transaction(async tx => {
        if (!(await tx.updatePrice(ticker, price, at))) throw new UnknownPosition(ticker);
        return tx.getPosition(ticker);
      });
      if (!record) throw new UnknownPosition(ticker);
      return this.toPosition(record);
    });
  }

  /**
   * Run `fn` while holding the ticker's lock. The Decision Processor reads,
   * plans and writes through the session without another transition for the
   * same ticker slipping in between.
   */
  async transact<T>(ticker: string, fn: (session: TickerSession) => Promise<T>): Promise<T> {
    return this.locks.run(ticker, () => fn(this.session(ticker)));
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private session(ticker: string): TickerSession {
    return {
      ticker,
      get: asOf => this.get(ticker, asOf),
      hasDecision: cycleId => this.store.hasDecision(ticker, cycleId),
      hold: decision => this.holdUnlocked(ticker, decision),
      revise: (draft, options) => this.reviseUnlocked(ticker, draft, options ?? {}),
      close: (sellPrice, reason, options) => this.closeUnlocked(ticker, sellPrice, reason, options ?? {}),
    };
  }

  private async appendDecision(tx: PortfolioTransaction, decision: DailyDecision | undefined): Promise<void> {
    if (!decision) return;
    if ((await tx.appendDecision(decision)) === 'duplicate') {
      throw new DuplicateDecision(decision.ticker, decision.cycleId);
    }
  }

  private async holdUnlocked(ticker: string, decision: DailyDecision): Promise<Position> {
    const at = this.clock().toISOString();
    const record = await this.store.transaction(async tx => {
      if (!(await tx.updatePrice(ticker, decision.currentPrice, at))) {
        throw new UnknownPosition(ticker, decision.cycleId);
      }
      await this.appendDecision(tx, decision);
      return tx.getPosition(ticker);
    });
    if (!record) throw new UnknownPosition(ticker, decision.cycleId);
    return this.toPosition(record, decision.cycleDate);
  }

  private async reviseUnlocked(ticker: string, draft: ScenarioDraft, options: ReviseOptions): Promise<Position> {
    const cycleId = options.decision?.cycleId ?? null;
    const issues = levelViolations(draft);
    if (issues.length > 0) {
      throw new InvalidScenario(`Cannot revise ${ticker}: ${issues.join('; ')}`, ticker, cycleId);
    }

    const at = this.clock().toISOString();
    const { before, after } = await this.store.transaction(async tx => {
      const current = await tx.getPosition(ticker);
      if (!current) throw new UnknownPosition(ticker, cycleId);

      const scenario: Scenario = { ...draft, kind: 'scenario', revision: current.scenario.revision + 1 };
      if (!(await tx.replaceScenario(ticker, scenario))) throw new UnknownPosition(ticker, cycleId);
      if (options.currentPrice !== undefined) await tx.updatePrice(ticker, options.currentPrice, at);
      await this.appendDecision(tx, options.decision);

      const updated = await tx.getPosition(ticker);
      if (!updated) throw new UnknownPosition(ticker, cycleId);
      return { before: current, after: updated };
    });

    this.capacity.observe(after.scenario.maxPortfolioSize);
    const position = this.toPosition(after, options.decision?.cycleDate);
    console.log(
      `[Ledger] REVISE ${ticker} r${after.scenario.revision}: ` +
      `target ${before.scenario.targetPrice} → ${after.scenario.targetPrice}, ` +
      `stop ${before.scenario.stopLoss} → ${after.scenario.stopLoss}`,
    );
    await this.emit({
      type: 'position_revised',
      position,
      previousTarget: before.scenario.targetPrice,
      previousStop: before.scenario.stopLoss,
    });
    return position;
  }

  private async closeUnlocked(
    ticker: string,
    sellPrice: number,
    reason: string,
    options: CloseOptions,
  ): Promise<ClosedTrade> {
    if (!isPositiveNumber(sellPrice)) throw new RangeError(`Sell price ${sellPrice} for ${ticker} is not a positive number`);

    const cycleId = options.decision?.cycleId ?? options.cycle?.cycleId ?? null;
    const sellDate = options.decision?.cycleDate ?? options.cycle?.cycleDate ?? this.today();

    const trade = await this.store.transaction(async tx => {
      const current = await tx.getPosition(ticker);
      if (!current) throw new UnknownPosition(ticker, cycleId);

      const rate = profitRatePercent(current.buyPrice, sellPrice);
      const closed: ClosedTrade = {
        id: uuidv4(),
        ticker,
        companyName: current.companyName,
        sector: current.sector,
        quantity: current.quantity,
        buyPrice: current.buyPrice,
        sellPrice,
        buyDate: current.buyDate,
        sellDate,
        holdingDays: daysBetween(current.buyDate, sellDate),
        profitRatePercent: rate,
        outcome: classifyOutcome(rate),
        sellReason: reason,
        closeKind: options.closeKind ?? 'manual',
        closedCycleId: cycleId,
        finalScenario: current.scenario,
      };

      // Another writer may have closed it since the read above.
      if (!(await tx.deletePosition(ticker))) throw new UnknownPosition(ticker, cycleId);
      await this.appendDecision(tx, options.decision);
      await this.history.record(closed, tx);
      return closed;
    });

    console.log(
      `[Ledger] CLOSE ${ticker} @ ${sellPrice} (${trade.closeKind}) ` +
      `${trade.profitRatePercent.toFixed(2)}% ${trade.outcome} after ${trade.holdingDays}d — ${reason}`,
    );
    await this.emit({ type: 'position_closed', trade });
    return trade;
  }

  private toPosition(record: PositionRecord, asOf = this.today()): Position {
    return { ...record, holdingDays: daysBetween(record.buyDate, asOf) };
  }
}
