import type { PortfolioStore } from '../db/store.js';
import { systemClock, type Clock } from '../lib/dates.js';
import type { PortfolioSummary, PositionRecord, TradingStats } from '../types/portfolio.js';
import { CapacityManager } from './capacity-manager.js';
import { DecisionProcessor } from './decision-processor.js';
import { createEmitter, type Emit, type NotificationSink } from './events.js';
import { HistoryAggregator } from './history-aggregator.js';
import { PositionLedger } from './position-ledger.js';
import { ScoringGate } from './scoring-gate.js';

function openedAfter(a: PositionRecord, b: PositionRecord): boolean {
  if (a.buyDate !== b.buyDate) return a.buyDate > b.buyDate;
  return (a.openedCycleId ?? '') > (b.openedCycleId ?? '');
}

export interface PortfolioEngineOptions {
  store: PortfolioStore;
  maxPortfolioSize: number;
  maxPositionsPerSector?: number | null;
  clock?: Clock;
  /** Zone for calendar dates outside a cycle (dashboard reads, manual closes). */
  timeZone?: string;
  sinks?: NotificationSink[];
}

/** All engine components wired over one store, clock and set of sinks. */
export class PortfolioEngine {
  readonly store: PortfolioStore;
  readonly capacity: CapacityManager;
  readonly history: HistoryAggregator;
  readonly ledger: PositionLedger;
  readonly gate: ScoringGate;
  readonly processor: DecisionProcessor;
  /** Fans events out to the configured sinks. */
  readonly emit: Emit;

  constructor(options: PortfolioEngineOptions) {
    const clock = options.clock ?? systemClock;
    const emit = createEmitter(options.sinks ?? []);
    this.emit = emit;

    this.store = options.store;
    this.capacity = new CapacityManager(options.store, options.maxPortfolioSize);
    this.history = new HistoryAggregator(options.store);
    this.ledger = new PositionLedger({
      store: options.store,
      capacity: this.capacity,
      history: this.history,
      clock,
      timeZone: options.timeZone,
      emit,
    });
    this.gate = new ScoringGate({
      store: options.store,
      capacity: this.capacity,
      maxPositionsPerSector: options.maxPositionsPerSector,
      clock,
      emit,
    });
    this.processor = new DecisionProcessor({ ledger: this.ledger, clock, emit });
  }

  /**
   * Re-apply the portfolio limit carried by stored scenarios after a restart:
   * the most recently opened position's, or the last closed trade's when the
   * book is empty. Returns the resulting capacity.
   */
  async restoreCapacity(): Promise<number> {
    const positions = await this.store.listPositions();
    const latest = positions.reduce<PositionRecord | undefined>(
      (acc, p) => (acc === undefined || openedAfter(p, acc) ? p : acc),
      undefined,
    );
    const scenario = latest?.scenario ?? (await this.history.listTrades()).at(-1)?.finalScenario;
    if (scenario) this.capacity.observe(scenario.maxPortfolioSize);
    return this.capacity.capacity;
  }

  async summary(totalCapital?: number): Promise<PortfolioSummary> {
    return this.capacity.summary(await this.ledger.listOpen(), totalCapital);
  }

  async stats(): Promise<TradingStats> {
    return this.history.stats();
  }
}

export * from './errors.js';
export { CapacityManager } from './capacity-manager.js';
export { DecisionProcessor, planTransition } from './decision-processor.js';
export { HistoryAggregator, computeStats } from './history-aggregator.js';
export { PositionLedger, profitRatePercent, classifyOutcome } from './position-ledger.js';
export { ScoringGate } from './scoring-gate.js';
export { resolveMinScore } from './min-score.js';
export { createEmitter } from './events.js';
export type { NotificationSink, Emit } from './events.js';
