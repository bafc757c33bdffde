import type { DailyDecision } from '../types/decision.js';
import type {
  ClosedTrade,
  PositionRecord,
  Scenario,
  WatchlistCandidate,
} from '../types/portfolio.js';

export type InsertPositionResult =
  | { ok: true }
  | { ok: false; reason: 'duplicate' }
  | { ok: false; reason: 'capacity'; openCount: number };

export type AppendResult = 'ok' | 'duplicate';

/** Reads available both inside and outside a transaction. */
export interface PortfolioReader {
  getPosition(ticker: string): Promise<PositionRecord | null>;
  listPositions(): Promise<PositionRecord[]>;
  countPositions(): Promise<number>;
  countPositionsInSector(sector: string): Promise<number>;
  hasDecision(ticker: string, cycleId: string): Promise<boolean>;
  listDecisions(ticker?: string): Promise<DailyDecision[]>;
  listCandidates(ticker?: string): Promise<WatchlistCandidate[]>;
  listClosedTrades(): Promise<ClosedTrade[]>;
}

/**
 * Write surface of one atomic unit. Everything written through a transaction
 * commits together or not at all.
 */
export interface PortfolioTransaction extends PortfolioReader {
  insertCandidate(candidate: WatchlistCandidate): Promise<void>;
  /** Checks uniqueness and capacity and inserts in the same atomic step. */
  insertPosition(position: PositionRecord, capacity: number): Promise<InsertPositionResult>;
  replaceScenario(ticker: string, scenario: Scenario): Promise<boolean>;
  updatePrice(ticker: string, price: number, at: string): Promise<boolean>;
  deletePosition(ticker: string): Promise<boolean>;
  appendDecision(decision: DailyDecision): Promise<AppendResult>;
  appendClosedTrade(trade: ClosedTrade): Promise<AppendResult>;
}

export interface PortfolioStore extends PortfolioReader {
  transaction<T>(fn: (tx: PortfolioTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
