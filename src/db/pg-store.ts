import type { Pool, PoolClient } from 'pg';
import type { DailyDecision } from '../types/decision.js';
import type {
  ClosedTrade,
  PositionRecord,
  Scenario,
  WatchlistCandidate,
} from '../types/portfolio.js';
import { withTransaction } from './client.js';
import * as positions from './repositories/positions.js';
import * as decisions from './repositories/decisions.js';
import * as watchlist from './repositories/watchlist.js';
import * as trades from './repositories/trades.js';
import type {
  AppendResult,
  InsertPositionResult,
  PortfolioReader,
  PortfolioStore,
  PortfolioTransaction,
} from './store.js';

// Serialises every capacity-checked insert across processes for the length of its transaction.
const CAPACITY_LOCK_KEY = 'portfolio.capacity';

class ClientReader implements PortfolioReader {
  constructor(protected readonly withClient: <T>(fn: (client: PoolClient) => Promise<T>) => Promise<T>) {}

  getPosition(ticker: string): Promise<PositionRecord | null> {
    return this.withClient(c => positions.getPosition(c, ticker));
  }

  listPositions(): Promise<PositionRecord[]> {
    return this.withClient(c => positions.listPositions(c));
  }

  countPositions(): Promise<number> {
    return this.withClient(c => positions.countPositions(c));
  }

  countPositionsInSector(sector: string): Promise<number> {
    return this.withClient(c => positions.countPositions(c, sector));
  }

  hasDecision(ticker: string, cycleId: string): Promise<boolean> {
    return this.withClient(c => decisions.hasDecision(c, ticker, cycleId));
  }

  listDecisions(ticker?: string): Promise<DailyDecision[]> {
    return this.withClient(c => decisions.listDecisions(c, ticker));
  }

  listCandidates(ticker?: string): Promise<WatchlistCandidate[]> {
    return this.withClient(c => watchlist.listCandidates(c, ticker));
  }

  listClosedTrades(): Promise<ClosedTrade[]> {
    return this.withClient(c => trades.listClosedTrades(c));
  }
}

class PgTransaction extends ClientReader implements PortfolioTransaction {
  constructor(private readonly client: PoolClient) {
    super(async fn => fn(client));
  }

  // Writers read the row they are about to change; a concurrent revise or close
  // in another process waits here and then sees the committed state.
  override getPosition(ticker: string): Promise<PositionRecord | null> {
    return positions.getPosition(this.client, ticker, { forUpdate: true });
  }

  insertCandidate(candidate: WatchlistCandidate): Promise<void> {
    return watchlist.insertCandidate(this.client, candidate);
  }

  async insertPosition(position: PositionRecord, capacity: number): Promise<InsertPositionResult> {
    await this.client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [CAPACITY_LOCK_KEY]);

    if (await positions.getPosition(this.client, position.ticker)) {
      return { ok: false, reason: 'duplicate' };
    }
    const openCount = await positions.countPositions(this.client);
    if (openCount >= capacity) return { ok: false, reason: 'capacity', openCount };

    await positions.insertPosition(this.client, position);
    return { ok: true };
  }

  replaceScenario(ticker: string, scenario: Scenario): Promise<boolean> {
    return positions.replaceScenario(this.client, ticker, scenario);
  }

  updatePrice(ticker: string, price: number, at: string): Promise<boolean> {
    return positions.updatePrice(this.client, ticker, price, at);
  }

  deletePosition(ticker: string): Promise<boolean> {
    return positions.deletePosition(this.client, ticker);
  }

  appendDecision(decision: DailyDecision): Promise<AppendResult> {
    return decisions.appendDecision(this.client, decision);
  }

  appendClosedTrade(trade: ClosedTrade): Promise<AppendResult> {
    return trades.appendClosedTrade(this.client, trade);
  }
}

/** PostgreSQL-backed store over the `portfolio` schema (see sql/001_portfolio.sql). */
export class PgPortfolioStore extends ClientReader implements PortfolioStore {
  constructor(private readonly pool: Pool) {
    super(async fn => {
      const client = await pool.connect();
      try {
        return await fn(client);
      } finally {
        client.release();
      }
    });
  }

  transaction<T>(fn: (tx: PortfolioTransaction) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, client => fn(new PgTransaction(client)));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
