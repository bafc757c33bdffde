import { KeyedMutex } from '../lib/keyed-mutex.js';
import type { DailyDecision } from '../types/decision.js';
import type {
  ClosedTrade,
  PositionRecord,
  Scenario,
  WatchlistCandidate,
} from '../types/portfolio.js';
import type {
  AppendResult,
  InsertPositionResult,
  PortfolioReader,
  PortfolioStore,
  PortfolioTransaction,
} from './store.js';

interface State {
  positions: Map<string, PositionRecord>;
  decisions: DailyDecision[];
  candidates: WatchlistCandidate[];
  trades: ClosedTrade[];
}

function emptyState(): State {
  return { positions: new Map(), decisions: [], candidates: [], trades: [] };
}

function cloneState(state: State): State {
  return {
    positions: new Map(state.positions),
    decisions: [...state.decisions],
    candidates: [...state.candidates],
    trades: [...state.trades],
  };
}

function byOpenOrder(a: PositionRecord, b: PositionRecord): number {
  return a.buyDate.localeCompare(b.buyDate) || a.ticker.localeCompare(b.ticker);
}

class StateReader implements PortfolioReader {
  constructor(protected readonly state: () => State) {}

  async getPosition(ticker: string): Promise<PositionRecord | null> {
    return structuredClone(this.state().positions.get(ticker) ?? null);
  }

  async listPositions(): Promise<PositionRecord[]> {
    return structuredClone([...this.state().positions.values()].sort(byOpenOrder));
  }

  async countPositions(): Promise<number> {
    return this.state().positions.size;
  }

  async countPositionsInSector(sector: string): Promise<number> {
    let count = 0;
    for (const p of this.state().positions.values()) {
      if (p.sector === sector) count++;
    }
    return count;
  }

  async hasDecision(ticker: string, cycleId: string): Promise<boolean> {
    return this.state().decisions.some(d => d.ticker === ticker && d.cycleId === cycleId);
  }

  async listDecisions(ticker?: string): Promise<DailyDecision[]> {
    const all = this.state().decisions;
    return structuredClone(ticker ? all.filter(d => d.ticker === ticker) : all);
  }

  async listCandidates(ticker?: string): Promise<WatchlistCandidate[]> {
    const all = this.state().candidates;
    return structuredClone(ticker ? all.filter(c => c.ticker === ticker) : all);
  }

  async listClosedTrades(): Promise<ClosedTrade[]> {
    return structuredClone(this.state().trades);
  }
}

class MemoryTransaction extends StateReader implements PortfolioTransaction {
  constructor(private readonly working: State) {
    super(() => working);
  }

  async insertCandidate(candidate: WatchlistCandidate): Promise<void> {
    this.working.candidates.push(structuredClone(candidate));
  }

  async insertPosition(position: PositionRecord, capacity: number): Promise<InsertPositionResult> {
    if (this.working.positions.has(position.ticker)) return { ok: false, reason: 'duplicate' };
    const openCount = this.working.positions.size;
    if (openCount >= capacity) return { ok: false, reason: 'capacity', openCount };
    this.working.positions.set(position.ticker, structuredClone(position));
    return { ok: true };
  }

  async replaceScenario(ticker: string, scenario: Scenario): Promise<boolean> {
    const existing = this.working.positions.get(ticker);
    if (!existing) return false;
    this.working.positions.set(ticker, { ...existing, scenario: structuredClone(scenario) });
    return true;
  }

  async updatePrice(ticker: string, price: number, at: string): Promise<boolean> {
    const existing = this.working.positions.get(ticker);
    if (!existing) return false;
    this.working.positions.set(ticker, { ...existing, currentPrice: price, priceUpdatedAt: at });
    return true;
  }

  async deletePosition(ticker: string): Promise<boolean> {
    return this.working.positions.delete(ticker);
  }

  async appendDecision(decision: DailyDecision): Promise<AppendResult> {
    const exists = this.working.decisions.some(
      d => d.ticker === decision.ticker && d.cycleId === decision.cycleId,
    );
    if (exists) return 'duplicate';
    this.working.decisions.push(structuredClone(decision));
    return 'ok';
  }

  async appendClosedTrade(trade: ClosedTrade): Promise<AppendResult> {
    if (this.working.trades.some(t => t.id === trade.id)) return 'duplicate';
    this.working.trades.push(structuredClone(trade));
    return 'ok';
  }
}

/**
 * Process-local store. Transactions run one at a time against a copy of the
 * state that replaces the committed state only when the callback resolves.
 */
export class MemoryPortfolioStore extends StateReader implements PortfolioStore {
  private readonly holder: { committed: State };
  private readonly lock = new KeyedMutex();

  constructor() {
    const holder = { committed: emptyState() };
    super(() => holder.committed);
    this.holder = holder;
  }

  async transaction<T>(fn: (tx: PortfolioTransaction) => Promise<T>): Promise<T> {
    return this.lock.run('tx', async () => {
      const working = cloneState(this.holder.committed);
      const result = await fn(new MemoryTransaction(working));
      this.holder.committed = working;
      return result;
    });
  }

  async close(): Promise<void> {
    this.holder.committed = emptyState();
  }
}
