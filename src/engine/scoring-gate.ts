import { v4 as uuidv4 } from 'uuid';
import { systemClock, type Clock } from '../lib/dates.js';
import type { PortfolioStore } from '../db/store.js';
import type {
  CandidateInput,
  CycleContext,
  SkipReason,
  WatchlistCandidate,
} from '../types/portfolio.js';
import type { CapacityManager } from './capacity-manager.js';
import type { Emit } from './events.js';
import { InvalidCandidate } from './errors.js';

export interface ScoringGateOptions {
  store: PortfolioStore;
  capacity: CapacityManager;
  /** Open positions allowed per sector; `null` disables the check. */
  maxPositionsPerSector?: number | null;
  clock?: Clock;
  emit?: Emit;
}

const UNKNOWN_SECTOR = 'Unknown';

export class ScoringGate {
  private readonly store: PortfolioStore;
  private readonly capacity: CapacityManager;
  private readonly maxPositionsPerSector: number | null;
  private readonly clock: Clock;
  private readonly emit: Emit;

  constructor(options: ScoringGateOptions) {
    this.store = options.store;
    this.capacity = options.capacity;
    this.maxPositionsPerSector = options.maxPositionsPerSector ?? null;
    this.clock = options.clock ?? systemClock;
    this.emit = options.emit ?? (async () => {});
  }

  /**
   * Screen one candidate against `threshold`. Every valid candidate leaves
   * exactly one WatchlistCandidate record, whether it enters or not.
   */
  async evaluate(input: CandidateInput, threshold: number, cycle: CycleContext): Promise<WatchlistCandidate> {
    const ticker = typeof input.ticker === 'string' ? input.ticker.trim() : '';
    if (!ticker) {
      throw new InvalidCandidate('Candidate is missing a ticker', null, cycle.cycleId);
    }
    if (typeof input.buyScore !== 'number' || !Number.isFinite(input.buyScore) || input.buyScore < 0 || input.buyScore > 10) {
      throw new InvalidCandidate(`buyScore ${input.buyScore} for ${ticker} is outside [0, 10]`, ticker, cycle.cycleId);
    }
    if (typeof input.currentPrice !== 'number' || !Number.isFinite(input.currentPrice) || input.currentPrice <= 0) {
      throw new InvalidCandidate(`currentPrice ${input.currentPrice} for ${ticker} is not a positive number`, ticker, cycle.cycleId);
    }
    if (!Number.isFinite(threshold)) {
      throw new InvalidCandidate(`threshold ${threshold} for ${ticker} is not a finite number`, ticker, cycle.cycleId);
    }

    const sector = input.sector?.trim() || UNKNOWN_SECTOR;
    const verdict = await this.verdict(input.buyScore, threshold, sector);

    const candidate: WatchlistCandidate = {
      id: uuidv4(),
      ticker,
      companyName: input.companyName?.trim() || ticker,
      sector,
      cycleId: cycle.cycleId,
      cycleDate: cycle.cycleDate,
      analyzedAt: input.analyzedAt ?? this.clock().toISOString(),
      currentPrice: input.currentPrice,
      buyScore: input.buyScore,
      minScoreThreshold: threshold,
      decision: verdict.skipReason ? 'Skip' : 'Enter',
      rationale: verdict.skipReason ? verdict.rationale : input.rationale?.trim() || verdict.rationale,
      skipReason: verdict.skipReason,
    };

    await this.store.transaction(tx => tx.insertCandidate(candidate));

    console.log(
      `[ScoringGate ${cycle.cycleId}] ${ticker} score=${input.buyScore} min=${threshold} → ${candidate.decision}` +
      (candidate.skipReason ? ` (${candidate.rationale})` : ''),
    );
    await this.emit({ type: 'candidate_screened', candidate });
    return candidate;
  }

  private async verdict(
    buyScore: number,
    threshold: number,
    sector: string,
  ): Promise<{ skipReason: SkipReason | null; rationale: string }> {
    if (buyScore < threshold) {
      return { skipReason: 'score', rationale: `score shortfall (${buyScore} < ${threshold})` };
    }

    const openCount = await this.capacity.openCount();
    if (openCount >= this.capacity.capacity) {
      return { skipReason: 'capacity', rationale: `no free slot (${openCount}/${this.capacity.capacity} used)` };
    }

    if (this.maxPositionsPerSector !== null) {
      const inSector = await this.store.countPositionsInSector(sector);
      if (inSector >= this.maxPositionsPerSector) {
        return {
          skipReason: 'sector',
          rationale: `sector '${sector}' at limit (${inSector}/${this.maxPositionsPerSector})`,
        };
      }
    }

    return { skipReason: null, rationale: `score ${buyScore} meets ${threshold}` };
  }
}
