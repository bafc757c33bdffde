import type { PortfolioReader } from '../db/store.js';
import type { PortfolioSummary, Position, PositionValuation } from '../types/portfolio.js';

function valueOf(position: Pick<Position, 'currentPrice' | 'quantity'>): number {
  return position.currentPrice * position.quantity;
}

function isValidSize(n: number): boolean {
  return Number.isInteger(n) && n >= 1;
}

function pct(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

/**
 * Tracks how many positions may be open at once. Only the slot count gates
 * entries; weights are reporting figures.
 */
export class CapacityManager {
  private maxPortfolioSize: number;

  constructor(
    private readonly reader: Pick<PortfolioReader, 'countPositions'>,
    maxPortfolioSize: number,
  ) {
    if (!isValidSize(maxPortfolioSize)) {
      throw new RangeError(`maxPortfolioSize must be a positive integer, got ${maxPortfolioSize}`);
    }
    this.maxPortfolioSize = maxPortfolioSize;
  }

  get capacity(): number {
    return this.maxPortfolioSize;
  }

  /** The capacity `observe(maxPortfolioSize)` would leave, without applying it. */
  candidate(maxPortfolioSize: number): number {
    return isValidSize(maxPortfolioSize) ? maxPortfolioSize : this.maxPortfolioSize;
  }

  /** Scenario data may carry a new limit; the most recent valid value wins. */
  observe(maxPortfolioSize: number): void {
    if (!isValidSize(maxPortfolioSize)) {
      console.warn(`[Capacity] Ignoring invalid maxPortfolioSize ${maxPortfolioSize}`);
      return;
    }
    if (maxPortfolioSize !== this.maxPortfolioSize) {
      console.log(`[Capacity] maxPortfolioSize ${this.maxPortfolioSize} → ${maxPortfolioSize}`);
      this.maxPortfolioSize = maxPortfolioSize;
    }
  }

  async openCount(): Promise<number> {
    return this.reader.countPositions();
  }

  async hasFreeSlot(): Promise<boolean> {
    return (await this.openCount()) < this.maxPortfolioSize;
  }

  weightOf(position: Pick<Position, 'currentPrice' | 'quantity'>, totalCapital: number): number {
    return pct(valueOf(position), totalCapital);
  }

  /**
   * Derived view of the open set. Weights are relative to `totalCapital` when
   * given, otherwise to the total evaluation amount.
   */
  summary(positions: Position[], totalCapital?: number): PortfolioSummary {
    const totalEvaluationAmount = positions.reduce((sum, p) => sum + valueOf(p), 0);
    const totalPurchaseAmount = positions.reduce((sum, p) => sum + p.buyPrice * p.quantity, 0);
    const totalUnrealizedProfit = totalEvaluationAmount - totalPurchaseAmount;
    const base = totalCapital ?? totalEvaluationAmount;

    const valuations: PositionValuation[] = positions.map(p => ({
      ticker: p.ticker,
      evaluationAmount: valueOf(p),
      unrealizedProfit: (p.currentPrice - p.buyPrice) * p.quantity,
      profitRatePercent: pct(p.currentPrice - p.buyPrice, p.buyPrice),
      weightPercent: this.weightOf(p, base),
    }));

    return {
      totalPositions: positions.length,
      capacity: this.maxPortfolioSize,
      freeSlots: Math.max(0, this.maxPortfolioSize - positions.length),
      totalPurchaseAmount,
      totalEvaluationAmount,
      totalUnrealizedProfit,
      unrealizedProfitRate: pct(totalUnrealizedProfit, totalPurchaseAmount),
      positions: valuations,
    };
  }
}
