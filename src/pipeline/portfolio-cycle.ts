import type { PortfolioEngine } from '../engine/index.js';
import { isEngineError } from '../engine/errors.js';
import { resolveMinScore } from '../engine/min-score.js';
import type { JudgmentProducer, PriceFeed } from '../types/collaborators.js';
import type { CycleReportSummary, TransitionResult } from '../types/decision.js';
import type {
  CandidateInput,
  CycleContext,
  MarketCondition,
  Position,
  ScenarioDraft,
  WatchlistCandidate,
} from '../types/portfolio.js';

/** A screening input together with the scenario it would be opened under. */
export interface CycleCandidate extends CandidateInput {
  scenario: ScenarioDraft;
  quantity?: number;
}

export interface CycleInput {
  cycle: CycleContext;
  candidates?: CycleCandidate[];
  marketCondition?: MarketCondition;
  /** Fixed threshold; when absent it is derived from `baseMinScore` and market state. */
  minScore?: number;
  signal?: AbortSignal;
}

export interface CycleDeps {
  engine: PortfolioEngine;
  judgments: JudgmentProducer;
  prices: PriceFeed;
  baseMinScore: number;
}

export interface CycleItemError {
  ticker: string | null;
  stage: 'prices' | 'position' | 'candidate';
  code: string;
  reason: string;
}

export interface CycleReport extends CycleReportSummary {
  minScore: number;
  transitions: TransitionResult[];
  screened: WatchlistCandidate[];
  openedPositions: Position[];
  errors: CycleItemError[];
  cancelledTickers: string[];
}

/**
 * One scheduled pass: judge every open position (concurrently, one transition
 * per ticker), then screen new candidates one at a time so each screening sees
 * the slots freed or taken before it.
 *
 * Item failures are logged and reported; nothing thrown by a single ticker
 * stops the rest of the cycle.
 */
export async function runPortfolioCycle(deps: CycleDeps, input: CycleInput): Promise<CycleReport> {
  const { engine } = deps;
  const { cycle, signal } = input;
  const tag = `[Cycle ${cycle.cycleId}]`;
  const marketCondition = input.marketCondition ?? 'neutral';

  const errors: CycleItemError[] = [];
  const transitions: TransitionResult[] = [];
  const screened: WatchlistCandidate[] = [];
  const openedPositions: Position[] = [];
  const cancelledTickers: string[] = [];

  const fail = (ticker: string | null, stage: CycleItemError['stage'], err: unknown): void => {
    const code = isEngineError(err) ? err.code : 'UNEXPECTED';
    const reason = err instanceof Error ? err.message : String(err);
    errors.push({ ticker, stage, code, reason });
    console.error(`${tag} ${ticker ?? '-'} ${code}: ${reason}`);
  };

  // ── 1. Open positions ─────────────────────────────────────────────────────
  const positions = await engine.ledger.listOpen(cycle.cycleDate);
  console.log(`${tag} Start: ${positions.length} open position(s), ${input.candidates?.length ?? 0} candidate(s)`);

  let prices = new Map<string, number>();
  if (positions.length > 0) {
    try {
      prices = await deps.prices.getPrices(positions.map(p => p.ticker));
    } catch (err) {
      fail(null, 'prices', err);
    }
  }

  const settled = await Promise.allSettled(
    positions.map(async (position): Promise<TransitionResult | 'cancelled'> => {
      const { ticker } = position;
      if (signal?.aborted) return 'cancelled';

      const currentPrice = prices.get(ticker);
      if (currentPrice === undefined) {
        console.warn(`${tag} ${ticker} skipped — no price this cycle`);
        return { ticker, outcome: 'skipped', reason: 'missing_price' };
      }

      const judgment = await deps.judgments.judge(position, { cycle, currentPrice, marketCondition });
      if (signal?.aborted) return 'cancelled';
      return engine.processor.process(ticker, judgment, currentPrice, cycle);
    }),
  );

  settled.forEach((result, i) => {
    const ticker = positions[i]?.ticker ?? null;
    if (result.status === 'rejected') {
      fail(ticker, 'position', result.reason);
    } else if (result.value === 'cancelled') {
      if (ticker) cancelledTickers.push(ticker);
    } else {
      transitions.push(result.value);
    }
  });

  // ── 2. Candidates ─────────────────────────────────────────────────────────
  const minScore = input.minScore ?? resolveMinScore({
    base: deps.baseMinScore,
    marketCondition,
    openCount: await engine.capacity.openCount(),
    capacity: engine.capacity.capacity,
  });

  for (const candidate of input.candidates ?? []) {
    if (signal?.aborted) {
      cancelledTickers.push(candidate.ticker);
      continue;
    }
    try {
      const record = await engine.gate.evaluate(candidate, minScore, cycle);
      screened.push(record);
      if (record.decision === 'Enter') {
        openedPositions.push(await engine.ledger.open(record, candidate.scenario, { quantity: candidate.quantity }));
      }
    } catch (err) {
      fail(candidate.ticker || null, 'candidate', err);
    }
  }

  // ── 3. Report ─────────────────────────────────────────────────────────────
  const stats = await engine.stats();
  const count = (outcome: TransitionResult['outcome']): number =>
    transitions.filter(t => t.outcome === outcome).length;

  const summary: CycleReportSummary = {
    cycleId: cycle.cycleId,
    held: count('held'),
    revised: count('revised'),
    closed: count('closed'),
    skipped: count('skipped'),
    opened: openedPositions.length,
    rejected: screened.filter(c => c.decision === 'Skip').length,
    failed: errors.length,
    cancelled: cancelledTickers.length,
    openPositions: await engine.capacity.openCount(),
    capacity: engine.capacity.capacity,
    cumulativeProfitRate: stats.cumulativeProfitRate,
    winRate: stats.winRate,
  };
  const report: CycleReport = { ...summary, minScore, transitions, screened, openedPositions, errors, cancelledTickers };

  console.log(
    `${tag} Done: held=${report.held} revised=${report.revised} closed=${report.closed} ` +
    `skipped=${report.skipped} opened=${report.opened} rejected=${report.rejected} ` +
    `failed=${report.failed} cancelled=${report.cancelled} (${report.openPositions}/${report.capacity} slots)`,
  );

  await engine.emit({ type: 'cycle_completed', report: summary });
  return report;
}
