import { MemoryPortfolioStore } from '../db/memory-store.js';
import { PortfolioEngine } from '../engine/index.js';
import type { EngineEvent } from '../types/decision.js';
import type { CandidateInput, CycleContext, Position, ScenarioDraft } from '../types/portfolio.js';

export function testClock(start = '2025-03-03T14:00:00Z') {
  let now = new Date(start);
  return {
    clock: (): Date => new Date(now),
    set(iso: string): void {
      now = new Date(iso);
    },
  };
}

export function cycle(cycleId: string): CycleContext {
  return { cycleId, cycleDate: cycleId.slice(0, 10) };
}

export function draft(overrides: Partial<ScenarioDraft> = {}): ScenarioDraft {
  return {
    targetPrice: 12000,
    stopLoss: 9000,
    investmentHorizon: 'mid',
    rationale: 'range breakout',
    supportLevels: [9500],
    resistanceLevels: [11000],
    sellTriggers: ['earnings miss'],
    holdConditions: ['above 20-day average'],
    maxPortfolioSize: 10,
    ...overrides,
  };
}

export function candidateInput(overrides: Partial<CandidateInput> = {}): CandidateInput {
  return {
    ticker: 'AAA',
    companyName: 'Alpha Analytics',
    sector: 'Software',
    buyScore: 9,
    currentPrice: 10000,
    rationale: 'breakout',
    ...overrides,
  };
}

/** A judgment that passes validation and asks for nothing. */
export function judgment(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    confidence: 7,
    technicalTrend: 'uptrend intact',
    volumeAnalysis: 'average',
    marketConditionImpact: 'neutral',
    timeFactor: 'early',
    portfolioAdjustmentNeeded: false,
    adjustmentUrgency: 'Low',
    ...overrides,
  };
}

export function makeEngine(
  options: { maxPortfolioSize?: number; maxPositionsPerSector?: number | null; start?: string; timeZone?: string } = {},
) {
  const time = testClock(options.start);
  const store = new MemoryPortfolioStore();
  const events: EngineEvent[] = [];
  const engine = new PortfolioEngine({
    store,
    maxPortfolioSize: options.maxPortfolioSize ?? 10,
    maxPositionsPerSector: options.maxPositionsPerSector ?? null,
    clock: time.clock,
    timeZone: options.timeZone,
    sinks: [{ publish: async event => { events.push(event); } }],
  });
  return { engine, store, events, time };
}

/** Screen a candidate at threshold 0 and open it under `scenario`. */
export async function openPosition(
  engine: PortfolioEngine,
  input: Partial<CandidateInput> = {},
  scenario: Partial<ScenarioDraft> = {},
  cycleId = '2025-03-03#1400',
): Promise<Position> {
  const candidate = await engine.gate.evaluate(candidateInput(input), 0, cycle(cycleId));
  return engine.ledger.open(candidate, draft(scenario));
}
