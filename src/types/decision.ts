import type { ClosedTrade, CloseKind, Position, WatchlistCandidate } from './portfolio.js';

export type AdjustmentUrgency = 'Low' | 'Medium' | 'High';
export type TransitionKind = 'hold' | 'revise' | 'close';

export interface CloseSignal {
  stopLossHit: boolean;
  targetHit: boolean;
  /** Name of the scenario sell trigger that fired, if any. */
  trigger: string | null;
}

/** A judgment after validation. Unknown fields survive in `notes`. */
export interface Judgment {
  confidence: number;
  technicalTrend: string;
  volumeAnalysis: string;
  marketConditionImpact: string;
  timeFactor: string;
  portfolioAdjustmentNeeded: boolean;
  adjustmentUrgency: AdjustmentUrgency;
  newTargetPrice: number | null;
  newStopLoss: number | null;
  sellReason: string;
  closeSignal: CloseSignal;
  notes: Record<string, unknown>;
}

export interface DailyDecision extends Judgment {
  id: string;
  ticker: string;
  cycleId: string;
  cycleDate: string;
  decidedAt: string;
  currentPrice: number;
  transition: TransitionKind;
}

export type TransitionPlan =
  | { kind: 'hold'; note?: string }
  | { kind: 'revise'; targetPrice: number; stopLoss: number }
  | { kind: 'close'; price: number; closeKind: Exclude<CloseKind, 'manual'>; reason: string };

export type TransitionResult =
  | { ticker: string; outcome: 'held'; decision: DailyDecision; position: Position }
  | { ticker: string; outcome: 'revised'; decision: DailyDecision; position: Position }
  | { ticker: string; outcome: 'closed'; decision: DailyDecision; trade: ClosedTrade }
  | { ticker: string; outcome: 'skipped'; reason: 'missing_price' };

export type EngineEvent =
  | { type: 'candidate_screened'; candidate: WatchlistCandidate }
  | { type: 'position_opened'; position: Position }
  | { type: 'position_revised'; position: Position; previousTarget: number; previousStop: number }
  | { type: 'position_closed'; trade: ClosedTrade }
  | { type: 'decision_recorded'; decision: DailyDecision }
  | { type: 'cycle_completed'; report: CycleReportSummary };

/** Condensed cycle outcome carried by `cycle_completed` events. */
export interface CycleReportSummary {
  cycleId: string;
  held: number;
  revised: number;
  closed: number;
  skipped: number;
  opened: number;
  rejected: number;
  failed: number;
  cancelled: number;
  openPositions: number;
  capacity: number;
  cumulativeProfitRate: number;
  winRate: number;
}
