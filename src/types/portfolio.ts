export type CandidateDecision = 'Enter' | 'Skip';
export type SkipReason = 'score' | 'capacity' | 'sector';
export type InvestmentHorizon = 'short' | 'mid' | 'long';
export type MarketCondition = 'bull' | 'neutral' | 'bear';
export type TradeOutcome = 'Win' | 'Loss' | 'BreakEven';
export type CloseKind = 'stop_loss' | 'target' | 'trigger' | 'manual';

/** One scheduled evaluation pass. `cycleDate` is the calendar date the pass belongs to. */
export interface CycleContext {
  cycleId: string;
  cycleDate: string;
}

/** Raw screening input as it arrives from the analysis layer. */
export interface CandidateInput {
  ticker: string;
  companyName?: string;
  sector?: string;
  buyScore: number;
  currentPrice: number;
  rationale?: string;
  analyzedAt?: string;
}

export interface WatchlistCandidate {
  id: string;
  ticker: string;
  companyName: string;
  sector: string;
  cycleId: string;
  cycleDate: string;
  analyzedAt: string;
  currentPrice: number;
  buyScore: number;
  minScoreThreshold: number;
  decision: CandidateDecision;
  rationale: string;
  skipReason: SkipReason | null;
}

/**
 * The single canonical plan for a position. Revisions produce a new object with
 * `revision + 1`; nothing patches an existing scenario in place.
 */
export interface Scenario {
  kind: 'scenario';
  revision: number;
  targetPrice: number;
  stopLoss: number;
  investmentHorizon: InvestmentHorizon;
  rationale: string;
  supportLevels: number[];
  resistanceLevels: number[];
  sellTriggers: string[];
  holdConditions: string[];
  maxPortfolioSize: number;
}

/** Scenario as supplied by a caller; the ledger assigns `kind` and `revision`. */
export type ScenarioDraft = Omit<Scenario, 'kind' | 'revision'>;

/** Stored shape of an open position. `holdingDays` is derived on read, never stored. */
export interface PositionRecord {
  ticker: string;
  companyName: string;
  sector: string;
  quantity: number;
  buyPrice: number;
  buyDate: string;
  currentPrice: number;
  priceUpdatedAt: string;
  openedCycleId: string | null;
  scenario: Scenario;
}

export interface Position extends PositionRecord {
  holdingDays: number;
}

export interface ClosedTrade {
  id: string;
  ticker: string;
  companyName: string;
  sector: string;
  quantity: number;
  buyPrice: number;
  sellPrice: number;
  buyDate: string;
  sellDate: string;
  holdingDays: number;
  profitRatePercent: number;
  outcome: TradeOutcome;
  sellReason: string;
  closeKind: CloseKind;
  closedCycleId: string | null;
  finalScenario: Scenario;
}

export interface PositionValuation {
  ticker: string;
  evaluationAmount: number;
  unrealizedProfit: number;
  profitRatePercent: number;
  weightPercent: number;
}

export interface PortfolioSummary {
  totalPositions: number;
  capacity: number;
  freeSlots: number;
  totalPurchaseAmount: number;
  totalEvaluationAmount: number;
  totalUnrealizedProfit: number;
  unrealizedProfitRate: number;
  positions: PositionValuation[];
}

export interface TradingStats {
  count: number;
  winCount: number;
  lossCount: number;
  breakEvenCount: number;
  winRate: number;
  avgProfitRate: number;
  avgHoldingDays: number;
  cumulativeProfitRate: number;
  bestProfitRate: number | null;
  worstProfitRate: number | null;
}
