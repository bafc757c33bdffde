import type { PoolClient } from 'pg';
import type { AdjustmentUrgency, CloseSignal, DailyDecision, TransitionKind } from '../../types/decision.js';
import type { AppendResult } from '../store.js';

interface DecisionRow {
  id: string;
  ticker: string;
  cycle_id: string;
  cycle_date: string;
  decided_at: Date;
  current_price: number;
  confidence: number;
  technical_trend: string;
  volume_analysis: string;
  market_condition_impact: string;
  time_factor: string;
  portfolio_adjustment_needed: boolean;
  adjustment_urgency: AdjustmentUrgency;
  new_target_price: number | null;
  new_stop_loss: number | null;
  sell_reason: string;
  close_signal: CloseSignal;
  transition: TransitionKind;
  notes: Record<string, unknown>;
}

/** Insert unless (ticker, cycle_id) already has a decision. */
export async function appendDecision(db: PoolClient, d: DailyDecision): Promise<AppendResult> {
  const result = await db.query(
    `INSERT INTO portfolio.daily_decisions (
      id, ticker, cycle_id, cycle_date, decided_at, current_price, confidence,
      technical_trend, volume_analysis, market_condition_impact, time_factor,
      portfolio_adjustment_needed, adjustment_urgency, new_target_price, new_stop_loss,
      sell_reason, close_signal, transition, notes
    ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19)
    ON CONFLICT (ticker, cycle_id) DO NOTHING
    RETURNING id`,
    [
      d.id, d.ticker, d.cycleId, d.cycleDate, d.decidedAt, d.currentPrice, d.confidence,
      d.technicalTrend, d.volumeAnalysis, d.marketConditionImpact, d.timeFactor,
      d.portfolioAdjustmentNeeded, d.adjustmentUrgency, d.newTargetPrice, d.newStopLoss,
      d.sellReason, JSON.stringify(d.closeSignal), d.transition, JSON.stringify(d.notes),
    ]
  );
  return (result.rowCount ?? 0) > 0 ? 'ok' : 'duplicate';
}

export async function hasDecision(db: PoolClient, ticker: string, cycleId: string): Promise<boolean> {
  const { rows } = await db.query<{ found: boolean }>(
    `SELECT EXISTS (
       SELECT 1 FROM portfolio.daily_decisions WHERE ticker = $1 AND cycle_id = $2
     ) AS found`,
    [ticker, cycleId]
  );
  return rows[0]?.found ?? false;
}

export async function listDecisions(db: PoolClient, ticker?: string): Promise<DailyDecision[]> {
  const base = `SELECT id, ticker, cycle_id, cycle_date::text AS cycle_date, decided_at, current_price,
                       confidence, technical_trend, volume_analysis, market_condition_impact, time_factor,
                       portfolio_adjustment_needed, adjustment_urgency, new_target_price, new_stop_loss,
                       sell_reason, close_signal, transition, notes
                FROM portfolio.daily_decisions`;
  const { rows } = ticker === undefined
    ? await db.query<DecisionRow>(`${base} ORDER BY seq`)
    : await db.query<DecisionRow>(`${base} WHERE ticker = $1 ORDER BY seq`, [ticker]);

  return rows.map(row => ({
    id: row.id,
    ticker: row.ticker,
    cycleId: row.cycle_id,
    cycleDate: row.cycle_date,
    decidedAt: row.decided_at.toISOString(),
    currentPrice: row.current_price,
    confidence: row.confidence,
    technicalTrend: row.technical_trend,
    volumeAnalysis: row.volume_analysis,
    marketConditionImpact: row.market_condition_impact,
    timeFactor: row.time_factor,
    portfolioAdjustmentNeeded: row.portfolio_adjustment_needed,
    adjustmentUrgency: row.adjustment_urgency,
    newTargetPrice: row.new_target_price,
    newStopLoss: row.new_stop_loss,
    sellReason: row.sell_reason,
    closeSignal: row.close_signal,
    transition: row.transition,
    notes: row.notes,
  }));
}
