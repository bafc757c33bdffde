import type { PoolClient } from 'pg';
import type { ClosedTrade, CloseKind, Scenario, TradeOutcome } from '../../types/portfolio.js';
import type { AppendResult } from '../store.js';

interface TradeRow {
  id: string;
  ticker: string;
  company_name: string;
  sector: string;
  quantity: number;
  buy_price: number;
  sell_price: number;
  buy_date: string;
  sell_date: string;
  holding_days: number;
  profit_rate_percent: number;
  outcome: TradeOutcome;
  sell_reason: string;
  close_kind: CloseKind;
  closed_cycle_id: string | null;
  final_scenario: Scenario;
}

export async function appendClosedTrade(db: PoolClient, t: ClosedTrade): Promise<AppendResult> {
  const result = await db.query(
    `INSERT INTO portfolio.closed_trades (
      id, ticker, company_name, sector, quantity, buy_price, sell_price, buy_date, sell_date,
      holding_days, profit_rate_percent, outcome, sell_reason, close_kind, closed_cycle_id, final_scenario
    ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16)
    ON CONFLICT (id) DO NOTHING
    RETURNING id`,
    [
      t.id, t.ticker, t.companyName, t.sector, t.quantity, t.buyPrice, t.sellPrice, t.buyDate, t.sellDate,
      t.holdingDays, t.profitRatePercent, t.outcome, t.sellReason, t.closeKind, t.closedCycleId,
      JSON.stringify(t.finalScenario),
    ]
  );
  return (result.rowCount ?? 0) > 0 ? 'ok' : 'duplicate';
}

export async function listClosedTrades(db: PoolClient): Promise<ClosedTrade[]> {
  const { rows } = await db.query<TradeRow>(
    `SELECT id, ticker, company_name, sector, quantity, buy_price, sell_price,
            buy_date::text AS buy_date, sell_date::text AS sell_date, holding_days,
            profit_rate_percent, outcome, sell_reason, close_kind, closed_cycle_id, final_scenario
     FROM portfolio.closed_trades
     ORDER BY seq`
  );
  return rows.map(row => ({
    id: row.id,
    ticker: row.ticker,
    companyName: row.company_name,
    sector: row.sector,
    quantity: row.quantity,
    buyPrice: row.buy_price,
    sellPrice: row.sell_price,
    buyDate: row.buy_date,
    sellDate: row.sell_date,
    holdingDays: row.holding_days,
    profitRatePercent: row.profit_rate_percent,
    outcome: row.outcome,
    sellReason: row.sell_reason,
    closeKind: row.close_kind,
    closedCycleId: row.closed_cycle_id,
    finalScenario: row.final_scenario,
  }));
}
