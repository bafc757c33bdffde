import type { PoolClient } from 'pg';
import type { PositionRecord, Scenario } from '../../types/portfolio.js';

interface PositionRow {
  ticker: string;
  company_name: string;
  sector: string;
  quantity: number;
  buy_price: number;
  buy_date: string;
  current_price: number;
  price_updated_at: Date;
  opened_cycle_id: string | null;
  scenario: Scenario;
}

const SELECT_POSITION = `
  SELECT ticker, company_name, sector, quantity, buy_price, buy_date::text AS buy_date,
         current_price, price_updated_at, opened_cycle_id, scenario
  FROM portfolio.positions`;

function toPosition(row: PositionRow): PositionRecord {
  return {
    ticker: row.ticker,
    companyName: row.company_name,
    sector: row.sector,
    quantity: row.quantity,
    buyPrice: row.buy_price,
    buyDate: row.buy_date,
    currentPrice: row.current_price,
    priceUpdatedAt: row.price_updated_at.toISOString(),
    openedCycleId: row.opened_cycle_id,
    scenario: row.scenario,
  };
}

/** `forUpdate` row-locks the position until the surrounding transaction ends. */
export async function getPosition(
  db: PoolClient,
  ticker: string,
  options: { forUpdate?: boolean } = {},
): Promise<PositionRecord | null> {
  const lock = options.forUpdate ? ' FOR UPDATE' : '';
  const { rows } = await db.query<PositionRow>(`${SELECT_POSITION} WHERE ticker = $1${lock}`, [ticker]);
  const row = rows[0];
  return row ? toPosition(row) : null;
}

export async function listPositions(db: PoolClient): Promise<PositionRecord[]> {
  const { rows } = await db.query<PositionRow>(`${SELECT_POSITION} ORDER BY buy_date, ticker`);
  return rows.map(toPosition);
}

export async function countPositions(db: PoolClient, sector?: string): Promise<number> {
  const { rows } = sector === undefined
    ? await db.query<{ n: number }>(`SELECT COUNT(*)::int AS n FROM portfolio.positions`)
    : await db.query<{ n: number }>(`SELECT COUNT(*)::int AS n FROM portfolio.positions WHERE sector = $1`, [sector]);
  return rows[0]?.n ?? 0;
}

export async function insertPosition(db: PoolClient, position: PositionRecord): Promise<void> {
  await db.query(
    `INSERT INTO portfolio.positions (
      ticker, company_name, sector, quantity, buy_price, buy_date,
      current_price, price_updated_at, opened_cycle_id, scenario
    ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)`,
    [
      position.ticker,
      position.companyName,
      position.sector,
      position.quantity,
      position.buyPrice,
      position.buyDate,
      position.currentPrice,
      position.priceUpdatedAt,
      position.openedCycleId,
      JSON.stringify(position.scenario),
    ]
  );
}

export async function replaceScenario(db: PoolClient, ticker: string, scenario: Scenario): Promise<boolean> {
  const result = await db.query(
    `UPDATE portfolio.positions SET scenario = $2 WHERE ticker = $1`,
    [ticker, JSON.stringify(scenario)]
  );
  return (result.rowCount ?? 0) > 0;
}

export async function updatePrice(db: PoolClient, ticker: string, price: number, at: string): Promise<boolean> {
  const result = await db.query(
    `UPDATE portfolio.positions SET current_price = $2, price_updated_at = $3 WHERE ticker = $1`,
    [ticker, price, at]
  );
  return (result.rowCount ?? 0) > 0;
}

export async function deletePosition(db: PoolClient, ticker: string): Promise<boolean> {
  const result = await db.query(`DELETE FROM portfolio.positions WHERE ticker = $1`, [ticker]);
  return (result.rowCount ?? 0) > 0;
}
