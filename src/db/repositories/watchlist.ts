import type { PoolClient } from 'pg';
import type { CandidateDecision, SkipReason, WatchlistCandidate } from '../../types/portfolio.js';

interface CandidateRow {
  id: string;
  ticker: string;
  company_name: string;
  sector: string;
  cycle_id: string;
  cycle_date: string;
  analyzed_at: Date;
  current_price: number;
  buy_score: number;
  min_score_threshold: number;
  decision: CandidateDecision;
  rationale: string;
  skip_reason: SkipReason | null;
}

export async function insertCandidate(db: PoolClient, c: WatchlistCandidate): Promise<void> {
  await db.query(
    `INSERT INTO portfolio.watchlist_candidates (
      id, ticker, company_name, sector, cycle_id, cycle_date, analyzed_at, current_price,
      buy_score, min_score_threshold, decision, rationale, skip_reason
    ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13)`,
    [
      c.id, c.ticker, c.companyName, c.sector, c.cycleId, c.cycleDate, c.analyzedAt, c.currentPrice,
      c.buyScore, c.minScoreThreshold, c.decision, c.rationale, c.skipReason,
    ]
  );
}

export async function listCandidates(db: PoolClient, ticker?: string): Promise<WatchlistCandidate[]> {
  const base = `SELECT id, ticker, company_name, sector, cycle_id, cycle_date::text AS cycle_date, analyzed_at, current_price,
                       buy_score, min_score_threshold, decision, rationale, skip_reason
                FROM portfolio.watchlist_candidates`;
  const { rows } = ticker === undefined
    ? await db.query<CandidateRow>(`${base} ORDER BY seq`)
    : await db.query<CandidateRow>(`${base} WHERE ticker = $1 ORDER BY seq`, [ticker]);

  return rows.map(row => ({
    id: row.id,
    ticker: row.ticker,
    companyName: row.company_name,
    sector: row.sector,
    cycleId: row.cycle_id,
    cycleDate: row.cycle_date,
    analyzedAt: row.analyzed_at.toISOString(),
    currentPrice: row.current_price,
    buyScore: row.buy_score,
    minScoreThreshold: row.min_score_threshold,
    decision: row.decision,
    rationale: row.rationale,
    skipReason: row.skip_reason,
  }));
}
