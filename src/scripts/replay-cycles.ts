/**
 * Replays a recorded sequence of cycles against the in-memory store and prints
 * the resulting book and statistics. Nothing outside the process is touched.
 * Run with: npx tsx src/scripts/replay-cycles.ts [fixture.json]
 */
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { MemoryPortfolioStore } from '../db/memory-store.js';
import { PortfolioEngine } from '../engine/index.js';
import { cycleIdFor } from '../lib/dates.js';
import { candidateBatchSchema, toCycleCandidate } from '../pipeline/candidate-batch.js';
import { runPortfolioCycle, type CycleReport } from '../pipeline/portfolio-cycle.js';
import type { JudgmentProducer, PriceFeed } from '../types/collaborators.js';
import type { Position, TradingStats } from '../types/portfolio.js';

const replaySchema = z.object({
  maxPortfolioSize: z.number().int().positive().default(10),
  baseMinScore: z.number().min(0).max(10).default(8),
  maxPositionsPerSector: z.number().int().positive().nullable().default(null),
  timeZone: z.string().default('UTC'),
  cycles: z.array(candidateBatchSchema.extend({
    at: z.string().datetime({ offset: true }),
    prices: z.record(z.number()).default({}),
    judgments: z.record(z.unknown()).default({}),
  })),
});


export interface ReplayResult {
  reports: CycleReport[];
  positions: Position[];
  stats: TradingStats;
}

export async function replayCycles(raw: unknown): Promise<ReplayResult> {
  const fixture = replaySchema.parse(raw);

  let now = new Date(0);
  const engine = new PortfolioEngine({
    store: new MemoryPortfolioStore(),
    maxPortfolioSize: fixture.maxPortfolioSize,
    maxPositionsPerSector: fixture.maxPositionsPerSector,
    clock: () => new Date(now),
    timeZone: fixture.timeZone,
  });

  const reports: CycleReport[] = [];
  for (const recorded of fixture.cycles) {
    now = new Date(recorded.at);

    const prices: PriceFeed = {
      getPrices: async tickers => new Map(
        tickers.flatMap(t => {
          const p = recorded.prices[t];
          return p === undefined ? [] : [[t, p] as const];
        }),
      ),
    };
    const judgments: JudgmentProducer = {
      judge: async position => {
        if (!(position.ticker in recorded.judgments)) {
          throw new Error(`no recorded judgment for ${position.ticker}`);
        }
        return recorded.judgments[position.ticker];
      },
    };

    reports.push(await runPortfolioCycle(
      { engine, judgments, prices, baseMinScore: fixture.baseMinScore },
      {
        cycle: cycleIdFor(now, fixture.timeZone),
        marketCondition: recorded.marketCondition,
        candidates: recorded.candidates.map(c => toCycleCandidate(c, fixture.maxPortfolioSize)),
      },
    ));
  }

  return { reports, positions: await engine.ledger.listOpen(), stats: await engine.stats() };
}

async function main(): Promise<void> {
  const path = process.argv[2] ?? 'data/replay-sample.json';
  const result = await replayCycles(JSON.parse(await readFile(path, 'utf-8')));

  console.log(`\nReplayed ${result.reports.length} cycle(s) from ${path}`);
  for (const p of result.positions) {
    console.log(
      `  OPEN ${p.ticker.padEnd(8)} buy=${p.buyPrice} now=${p.currentPrice} ` +
      `target=${p.scenario.targetPrice} stop=${p.scenario.stopLoss} r${p.scenario.revision}`,
    );
  }
  const s = result.stats;
  console.log(
    `  Trades=${s.count} W/L/BE=${s.winCount}/${s.lossCount}/${s.breakEvenCount} ` +
    `winRate=${s.winRate.toFixed(1)}% avg=${s.avgProfitRate.toFixed(2)}% cumulative=${s.cumulativeProfitRate.toFixed(2)}%`,
  );
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch(err => {
    console.error('[Replay] Failed:', err);
    process.exit(1);
  });
}
