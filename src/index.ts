import OpenAI from 'openai';
import { config, cycleCrons } from './config.js';
import { runMigrations } from './db/migrate.js';
import { getPool, closePool } from './db/client.js';
import { PgPortfolioStore } from './db/pg-store.js';
import { PortfolioEngine } from './engine/index.js';
import { JudgmentAgent } from './agents/judgment-agent.js';
import { AlpacaPriceFeed } from './lib/alpaca-price-feed.js';
import { TelegramNotifier } from './telegram/notifier.js';
import { loadCandidateBatch } from './pipeline/candidate-batch.js';
import { CycleScheduler } from './scheduler.js';
import { createApp, startDashboard } from './dashboard/server.js';

async function main(): Promise<void> {
  console.log(`[Boot] portfolio-tracker starting (${config.NODE_ENV})`);

  // ── Database ────────────────────────────────────────────────────────────
  console.log('[Boot] Running database migrations...');
  await runMigrations();
  console.log('[Boot] Database ready');

  // ── Engine ──────────────────────────────────────────────────────────────
  const engine = new PortfolioEngine({
    store: new PgPortfolioStore(getPool()),
    maxPortfolioSize: config.MAX_PORTFOLIO_SIZE,
    maxPositionsPerSector: config.MAX_POSITIONS_PER_SECTOR,
    timeZone: config.CYCLE_TIMEZONE,
    sinks: [new TelegramNotifier({ botToken: config.TELEGRAM_BOT_TOKEN, chatId: config.TELEGRAM_CHAT_ID })],
  });
  await engine.restoreCapacity();
  const open = await engine.capacity.openCount();
  console.log(`[Boot] Engine ready (${open}/${engine.capacity.capacity} slots used)`);

  // ── Read API ────────────────────────────────────────────────────────────
  const server = startDashboard(createApp(engine, { totalCapital: config.TOTAL_CAPITAL }), config.PORT);

  // ── Cycle scheduler ─────────────────────────────────────────────────────
  const scheduler = new CycleScheduler({
    deps: {
      engine,
      judgments: new JudgmentAgent({
        client: new OpenAI({ apiKey: config.OPENAI_API_KEY }),
        model: config.OPENAI_MODEL,
      }),
      prices: new AlpacaPriceFeed({
        apiKey: config.ALPACA_API_KEY,
        secretKey: config.ALPACA_SECRET_KEY,
        dataUrl: config.ALPACA_DATA_URL,
      }),
      baseMinScore: config.BASE_MIN_SCORE,
    },
    loadCandidates: () => loadCandidateBatch(config.CANDIDATES_FILE, config.MAX_PORTFOLIO_SIZE),
    crons: cycleCrons(config),
    timeZone: config.CYCLE_TIMEZONE,
  });
  scheduler.start();

  console.log(`[Boot] All systems up. API: http://localhost:${config.PORT}`);

  // ── Graceful shutdown ───────────────────────────────────────────────────
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[Boot] ${signal} received — shutting down`);
    scheduler.stop();
    server.close();
    await closePool();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(err => {
        console.error('[Boot] Shutdown error:', err);
        process.exit(1);
      });
    });
  }
}

main().catch(err => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
