import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'http';
import type { PortfolioEngine } from '../engine/index.js';

export interface DashboardOptions {
  totalCapital?: number;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function guarded(handler: Handler): Handler {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (err) {
      console.error(`[Dashboard] ${req.method} ${req.path} failed:`, err);
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  };
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/** Read-only JSON API over the engine's state. */
export function createApp(engine: PortfolioEngine, options: DashboardOptions = {}): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Capacity and valuation of the open book
  app.get('/api/portfolio', guarded(async (_req, res) => {
    res.json(await engine.summary(options.totalCapital));
  }));

  app.get('/api/positions', guarded(async (_req, res) => {
    const positions = await engine.ledger.listOpen();
    res.json({
      positions: positions.map(p => ({
        ...p,
        weightPercent: options.totalCapital ? engine.capacity.weightOf(p, options.totalCapital) : null,
      })),
    });
  }));

  app.get('/api/watchlist', guarded(async (req, res) => {
    const candidates = await engine.ledger.listCandidates(queryString(req.query['ticker']));
    res.json({ candidates });
  }));

  // Decision log, newest first
  app.get('/api/decisions', guarded(async (req, res) => {
    const limit = Math.min(Math.max(parseInt(String(req.query['limit'] ?? '100'), 10) || 100, 1), 1000);
    const decisions = await engine.ledger.listDecisions(queryString(req.query['ticker']));
    res.json({ decisions: decisions.reverse().slice(0, limit), total: decisions.length });
  }));

  app.get('/api/history', guarded(async (_req, res) => {
    const [trades, stats] = await Promise.all([engine.history.listTrades(), engine.stats()]);
    res.json({ trades, stats });
  }));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

export function startDashboard(app: Express, port: number): Server {
  return app.listen(port, () => {
    console.log(`[Dashboard] Listening on http://localhost:${port}`);
  });
}
