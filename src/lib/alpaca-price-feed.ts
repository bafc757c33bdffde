/**
 * Latest-trade prices from the Alpaca market data API.
 */

import { z } from 'zod';
import type { PriceFeed } from '../types/collaborators.js';

const latestTradesSchema = z.object({
  trades: z.record(z.object({ p: z.number() }).passthrough()).default({}),
});

export interface AlpacaCredentials {
  apiKey: string;
  secretKey: string;
  dataUrl: string;
}

// The endpoint accepts a comma-separated symbol list; keep requests well under URL limits.
const BATCH_SIZE = 100;

export class AlpacaPriceFeed implements PriceFeed {
  constructor(private readonly credentials: AlpacaCredentials) {}

  private authHeaders(): Record<string, string> {
    return {
      'APCA-API-KEY-ID': this.credentials.apiKey,
      'APCA-API-SECRET-KEY': this.credentials.secretKey,
    };
  }

  async getPrices(tickers: string[]): Promise<Map<string, number>> {
    const prices = new Map<string, number>();
    const unique = [...new Set(tickers)];

    for (let i = 0; i < unique.length; i += BATCH_SIZE) {
      const batch = unique.slice(i, i + BATCH_SIZE);
      const url = `${this.credentials.dataUrl}/v2/stocks/trades/latest?symbols=${encodeURIComponent(batch.join(','))}`;
      const res = await fetch(url, { headers: this.authHeaders() });

      if (!res.ok) {
        const text = await res.text();
        throw new Error(`Alpaca latest trades error ${res.status}: ${text}`);
      }

      const parsed = latestTradesSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(`Alpaca latest trades: unexpected response (${parsed.error.errors[0]?.message ?? 'invalid'})`);
      }

      for (const [symbol, trade] of Object.entries(parsed.data.trades)) {
        if (Number.isFinite(trade.p) && trade.p > 0) prices.set(symbol, trade.p);
      }
    }

    const missing = unique.filter(t => !prices.has(t));
    if (missing.length > 0) {
      console.warn(`[Alpaca] No latest trade for: ${missing.join(', ')}`);
    }
    return prices;
  }
}
