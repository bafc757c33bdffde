import { afterEach, describe, expect, it, vi } from 'vitest';
import { AlpacaPriceFeed } from './alpaca-price-feed.js';

const credentials = { apiKey: 'test-key', secretKey: 'test-secret', dataUrl: 'https://data.example.test' };

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('AlpacaPriceFeed', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('maps latest trades to prices and leaves unquoted tickers out', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fetchMock = stubFetch(200, {
      trades: { AAA: { t: '2025-03-04T14:00:00Z', p: 101.5 }, BBB: { p: 0 } },
    });

    const prices = await new AlpacaPriceFeed(credentials).getPrices(['AAA', 'BBB', 'CCC', 'AAA']);

    expect([...prices]).toEqual([['AAA', 101.5]]);
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe('https://data.example.test/v2/stocks/trades/latest?symbols=AAA%2CBBB%2CCCC');
    expect(call?.[1]?.headers).toEqual({ 'APCA-API-KEY-ID': 'test-key', 'APCA-API-SECRET-KEY': 'test-secret' });
  });

  it('throws on an error status', async () => {
    stubFetch(403, 'forbidden');
    await expect(new AlpacaPriceFeed(credentials).getPrices(['AAA'])).rejects.toThrow(
      'Alpaca latest trades error 403: forbidden',
    );
  });

  it('throws on an unexpected body', async () => {
    stubFetch(200, { trades: { AAA: { p: 'cheap' } } });
    await expect(new AlpacaPriceFeed(credentials).getPrices(['AAA'])).rejects.toThrow(
      'Alpaca latest trades: unexpected response',
    );
  });
});
