import { Response } from 'node-fetch';
import { describe, expect, it, vi } from 'vitest';

import { FetchLike, RestVenueClient, VenueError } from '../src/services/rest-venue-client';

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), { status, statusText });
}

function createClient(fetchImpl: FetchLike): RestVenueClient {
  return new RestVenueClient({
    baseUrl: 'https://venue.test/api/',
    apiKey: 'test-secret',
    timeoutMs: 5000,
    fetchImpl,
    minRequestIntervalMs: 0
  });
}

describe('RestVenueClient', () => {
  it('reads market info with bearer auth', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ symbol: 'BTC', price: '50000.5', sizeDecimals: 5 }));
    const client = createClient(fetchImpl);

    await expect(client.getMarketInfo('btc')).resolves.toEqual({ symbol: 'BTC', price: 50000.5, sizeDecimals: 5 });

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://venue.test/api/markets/BTC');
    expect(init).toMatchObject({
      method: 'GET',
      timeout: 5000,
      headers: {
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-secret'
      }
    });
  });

  it('treats an unknown market as unavailable', async () => {
    const client = createClient(async () => jsonResponse({ error: 'not found' }, 404, 'Not Found'));

    await expect(client.getMarketInfo('NOPE')).resolves.toBeNull();
    await expect(client.getMarketPrice('NOPE')).resolves.toBeNull();
  });

  it('defaults the size precision', async () => {
    const client = createClient(async () => jsonResponse({ price: 3000 }));

    await expect(client.getMarketInfo('ETH')).resolves.toEqual({ symbol: 'ETH', price: 3000, sizeDecimals: 6 });
  });

  it('reads the account balance', async () => {
    const client = createClient(async () => jsonResponse({ balance: 1234.5 }));

    await expect(client.getAccountBalance()).resolves.toBe(1234.5);
  });

  it('rejects a balance response without a balance', async () => {
    const client = createClient(async () => jsonResponse({ equity: 10 }));

    await expect(client.getAccountBalance()).rejects.toThrow(VenueError);
  });

  it('posts orders and returns the fill', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ orderRef: 'ord-1', filledSize: 0.01, fillPrice: '50010' }));
    const client = createClient(fetchImpl);

    const result = await client.placeOrder({
      symbol: 'BTC',
      side: 'SELL',
      size: 0.01,
      price: 50000,
      orderKind: 'MARKET',
      reduceOnly: true
    });

    expect(result).toEqual({ success: true, orderRef: 'ord-1', filledSize: 0.01, fillPrice: 50010 });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://venue.test/api/orders');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      symbol: 'BTC',
      side: 'SELL',
      size: 0.01,
      price: 50000,
      orderKind: 'MARKET',
      reduceOnly: true
    });
  });

  it('turns HTTP errors into order failures', async () => {
    const client = createClient(async () => new Response('boom', { status: 500, statusText: 'Internal Server Error' }));

    const result = await client.placeOrder({
      symbol: 'BTC',
      side: 'BUY',
      size: 0.01,
      price: 50000,
      orderKind: 'LIMIT',
      reduceOnly: false
    });

    expect(result).toEqual({ success: false, error: 'Venue API error: 500 Internal Server Error - boom' });
  });

  it('turns error envelopes into order failures', async () => {
    const client = createClient(async () => jsonResponse({ error: 'insufficient margin' }));

    const result = await client.placeOrder({
      symbol: 'BTC',
      side: 'BUY',
      size: 0.01,
      price: 50000,
      orderKind: 'LIMIT',
      reduceOnly: false
    });

    expect(result).toEqual({ success: false, error: 'Venue API error: insufficient margin' });
  });

  it('rejects an order response without a reference', async () => {
    const client = createClient(async () => jsonResponse({ status: 'ok' }));

    const result = await client.placeOrder({
      symbol: 'BTC',
      side: 'BUY',
      size: 0.01,
      price: 50000,
      orderKind: 'LIMIT',
      reduceOnly: false
    });

    expect(result).toEqual({ success: false, error: 'Order response has no order reference' });
  });

  it('requires a base URL', () => {
    expect(() => new RestVenueClient({ timeoutMs: 1000 })).toThrow('Venue base URL is required');
  });
});
