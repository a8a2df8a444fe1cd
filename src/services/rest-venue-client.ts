/**
 * JSON-over-HTTP venue client for an order gateway
 *
 * The gateway owns credentials, signing and chain selection; this client only
 * speaks three endpoints:
 *   GET  /markets/:symbol   -> { symbol, price, sizeDecimals }
 *   GET  /account/balance   -> { balance }
 *   POST /orders            -> { orderRef, filledSize?, fillPrice? }
 */

import fetch, { RequestInit, Response } from 'node-fetch';
import { MarketInfo, VenueClient, VenueConfig, VenueOrder, VenueOrderResult } from '../types';
import { errorMessage, getLogger, logVenueError } from '../utils/logger';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type RestVenueClientOptions = Pick<VenueConfig, 'baseUrl' | 'apiKey' | 'timeoutMs'> & {
  fetchImpl?: FetchLike;
  minRequestIntervalMs?: number;
};

export class VenueError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'VenueError';
    this.status = status;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumeric(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : undefined;
}

export class RestVenueClient implements VenueClient {
  readonly name = 'rest';
  private baseUrl: string;
  private apiKey?: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;
  private requestQueue: Array<() => Promise<void>> = [];
  private isProcessingQueue = false;
  private lastRequestTime = 0;
  private readonly MIN_REQUEST_INTERVAL: number;

  constructor(options: RestVenueClientOptions) {
    if (!options.baseUrl) {
      throw new VenueError('Venue base URL is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.MIN_REQUEST_INTERVAL = options.minRequestIntervalMs ?? 100; // 10 req/sec
  }

  async getMarketInfo(symbol: string): Promise<MarketInfo | null> {
    const data = await this.makeRequest(`/markets/${encodeURIComponent(symbol.toUpperCase())}`, 'GET');
    if (data === null) {
      return null;
    }

    if (!isRecord(data)) {
      throw new VenueError(`Malformed market response for ${symbol}`);
    }

    const price = readNumeric(data, 'price');
    const sizeDecimals = readNumeric(data, 'sizeDecimals');
    if (price === undefined || price <= 0) {
      return null;
    }

    return {
      symbol: typeof data.symbol === 'string' ? data.symbol : symbol.toUpperCase(),
      price,
      sizeDecimals: sizeDecimals !== undefined && Number.isInteger(sizeDecimals) && sizeDecimals >= 0
        ? sizeDecimals
        : 6
    };
  }

  async getMarketPrice(symbol: string): Promise<number | null> {
    const info = await this.getMarketInfo(symbol);
    return info ? info.price : null;
  }

  async getAccountBalance(): Promise<number> {
    const data = await this.makeRequest('/account/balance', 'GET');
    const balance = isRecord(data) ? readNumeric(data, 'balance') : undefined;
    if (balance === undefined) {
      throw new VenueError('Balance missing from account response');
    }
    return balance;
  }

  async placeOrder(order: VenueOrder): Promise<VenueOrderResult> {
    try {
      const data = await this.makeRequest('/orders', 'POST', {
        symbol: order.symbol,
        side: order.side,
        size: order.size,
        price: order.price,
        orderKind: order.orderKind,
        reduceOnly: order.reduceOnly
      });

      const orderRef = isRecord(data) ? data.orderRef : undefined;
      if (!isRecord(data) || typeof orderRef !== 'string' || orderRef.length === 0) {
        return { success: false, error: 'Order response has no order reference' };
      }

      return {
        success: true,
        orderRef,
        filledSize: readNumeric(data, 'filledSize'),
        fillPrice: readNumeric(data, 'fillPrice')
      };
    } catch (error) {
      logVenueError(this.name, error, { action: 'place_order', symbol: order.symbol, side: order.side });
      return { success: false, error: errorMessage(error) };
    }
  }

  /**
   * Rate limiting wrapper for API requests
   */
  private withRateLimit<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise((resolve, reject) => {
      this.requestQueue.push(async () => {
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        }
      });

      void this.processRequestQueue();
    });
  }

  /**
   * Process the request queue with rate limiting
   */
  private async processRequestQueue(): Promise<void> {
    if (this.isProcessingQueue || this.requestQueue.length === 0) {
      return;
    }

    this.isProcessingQueue = true;

    while (this.requestQueue.length > 0) {
      const timeSinceLastRequest = Date.now() - this.lastRequestTime;

      if (timeSinceLastRequest < this.MIN_REQUEST_INTERVAL) {
        await new Promise(resolve =>
          setTimeout(resolve, this.MIN_REQUEST_INTERVAL - timeSinceLastRequest)
        );
      }

      const request = this.requestQueue.shift();
      if (request) {
        this.lastRequestTime = Date.now();
        await request();
      }
    }

    this.isProcessingQueue = false;
  }

  private makeRequest(
    endpoint: string,
    method: 'GET' | 'POST',
    body?: Record<string, unknown>
  ): Promise<unknown> {
    return this.withRateLimit(() => this.makeRawRequest(endpoint, method, body));
  }

  private async makeRawRequest(
    endpoint: string,
    method: 'GET' | 'POST',
    body?: Record<string, unknown>
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json'
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const requestOptions: RequestInit = {
      method,
      headers,
      timeout: this.timeoutMs
    };
    if (body) {
      requestOptions.body = JSON.stringify(body);
    }

    getLogger().debug('Venue request', { method, endpoint });
    const response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, requestOptions);
    return this.handleResponse(response, endpoint);
  }

  /**
   * Handle API response; a 404 on a lookup means "unknown", not an error
   */
  private async handleResponse(response: Response, endpoint: string): Promise<unknown> {
    const responseText = await response.text();

    if (response.status === 404 && endpoint.startsWith('/markets/')) {
      return null;
    }

    if (!response.ok) {
      throw new VenueError(
        `Venue API error: ${response.status} ${response.statusText} - ${responseText}`,
        response.status
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(responseText);
    } catch {
      throw new VenueError(`Failed to parse venue response: ${responseText}`);
    }

    if (isRecord(data) && typeof data.error === 'string') {
      throw new VenueError(`Venue API error: ${data.error}`, response.status);
    }

    return data;
  }
}
