import axios, { type AxiosInstance } from 'axios';
import { config } from '../config/index.js';
import { RateLimiter } from '../copier/throttle.js';
import type { AccountState, CopyMarketData, Fill } from '../copier/types.js';
import { normalizeAccountState, normalizeFills } from './normalize.js';
import type {
  HyperliquidClearinghouseState,
  HyperliquidFill,
  HyperliquidMeta,
  HyperliquidSpotMeta,
  InfoRequest,
} from './types.js';

// userFills returns at most this many entries per call
const FILLS_PAGE_SIZE = 2000;

/**
 * Hyperliquid Info API Client
 * Read-only account and market data over POST /info
 */
export class HyperliquidClient implements CopyMarketData {
  private http: AxiosInstance;
  private maxRetries = 3;
  private retryDelayMs = 1000;
  private limiter: RateLimiter;

  constructor(baseUrl?: string, limiter?: RateLimiter) {
    this.http = axios.create({
      baseURL: (baseUrl || config.hyperliquid.apiUrl).replace(/\/info\/?$/, ''),
      timeout: 10000,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
    });
    this.limiter = limiter ?? new RateLimiter(config.hyperliquid.maxRps);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * POST /info with rate limiting and retry (4xx is not retried)
   */
  private async postInfo<T>(body: InfoRequest): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        await this.limiter.acquire();
        const response = await this.http.post<T>('/info', body);
        return response.data;
      } catch (error) {
        lastError = error;

        if (axios.isAxiosError(error)) {
          const status = error.response?.status;
          if (status && status >= 400 && status < 500 && status !== 429) {
            throw error;
          }
        }

        if (attempt < this.maxRetries) {
          const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
          console.warn(`Info request ${body.type} failed (attempt ${attempt}/${this.maxRetries}), retrying in ${delay}ms...`);
          await this.sleep(delay);
        }
      }
    }

    throw lastError;
  }

  async getUserFills(address: string, startTime?: number): Promise<HyperliquidFill[]> {
    const data = await this.postInfo<HyperliquidFill[] | null>(
      startTime !== undefined
        ? { type: 'userFills', user: address, startTime }
        : { type: 'userFills', user: address }
    );
    return Array.isArray(data) ? data : [];
  }

  /**
   * Walk fills backwards in time, one full page at a time
   */
  async getUserFillsPaginated(address: string, startTime?: number, maxPages = 10): Promise<HyperliquidFill[]> {
    const all: HyperliquidFill[] = [];
    let cursor = startTime;

    for (let page = 0; page < maxPages; page++) {
      const batch = await this.getUserFills(address, cursor);
      if (batch.length === 0) break;
      all.push(...batch);

      const times = batch.map((f) => Number(f.time)).filter((t) => Number.isFinite(t));
      if (times.length === 0 || batch.length < FILLS_PAGE_SIZE) break;
      cursor = times.reduce((min, t) => Math.min(min, t), Infinity) - 1;
    }

    return all;
  }

  async getClearinghouseState(address: string): Promise<HyperliquidClearinghouseState> {
    return this.postInfo<HyperliquidClearinghouseState>({ type: 'clearinghouseState', user: address });
  }

  async getMeta(): Promise<HyperliquidMeta> {
    return this.postInfo<HyperliquidMeta>({ type: 'meta' });
  }

  async getSpotMeta(): Promise<HyperliquidSpotMeta> {
    return this.postInfo<HyperliquidSpotMeta>({ type: 'spotMeta' });
  }

  async fetchFills(address: string, since: number | null): Promise<Fill[]> {
    return normalizeFills(await this.getUserFills(address, since ?? undefined));
  }

  async fetchAccountState(address: string): Promise<AccountState> {
    return normalizeAccountState(await this.getClearinghouseState(address));
  }
}

// Singleton instance
export const hyperliquidClient = new HyperliquidClient();
