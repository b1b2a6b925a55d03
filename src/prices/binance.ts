import axios, { type AxiosInstance } from 'axios';
import { config } from '../config/index.js';
import type { PricePoint } from '../backtest/types.js';

// [openTime, open, high, low, close, volume, closeTime, ...]
type Kline = [number, string, string, string, string, ...unknown[]];

const KLINE_LIMIT = 1000;
const MINUTE_MS = 60 * 1000;

// Internal symbol -> USDT-quoted market
export function exchangeSymbol(asset: string): string {
  return `${asset.toUpperCase().replace(/[^A-Z0-9]/g, '')}USDT`;
}

/**
 * Public 1m kline client (no auth)
 */
export class BinanceKlineClient {
  private http: AxiosInstance;

  constructor(baseUrl?: string) {
    this.http = axios.create({
      baseURL: baseUrl || config.binanceApiUrl,
      timeout: 15000,
    });
  }

  /**
   * 1m closes in [fromTs, toTs], paginated forward
   */
  async fetchMinuteCloses(asset: string, fromTs: number, toTs: number, maxPages = 200): Promise<PricePoint[]> {
    const points: PricePoint[] = [];
    let cursor = fromTs;

    for (let page = 0; page < maxPages && cursor <= toTs; page++) {
      const response = await this.http.get<Kline[]>('/api/v3/klines', {
        params: {
          symbol: exchangeSymbol(asset),
          interval: '1m',
          startTime: cursor,
          endTime: toTs,
          limit: KLINE_LIMIT,
        },
      });
      const klines = Array.isArray(response.data) ? response.data : [];
      if (klines.length === 0) break;

      for (const kline of klines) {
        const price = Number(kline[4]);
        if (kline[0] > toTs) break;
        if (Number.isFinite(price) && price > 0) points.push({ timestamp: kline[0], price });
      }

      if (klines.length < KLINE_LIMIT) break;
      cursor = klines[klines.length - 1][0] + MINUTE_MS;
    }

    return points;
  }
}

export const binanceClient = new BinanceKlineClient();
