/**
 * Price history
 * Stored 1m series, topped up from the public kline endpoint on demand.
 */

import type { PricePoint, PriceSeriesSource } from '../backtest/types.js';
import { binanceClient, type BinanceKlineClient } from './binance.js';
import { PriceHistoryStore } from './store.js';

export class PriceHistoryService implements PriceSeriesSource {
  constructor(
    private store: PriceHistoryStore = new PriceHistoryStore(),
    private fetcher: BinanceKlineClient | null = binanceClient
  ) {}

  /**
   * Fetch series for assets with no stored points in the window.
   * Best-effort: failures are logged and skipped.
   */
  async ensureSeries(assets: string[], fromTs: number, toTs: number): Promise<number> {
    if (!this.fetcher) return 0;

    let written = 0;
    const failed: string[] = [];
    for (const asset of assets) {
      if (this.store.count(asset, fromTs, toTs) > 0) continue;
      try {
        const points = await this.fetcher.fetchMinuteCloses(asset, fromTs, toTs);
        written += this.store.upsert(asset, points);
      } catch (error) {
        failed.push(`${asset} (${error instanceof Error ? error.message : String(error)})`);
      }
    }

    if (failed.length > 0) {
      console.warn(`⚠️  Price fetch failed for ${failed.join(', ')}`);
    }
    return written;
  }

  async loadSeries(assets: string[], fromTs: number, toTs: number): Promise<Map<string, PricePoint[]>> {
    return this.store.loadSeries(assets, fromTs, toTs);
  }
}

export { PriceHistoryStore } from './store.js';
export { BinanceKlineClient, exchangeSymbol } from './binance.js';
