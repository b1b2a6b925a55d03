import { db, type DatabaseClient } from '../db/client.js';
import type { PricePoint, PriceSeriesSource } from '../backtest/types.js';

interface PriceRow {
  asset: string;
  timestamp: number;
  price: number;
}

/**
 * price_history table access
 */
export class PriceHistoryStore implements PriceSeriesSource {
  constructor(private database: DatabaseClient = db) {}

  /**
   * Insert or replace points; returns rows written
   */
  upsert(asset: string, points: PricePoint[]): number {
    const symbol = asset.toUpperCase();
    const stmt = this.database
      .get()
      .prepare('INSERT OR REPLACE INTO price_history (asset, timestamp, price) VALUES (?, ?, ?)');

    return this.database.transaction(() => {
      let written = 0;
      for (const point of points) {
        if (!Number.isFinite(point.price) || point.price <= 0) continue;
        stmt.run(symbol, point.timestamp, point.price);
        written++;
      }
      return written;
    });
  }

  /**
   * Number of stored points in [fromTs, toTs]
   */
  count(asset: string, fromTs: number, toTs: number): number {
    const row = this.database.first<{ n: number }>(
      'SELECT COUNT(*) AS n FROM price_history WHERE asset = ? AND timestamp BETWEEN ? AND ?',
      [asset.toUpperCase(), fromTs, toTs]
    );
    return row?.n ?? 0;
  }

  async loadSeries(assets: string[], fromTs: number, toTs: number): Promise<Map<string, PricePoint[]>> {
    const series = new Map<string, PricePoint[]>();
    for (const asset of assets) {
      const rows = this.database.all<PriceRow>(
        `SELECT asset, timestamp, price FROM price_history
         WHERE asset = ? AND timestamp BETWEEN ? AND ?
         ORDER BY timestamp`,
        [asset.toUpperCase(), fromTs, toTs]
      );
      if (rows.length > 0) {
        series.set(asset.toUpperCase(), rows.map((r) => ({ timestamp: r.timestamp, price: r.price })));
      }
    }
    return series;
  }
}
