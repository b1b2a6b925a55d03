/**
 * Price resolution for marking positions
 *
 * Holds one time-ordered series per asset and answers "latest price at or
 * before t". Read-only once a simulation starts.
 */

import type { PricePoint } from './types.js';

export class PriceResolver {
  private series = new Map<string, PricePoint[]>();

  constructor(initial?: Map<string, PricePoint[]> | Record<string, PricePoint[]>) {
    if (!initial) return;
    const entries = initial instanceof Map ? initial.entries() : Object.entries(initial);
    for (const [asset, points] of entries) {
      this.setSeries(asset, points);
    }
  }

  /**
   * Replace the series for an asset (sorted copy, non-positive prices dropped)
   */
  setSeries(asset: string, points: PricePoint[]): void {
    const sorted = points
      .filter((p) => Number.isFinite(p.price) && p.price > 0)
      .sort((a, b) => a.timestamp - b.timestamp);
    this.series.set(asset.toUpperCase(), sorted);
  }

  /**
   * Latest price at or before `timestamp`, else `fallback`
   */
  resolve(asset: string | null, timestamp: number, fallback: number | null): number | null {
    if (!asset) return fallback;
    const points = this.series.get(asset.toUpperCase());
    if (!points || points.length === 0) return fallback;

    // Binary search for the last point with p.timestamp <= timestamp
    let lo = 0;
    let hi = points.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (points[mid].timestamp <= timestamp) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }

    return found >= 0 ? points[found].price : fallback;
  }

  toRecord(): Record<string, Array<{ timestamp: string; price: number }>> {
    const out: Record<string, Array<{ timestamp: string; price: number }>> = {};
    for (const [asset, points] of this.series) {
      out[asset] = points.map((p) => ({ timestamp: new Date(p.timestamp).toISOString(), price: p.price }));
    }
    return out;
  }
}
