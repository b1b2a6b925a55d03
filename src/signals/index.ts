/**
 * Signal Aggregator
 *
 * Turns entries from several tracked accounts into consensus signals:
 * same asset, same side, at least `minAccounts` distinct accounts within
 * `windowMs` of the first entry. Signals replay through the copier
 * simulator as synthetic trade events.
 */

import { v4 as uuid } from 'uuid';
import { entrySide, isEntryDirection } from '../backtest/ledger.js';
import type { EntryDirection, TradeEvent } from '../backtest/types.js';
import { CONSENSUS_ACCOUNT_ID, type AggregationConfig, type Signal, type SignalDirection } from './types.js';

interface Entry {
  event: TradeEvent;
  asset: string;
  side: SignalDirection;
}

function toEntry(event: TradeEvent): Entry | null {
  if (!isEntryDirection(event.direction)) return null;
  return { event, asset: event.asset.toUpperCase(), side: entrySide(event.direction) };
}

/**
 * Aggregate entry trades into consensus signals, ordered by time
 */
export function aggregateSignals(events: TradeEvent[], cfg: AggregationConfig): Signal[] {
  const entries = events
    .map(toEntry)
    .filter((e): e is Entry => e !== null)
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => a.entry.event.timestamp - b.entry.event.timestamp || a.index - b.index)
    .map(({ entry }) => entry);

  const consumed = new Set<number>();
  const lastFired = new Map<string, number>();
  const signals: Signal[] = [];

  for (let i = 0; i < entries.length; i++) {
    if (consumed.has(i)) continue;

    const first = entries[i];
    const key = `${first.asset}:${first.side}`;
    const t0 = first.event.timestamp;

    const fired = lastFired.get(key);
    if (fired !== undefined && t0 - fired < cfg.windowMs) continue;

    // First entry per account only
    const contributors = new Map<string, number>([[first.event.accountId, i]]);
    for (let j = i + 1; j < entries.length; j++) {
      const candidate = entries[j];
      if (candidate.event.timestamp > t0 + cfg.windowMs) break;
      if (consumed.has(j)) continue;
      if (candidate.asset !== first.asset || candidate.side !== first.side) continue;
      if (contributors.has(candidate.event.accountId)) continue;
      contributors.set(candidate.event.accountId, j);
    }

    if (contributors.size < cfg.minAccounts) continue;

    let total = 0;
    for (const idx of contributors.values()) {
      consumed.add(idx);
      total += Math.abs(entries[idx].event.valueUsd ?? 0);
    }

    signals.push({
      timestamp: t0,
      asset: first.asset,
      direction: first.side,
      notionalUsd: total / contributors.size,
      accountIds: [...contributors.keys()],
    });
    lastFired.set(key, t0);
  }

  return signals;
}

/**
 * Synthetic entry events for the simulator (no base quantity, priced from series)
 */
export function signalsToTradeEvents(signals: Signal[]): TradeEvent[] {
  return signals.map((signal) => {
    const direction: EntryDirection = signal.direction;
    return {
      id: uuid(),
      timestamp: signal.timestamp,
      accountId: CONSENSUS_ACCOUNT_ID,
      asset: signal.asset,
      direction,
      baseQuantity: null,
      valueUsd: signal.notionalUsd,
      realizedPnlUsd: null,
    };
  });
}

export type { AggregationConfig, Signal, SignalDirection } from './types.js';
export { CONSENSUS_ACCOUNT_ID } from './types.js';
