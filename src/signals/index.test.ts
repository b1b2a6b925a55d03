import { describe, expect, it } from 'vitest';
import type { TradeDirection, TradeEvent } from '../backtest/types.js';
import { aggregateSignals, CONSENSUS_ACCOUNT_ID, signalsToTradeEvents } from './index.js';

const T0 = 1_700_000_000_000;
const MINUTE = 60_000;
const cfg = { windowMs: 5 * MINUTE, minAccounts: 3 };

let seq = 0;
function entry(accountId: string, offsetMin: number, valueUsd: number, direction: TradeDirection = 'long', asset = 'BTC'): TradeEvent {
  seq++;
  return {
    id: `e${seq}`,
    timestamp: T0 + offsetMin * MINUTE,
    accountId,
    asset,
    direction,
    baseQuantity: null,
    valueUsd,
    realizedPnlUsd: null,
  };
}

describe('aggregateSignals', () => {
  it('emits one signal when enough accounts agree inside the window', () => {
    const signals = aggregateSignals([entry('a', 0, 100), entry('b', 1, 200), entry('c', 2, 300)], cfg);

    expect(signals).toEqual([
      { timestamp: T0, asset: 'BTC', direction: 'long', notionalUsd: 200, accountIds: ['a', 'b', 'c'] },
    ]);
  });

  it('emits nothing below the agreement threshold', () => {
    expect(aggregateSignals([entry('a', 0, 100), entry('b', 1, 200)], cfg)).toEqual([]);
  });

  it('counts each account once', () => {
    const events = [entry('a', 0, 100), entry('a', 1, 100), entry('b', 2, 100)];
    expect(aggregateSignals(events, cfg)).toEqual([]);
  });

  it('treats buy and long as the same side', () => {
    const signals = aggregateSignals([entry('a', 0, 100, 'buy'), entry('b', 1, 300, 'long')], {
      ...cfg,
      minAccounts: 2,
    });
    expect(signals).toHaveLength(1);
    expect(signals[0].direction).toBe('long');
    expect(signals[0].notionalUsd).toBe(200);
  });

  it('does not mix sides or assets', () => {
    const events = [entry('a', 0, 100, 'long'), entry('b', 1, 100, 'short'), entry('c', 2, 100, 'long', 'ETH')];
    expect(aggregateSignals(events, { ...cfg, minAccounts: 2 })).toEqual([]);
  });

  it('ignores entries outside the window and closing trades', () => {
    const events = [entry('a', 0, 100), entry('b', 10, 100), entry('c', 1, 100, 'close_long')];
    expect(aggregateSignals(events, { ...cfg, minAccounts: 2 })).toEqual([]);
  });

  it('suppresses re-firing on the same pair until the window elapses', () => {
    const events = [
      entry('a', 0, 100),
      entry('b', 0, 100),
      // Second agreement 2m later would fire without suppression
      entry('a', 2, 100),
      entry('b', 2, 100),
      entry('e', 6, 100),
      entry('f', 6, 100),
    ];
    const signals = aggregateSignals(events, { ...cfg, minAccounts: 2 });

    expect(signals.map((s) => s.accountIds)).toEqual([
      ['a', 'b'],
      ['e', 'f'],
    ]);
    expect(signals[1].timestamp).toBe(T0 + 6 * MINUTE);
  });
});

describe('signalsToTradeEvents', () => {
  it('builds synthetic consensus entries without base quantity', () => {
    const [event] = signalsToTradeEvents([
      { timestamp: T0, asset: 'ETH', direction: 'short', notionalUsd: 750, accountIds: ['a', 'b'] },
    ]);

    expect(event.accountId).toBe(CONSENSUS_ACCOUNT_ID);
    expect(event.direction).toBe('short');
    expect(event.valueUsd).toBe(750);
    expect(event.baseQuantity).toBeNull();
    expect(event.timestamp).toBe(T0);
    expect(event.id).toMatch(/^[0-9a-f-]{36}$/);
  });
});
