import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CopierManager, SessionValidationError } from './manager.js';
import type {
  AccountState,
  AssetSizing,
  CopyMarketData,
  CreateSessionInput,
  Fill,
  OrderRequest,
  TradingGateway,
} from './types.js';

const START = 1_000_000;

class FakeMarketData implements CopyMarketData {
  fills: Fill[] = [];
  state: AccountState = { accountValueUsd: 10_000, openPositions: [] };
  failFills = false;
  failState = false;
  fillCalls = 0;
  stateCalls = 0;

  async fetchFills(): Promise<Fill[]> {
    this.fillCalls++;
    if (this.failFills) throw new Error('boom');
    return [...this.fills];
  }

  async fetchAccountState(): Promise<AccountState> {
    this.stateCalls++;
    if (this.failState) throw new Error('state down');
    return this.state;
  }
}

class FakeTrading implements TradingGateway {
  orders: OrderRequest[] = [];
  leverageCalls: Array<{ asset: string; leverage: number; isCross: boolean }> = [];
  failOrder = false;
  failLeverage = false;

  async resolveAssetSizing(): Promise<AssetSizing> {
    return { minSizeIncrement: 0.0001, priceIncrement: 0.01 };
  }

  async submitOrder(order: OrderRequest): Promise<unknown> {
    if (this.failOrder) throw new Error('rejected');
    this.orders.push(order);
    return { status: 'ok' };
  }

  async updateLeverage(asset: string, leverage: number, isCross: boolean): Promise<unknown> {
    this.leverageCalls.push({ asset, leverage, isCross });
    if (this.failLeverage) throw new Error('nope');
    return { status: 'ok' };
  }
}

function fill(providerId: string, time: number, overrides: Partial<Fill> = {}): Fill {
  return {
    time,
    asset: 'BTC',
    side: 'buy',
    direction: 'long',
    size: 1,
    price: 100,
    realizedPnlUsd: null,
    providerId,
    ...overrides,
  };
}

describe('CopierManager', () => {
  let now: number;
  let market: FakeMarketData;
  let trading: FakeTrading;
  let manager: CopierManager;

  const input = (overrides: Partial<CreateSessionInput> = {}): CreateSessionInput => ({
    address: '0xwhale',
    accountId: 'acct-1',
    leverage: 2,
    positionSizePct: 50,
    ...overrides,
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    now = START;
    market = new FakeMarketData();
    trading = new FakeTrading();
    manager = new CopierManager({
      marketData: market,
      trading,
      now: () => now,
      options: { backoffBaseMs: 2000, backoffMaxMs: 60_000, leverageThrottleMs: 2000, accountStateTtlMs: 5000 },
    });
  });

  describe('createSession', () => {
    it('seeds the cursor past history so it is never replayed', async () => {
      market.fills = [fill('h1', 500), fill('h2', 900)];
      const status = await manager.createSession(input());

      expect(status.cursor).toBe(900);
      expect(status.notifications).toEqual(['Skipping historical fills up to 1970-01-01T00:00:00.900Z']);

      await manager.tick();
      expect(manager.status(status.sessionId)?.processed).toBe(0);
    });

    it('starts from now when the history fetch fails', async () => {
      market.failFills = true;
      const status = await manager.createSession(input());

      expect(status.cursor).toBe(START);
      expect(status.errors).toEqual(['history fetch error: boom']);
      expect(status.active).toBe(true);
    });

    it('records pre-session positions', async () => {
      market.state = {
        accountValueUsd: 10_000,
        openPositions: [
          { asset: 'btc', signedSize: 2, entryPrice: 100, markPrice: 100, unrealizedPnlUsd: 0 },
          { asset: 'ETH', signedSize: -3, entryPrice: 10, markPrice: 10, unrealizedPnlUsd: 0 },
        ],
      };
      const status = await manager.createSession(input());
      expect(status.notifications).toEqual(['Detected pre-session open positions: BTC=2, ETH=-3']);
    });

    it('rejects malformed requests', async () => {
      await expect(manager.createSession(input({ address: '  ' }))).rejects.toBeInstanceOf(SessionValidationError);
      await expect(manager.createSession(input({ leverage: -1 }))).rejects.toThrow(
        'leverage must be a non-negative number or "auto"'
      );
      await expect(manager.createSession(input({ positionSizePct: Number.NaN }))).rejects.toBeInstanceOf(
        SessionValidationError
      );
      await expect(manager.createSession(input({ positionSizePct: 'auto' }))).rejects.toThrow(
        'userDepositUsd is required for auto position sizing'
      );
      expect(manager.listStatuses()).toEqual([]);
    });
  });

  describe('processing fills', () => {
    it('processes a replayed provider id at most once', async () => {
      const { sessionId } = await manager.createSession(input());
      market.fills = [fill('f1', START + 500)];

      await manager.tick();
      await manager.tick();
      expect(manager.status(sessionId)?.processed).toBe(1);
      expect(manager.status(sessionId)?.cursor).toBe(START + 500);

      market.fills = [fill('f1', START + 500), fill('f2', START + 600), fill('f2', START + 600)];
      await manager.tick();
      expect(manager.status(sessionId)?.processed).toBe(2);
    });

    it('ignores fills older than the cursor', async () => {
      const { sessionId } = await manager.createSession(input());
      market.fills = [fill('old', START - 1)];

      await manager.tick();
      expect(manager.status(sessionId)?.processed).toBe(0);
    });

    it('scales fills and reports dry-run orders without submitting', async () => {
      const { sessionId } = await manager.createSession(input());
      market.fills = [fill('f1', START + 1)];

      await manager.tick();

      expect(trading.orders).toEqual([]);
      expect(trading.leverageCalls).toEqual([]);
      expect(manager.status(sessionId)?.notifications).toEqual(['dry run: buy 0.5 BTC @ 101 (2x)']);
    });

    it('submits orders and updates leverage in execute mode', async () => {
      await manager.createSession(input({ execute: true }));
      market.fills = [fill('f1', START + 1), fill('f2', START + 2, { side: 'sell', direction: 'close_long' })];

      await manager.tick();

      expect(trading.leverageCalls).toEqual([{ asset: 'BTC', leverage: 2, isCross: true }]);
      expect(trading.orders).toEqual([
        { asset: 'BTC', isBuy: true, size: 0.5, limitPrice: 101, reduceOnly: false, timeInForce: 'Ioc' },
        { asset: 'BTC', isBuy: false, size: 0.5, limitPrice: 99, reduceOnly: false, timeInForce: 'Ioc' },
      ]);
    });

    it('throttles leverage updates per session and asset', async () => {
      trading.failLeverage = true;
      const { sessionId } = await manager.createSession(input({ execute: true }));

      market.fills = [fill('f1', START + 1), fill('f2', START + 2)];
      await manager.tick();
      expect(trading.leverageCalls).toHaveLength(1);

      now += 2000;
      market.fills = [fill('f3', START + 3)];
      await manager.tick();
      expect(trading.leverageCalls).toHaveLength(2);

      const status = manager.status(sessionId);
      expect(status?.processed).toBe(3);
      expect(status?.errors).toEqual(['leverage error (ignored): nope', 'leverage error (ignored): nope']);
      expect(trading.orders).toHaveLength(3);
    });

    it('records order errors and keeps going', async () => {
      trading.failOrder = true;
      const { sessionId } = await manager.createSession(input({ execute: true }));
      market.fills = [fill('f1', START + 1)];

      await manager.tick();

      expect(manager.status(sessionId)?.errors).toEqual(['order error: rejected']);
      expect(manager.status(sessionId)?.processed).toBe(1);
    });

    it('skips assets outside the allow-list but still advances the cursor', async () => {
      const { sessionId } = await manager.createSession(input({ assetSymbols: ['eth'] }));
      market.fills = [fill('f1', START + 7)];

      await manager.tick();

      expect(manager.status(sessionId)?.processed).toBe(0);
      expect(manager.status(sessionId)?.cursor).toBe(START + 7);
    });

    it('skips orders that round to zero', async () => {
      const { sessionId } = await manager.createSession(input({ positionSizePct: 100 }));
      market.fills = [fill('f1', START + 1, { size: 0.00001 })];

      await manager.tick();

      expect(manager.status(sessionId)?.notifications).toEqual(['Skipped BTC fill: size 0.00001 rounds to zero']);
      expect(manager.status(sessionId)?.processed).toBe(0);
    });

    it('keeps only the most recent messages', async () => {
      manager = new CopierManager({ marketData: market, trading, now: () => now, options: { maxSessionMessages: 2 } });
      const { sessionId } = await manager.createSession(input({ positionSizePct: 100 }));
      market.fills = [fill('f1', START + 1), fill('f2', START + 2, { size: 2 }), fill('f3', START + 3, { size: 3 })];

      await manager.tick();

      expect(manager.status(sessionId)?.notifications).toEqual([
        'dry run: buy 2 BTC @ 101 (2x)',
        'dry run: buy 3 BTC @ 101 (2x)',
      ]);
    });
  });

  describe('pre-session positions', () => {
    it('suppresses closes of pre-session exposure until it is unwound', async () => {
      market.state = {
        accountValueUsd: 10_000,
        openPositions: [{ asset: 'BTC', signedSize: 2, entryPrice: 100, markPrice: 100, unrealizedPnlUsd: 0 }],
      };
      const { sessionId } = await manager.createSession(input());

      market.fills = [
        fill('c1', START + 1, { side: 'sell', direction: 'close_long', size: 1.5 }),
        fill('b1', START + 2, { side: 'buy', direction: 'long', size: 1 }),
        fill('c2', START + 3, { side: 'sell', direction: 'close_long', size: 1 }),
        fill('c3', START + 4, { side: 'sell', direction: 'close_long', size: 1 }),
      ];
      await manager.tick();

      const status = manager.status(sessionId);
      expect(status?.notifications).toEqual([
        'Detected pre-session open positions: BTC=2',
        'Ignored close for pre-session position BTC (remaining 0.5000)',
        'dry run: buy 0.5 BTC @ 101 (2x)',
        'Ignored close for pre-session position BTC (remaining 0.0000)',
        'dry run: sell 0.25 BTC @ 99 (2x)',
        'dry run: sell 0.5 BTC @ 99 (2x)',
      ]);
      expect(status?.processed).toBe(3);
    });

    it('copies only the part of a fill that crosses through the pre-session position', async () => {
      market.state = {
        accountValueUsd: 10_000,
        openPositions: [{ asset: 'BTC', signedSize: 1, entryPrice: 100, markPrice: 100, unrealizedPnlUsd: 0 }],
      };
      await manager.createSession(input({ execute: true, positionSizePct: 100 }));

      // Source flips from long 1 to short 2, then closes the short
      market.fills = [
        fill('flip', START + 1, { side: 'sell', direction: 'short', size: 3 }),
        fill('cover', START + 2, { side: 'buy', direction: 'close_short', size: 2 }),
      ];
      await manager.tick();

      expect(trading.orders.map((o) => [o.isBuy ? 'buy' : 'sell', o.size])).toEqual([
        ['sell', 2],
        ['buy', 2],
      ]);
      const net = trading.orders.reduce((sum, o) => sum + (o.isBuy ? o.size : -o.size), 0);
      expect(net).toBe(0);
    });
  });

  describe('auto sizing', () => {
    it('derives size from the deposit and leverage from the source exposure', async () => {
      market.state = {
        accountValueUsd: 10_000,
        openPositions: [{ asset: 'ETH', signedSize: -10, entryPrice: 250, markPrice: 300, unrealizedPnlUsd: -500 }],
      };
      const { sessionId } = await manager.createSession(
        input({ positionSizePct: 'auto', leverage: 'auto', userDepositUsd: 1000 })
      );
      market.fills = [fill('f1', START + 1, { size: 2 }), fill('f2', START + 2, { size: 4 })];

      await manager.tick();

      expect(manager.status(sessionId)?.notifications.slice(-2)).toEqual([
        'dry run: buy 0.2 BTC @ 101 (0.3x)',
        'dry run: buy 0.4 BTC @ 101 (0.3x)',
      ]);
      // Account state served from cache within the TTL
      expect(market.stateCalls).toBe(1);
    });

    it('falls back to the fill notional when the source has no open positions', async () => {
      const { sessionId } = await manager.createSession(
        input({ positionSizePct: 'auto', leverage: 'auto', userDepositUsd: 1000 })
      );
      market.fills = [fill('f1', START + 1, { size: 2 })];

      await manager.tick();

      expect(manager.status(sessionId)?.notifications).toEqual(['dry run: buy 0.2 BTC @ 101 (0.1x)']);
    });

    it('updates leverage only when the applied whole-number value changes', async () => {
      const exposure = (markPrice: number): AccountState => ({
        accountValueUsd: 10_000,
        openPositions: [{ asset: 'ETH', signedSize: -10, entryPrice: 250, markPrice, unrealizedPnlUsd: 0 }],
      });
      market.state = exposure(300);
      await manager.createSession(input({ execute: true, leverage: 'auto', positionSizePct: 100 }));

      market.fills = [fill('f1', START + 1)];
      await manager.tick();

      // 0.4x still applies as 1x
      now += 5000;
      market.state = exposure(400);
      market.fills = [fill('f2', START + 2)];
      await manager.tick();

      now += 5000;
      market.state = exposure(2500);
      market.fills = [fill('f3', START + 3)];
      await manager.tick();

      expect(market.stateCalls).toBe(3);
      expect(trading.leverageCalls).toEqual([
        { asset: 'BTC', leverage: 1, isCross: true },
        { asset: 'BTC', leverage: 3, isCross: true },
      ]);
    });

    it('refreshes account state after the TTL', async () => {
      await manager.createSession(input({ positionSizePct: 'auto', userDepositUsd: 1000 }));
      now += 5000;
      market.fills = [fill('f1', START + 1)];

      await manager.tick();
      expect(market.stateCalls).toBe(2);
    });
  });

  describe('backoff', () => {
    it('skips an address while its backoff window is open', async () => {
      const { sessionId } = await manager.createSession(input());
      market.failFills = true;

      await manager.tick();
      expect(manager.status(sessionId)?.errors).toEqual(['fill fetch error: boom (backing off 2000ms)']);
      const callsAfterFailure = market.fillCalls;

      await manager.tick();
      expect(market.fillCalls).toBe(callsAfterFailure);

      now += 2000;
      market.failFills = false;
      market.fills = [fill('f1', START + 1)];
      await manager.tick();
      expect(market.fillCalls).toBe(callsAfterFailure + 1);
      expect(manager.status(sessionId)?.processed).toBe(1);
    });

    it('records account-state failures as sizing errors', async () => {
      const { sessionId } = await manager.createSession(input({ positionSizePct: 'auto', userDepositUsd: 1000 }));
      now += 5000;
      market.failState = true;
      market.fills = [fill('f1', START + 1)];

      await manager.tick();

      expect(manager.status(sessionId)?.errors).toEqual(['sizing error: state down']);
      expect(manager.status(sessionId)?.processed).toBe(0);
    });
  });

  describe('lifecycle', () => {
    it('stops sessions and leaves them out of later ticks', async () => {
      const { sessionId } = await manager.createSession(input());
      const calls = market.fillCalls;

      expect(manager.stopSession(sessionId)).toBe(true);
      expect(manager.stopSession('missing')).toBe(false);
      await manager.tick();

      expect(market.fillCalls).toBe(calls);
      expect(manager.status(sessionId)?.active).toBe(false);
      expect(manager.status('missing')).toBeNull();
    });

    it('never runs overlapping ticks', async () => {
      await manager.createSession(input());
      const calls = market.fillCalls;

      await Promise.all([manager.tick(), manager.tick()]);
      expect(market.fillCalls).toBe(calls + 1);
    });

    it('returns snapshots that do not alias session state', async () => {
      const { sessionId } = await manager.createSession(input());
      const status = manager.status(sessionId);
      status?.errors.push('mutated');

      expect(manager.status(sessionId)?.errors).toEqual([]);
      expect(manager.listStatuses().map((s) => s.sessionId)).toEqual([sessionId]);
    });
  });
});
