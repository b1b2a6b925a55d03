import { describe, expect, it, vi } from 'vitest';
import { RateLimiter } from '../copier/throttle.js';
import { HyperliquidClient } from './hyperliquid.js';
import type { HyperliquidFill } from './types.js';

const noWait = new RateLimiter(0);

function rawFill(tid: number, time: number): HyperliquidFill {
  return { coin: 'BTC', px: '100', sz: '1', side: 'B', time, dir: 'Open Long', tid };
}

describe('HyperliquidClient', () => {
  it('pages backwards until a short page', async () => {
    const client = new HyperliquidClient('http://localhost:1', noWait);
    const fullPage = Array.from({ length: 2000 }, (_, i) => rawFill(i, 10_000 + i));
    const lastPage = Array.from({ length: 5 }, (_, i) => rawFill(5000 + i, 5000 + i));
    const spy = vi
      .spyOn(client, 'getUserFills')
      .mockResolvedValueOnce(fullPage)
      .mockResolvedValueOnce(lastPage);

    const fills = await client.getUserFillsPaginated('0xwhale');

    expect(fills).toHaveLength(2005);
    expect(spy.mock.calls).toEqual([
      ['0xwhale', undefined],
      ['0xwhale', 9999],
    ]);
  });

  it('stops at the page limit', async () => {
    const client = new HyperliquidClient('http://localhost:1', noWait);
    const fullPage = Array.from({ length: 2000 }, (_, i) => rawFill(i, 10_000 + i));
    const spy = vi.spyOn(client, 'getUserFills').mockResolvedValue(fullPage);

    await client.getUserFillsPaginated('0xwhale', undefined, 2);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it('normalizes fills and account state for the copier', async () => {
    const client = new HyperliquidClient('http://localhost:1', noWait);
    const fillsSpy = vi
      .spyOn(client, 'getUserFills')
      .mockResolvedValue([rawFill(1, 1000), { coin: 'BTC', time: 1001 }]);
    vi.spyOn(client, 'getClearinghouseState').mockResolvedValue({
      marginSummary: { accountValue: '2500' },
      assetPositions: [{ position: { coin: 'eth', szi: '-2', entryPx: '100', positionValue: '190' } }],
    });

    const fills = await client.fetchFills('0xwhale', 900);
    const state = await client.fetchAccountState('0xwhale');

    expect(fillsSpy).toHaveBeenCalledWith('0xwhale', 900);
    expect(fills.map((f) => f.providerId)).toEqual(['1']);
    expect(state.accountValueUsd).toBe(2500);
    expect(state.openPositions).toEqual([
      { asset: 'ETH', signedSize: -2, entryPrice: 100, markPrice: 95, unrealizedPnlUsd: null },
    ]);
  });

  it('passes no start time when there is no cursor', async () => {
    const client = new HyperliquidClient('http://localhost:1', noWait);
    const spy = vi.spyOn(client, 'getUserFills').mockResolvedValue([]);

    await client.fetchFills('0xwhale', null);
    expect(spy).toHaveBeenCalledWith('0xwhale', undefined);
  });
});
