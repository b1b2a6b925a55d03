import { describe, expect, it } from 'vitest';
import {
  assetsQuerySchema,
  copierBacktestSchema,
  createSessionSchema,
  multiBacktestSchema,
  trackAccountSchema,
} from './schemas.js';

describe('request schemas', () => {
  it('fills backtest defaults and converts the window', () => {
    const parsed = copierBacktestSchema.parse({
      address: ' 0xabc ',
      assetSymbols: ['btc', 'Eth'],
      start: '2024-01-01T00:00:00Z',
      end: '2024-01-02T00:00:00.000+00:00',
    });

    expect(parsed).toEqual({
      chain: 'hyperliquid',
      address: '0xabc',
      initialDepositUsd: 10_000,
      leverage: 1,
      includePricePoints: false,
      save: false,
      page: 1,
      pageSize: 500,
      assetSymbols: ['BTC', 'ETH'],
      start: Date.UTC(2024, 0, 1),
      end: Date.UTC(2024, 0, 2),
    });
  });

  it('rejects invalid backtest parameters', () => {
    expect(copierBacktestSchema.safeParse({ address: '0xabc', leverage: 0 }).success).toBe(false);
    expect(copierBacktestSchema.safeParse({ address: '0xabc', start: 'yesterday' }).success).toBe(false);
    expect(copierBacktestSchema.safeParse({ address: '' }).success).toBe(false);
    expect(copierBacktestSchema.safeParse({ address: '0xabc', pageSize: 10_000 }).success).toBe(false);
  });

  it('defaults the consensus window', () => {
    const parsed = multiBacktestSchema.parse({ addresses: ['0xa', '0xb'] });
    expect(parsed.windowMinutes).toBe(5);
    expect(parsed.minAccounts).toBe(2);
    expect(multiBacktestSchema.safeParse({ addresses: [] }).success).toBe(false);
  });

  it('accepts numeric or automatic session sizing', () => {
    const parsed = createSessionSchema.parse({ address: '0xabc', leverage: 'auto', positionSizePct: 25 });
    expect(parsed).toMatchObject({ leverage: 'auto', positionSizePct: 25, execute: false, isCross: true });

    expect(createSessionSchema.safeParse({ address: '0xabc', leverage: 'max' }).success).toBe(false);
    expect(createSessionSchema.safeParse({ address: '0xabc', positionSizePct: -1 }).success).toBe(false);
  });

  it('requires a run or an address for sessions', () => {
    const result = createSessionSchema.safeParse({ leverage: 2 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('runId or address is required');
    }
    expect(createSessionSchema.safeParse({ runId: 3 }).success).toBe(true);
  });

  it('defaults the chain for account lookups', () => {
    expect(trackAccountSchema.parse({ address: '0xabc' })).toEqual({ chain: 'hyperliquid', address: '0xabc' });
    expect(assetsQuerySchema.parse({ address: '0xabc', chain: 'other' }).chain).toBe('other');
  });
});
