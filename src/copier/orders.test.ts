import { describe, expect, it } from 'vitest';
import { buildIocOrder, decimalsFor, roundSigFigs, roundToIncrement, slippagePrice } from './orders.js';

describe('rounding', () => {
  it('rounds to five significant figures', () => {
    expect(roundSigFigs(123456.789)).toBe(123460);
    expect(roundSigFigs(0.000123456)).toBe(0.00012346);
    expect(roundSigFigs(0)).toBe(0);
  });

  it('derives decimals from an increment', () => {
    expect(decimalsFor(0.001)).toBe(3);
    expect(decimalsFor(1)).toBe(0);
    expect(decimalsFor(0)).toBe(0);
  });

  it('rounds to the increment', () => {
    expect(roundToIncrement(1.23456, 0.01)).toBe(1.23);
    expect(roundToIncrement(7.6, 1)).toBe(8);
  });
});

describe('slippagePrice', () => {
  it('moves the price against the taker', () => {
    expect(slippagePrice(100, true, 1, 0.01)).toBe(101);
    expect(slippagePrice(100, false, 1, 0.01)).toBe(99);
  });

  it('applies significant figures before the price increment', () => {
    // 12345.678 * 1.01 = 12469.13478 -> 12469
    expect(slippagePrice(12345.678, true, 1, 0.1)).toBe(12469);
  });
});

describe('buildIocOrder', () => {
  it('builds a rounded IOC limit order', () => {
    const order = buildIocOrder(
      { asset: 'btc', isBuy: true, size: 0.123456, referencePrice: 50000 },
      { minSizeIncrement: 0.001, priceIncrement: 1 },
      1
    );

    expect(order).toEqual({
      asset: 'BTC',
      isBuy: true,
      size: 0.123,
      limitPrice: 50500,
      reduceOnly: false,
      timeInForce: 'Ioc',
    });
  });

  it('returns null when the size rounds to zero', () => {
    const order = buildIocOrder(
      { asset: 'ETH', isBuy: false, size: 0.0004, referencePrice: 3000 },
      { minSizeIncrement: 0.001, priceIncrement: 0.01 },
      1
    );
    expect(order).toBeNull();
  });
});
