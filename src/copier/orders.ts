/**
 * IOC order construction and venue rounding
 */

import type { AssetSizing, OrderRequest } from './types.js';

const PRICE_SIG_FIGS = 5;

export function roundSigFigs(value: number, sigFigs = PRICE_SIG_FIGS): number {
  if (value === 0 || !Number.isFinite(value)) return 0;
  return Number(value.toPrecision(sigFigs));
}

// 0.001 -> 3, 1 -> 0
export function decimalsFor(increment: number): number {
  if (!(increment > 0)) return 0;
  return Math.max(0, Math.round(-Math.log10(increment)));
}

export function roundToIncrement(value: number, increment: number): number {
  return Number(value.toFixed(decimalsFor(increment)));
}

/**
 * Limit price moved against the taker by `slippagePct`
 */
export function slippagePrice(price: number, isBuy: boolean, slippagePct: number, priceIncrement: number): number {
  const nudged = isBuy ? price * (1 + slippagePct / 100) : price * (1 - slippagePct / 100);
  return roundToIncrement(roundSigFigs(nudged), priceIncrement);
}

// The venue takes whole leverage of at least 1x
export function exchangeLeverage(leverage: number): number {
  return Math.max(1, Math.round(leverage));
}

export interface OrderIntent {
  asset: string;
  isBuy: boolean;
  size: number;
  referencePrice: number;
}

/**
 * Build an IOC limit order; null when the size rounds to zero
 */
export function buildIocOrder(intent: OrderIntent, sizing: AssetSizing, slippagePct: number): OrderRequest | null {
  const size = roundToIncrement(intent.size, sizing.minSizeIncrement);
  if (!(size > 0)) return null;

  return {
    asset: intent.asset.toUpperCase(),
    isBuy: intent.isBuy,
    size,
    limitPrice: slippagePrice(intent.referencePrice, intent.isBuy, slippagePct, sizing.priceIncrement),
    reduceOnly: false,
    timeInForce: 'Ioc',
  };
}
