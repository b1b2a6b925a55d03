/**
 * Provider payload normalization
 *
 * Raw info-API shapes stop here; everything downstream sees Fill,
 * AccountState and TradeEvent only.
 */

import type { TradeDirection, TradeEvent } from '../backtest/types.js';
import type { AccountPosition, AccountState, Fill } from '../copier/types.js';
import type { HyperliquidClearinghouseState, HyperliquidFill } from './types.js';

function toNumber(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Map the provider's direction/side hints onto a TradeDirection
 */
export function classifyDirection(dirHint: string | null | undefined, sideHint: string | null | undefined): TradeDirection {
  const dir = (dirHint ?? '').toLowerCase();
  if (dir.includes('close') && dir.includes('short')) return 'close_short';
  if (dir.includes('close') && dir.includes('long')) return 'close_long';
  if (dir.includes('short')) return 'short';
  if (dir.includes('long')) return 'long';
  if (dir.includes('buy')) return 'buy';
  if (dir.includes('sell')) return 'sell';
  return (sideHint ?? '').toUpperCase() === 'A' ? 'short' : 'long';
}

export function normalizeFill(raw: HyperliquidFill): Fill | null {
  const coin = raw.coin?.trim();
  const time = toNumber(raw.time);
  const size = toNumber(raw.sz);
  const price = toNumber(raw.px);
  if (!coin || time === null || size === null || price === null) return null;
  if (Math.abs(size) <= 0 || price <= 0) return null;

  const side = (raw.side ?? '').toUpperCase() === 'B' ? 'buy' : 'sell';
  const tid = toNumber(raw.tid);
  const providerId =
    tid !== null ? String(tid) : raw.hash ? raw.hash : `${coin}:${time}:${raw.side ?? ''}:${size}:${price}`;

  return {
    time,
    asset: coin.toUpperCase(),
    side,
    direction: classifyDirection(raw.dir, raw.side),
    size: Math.abs(size),
    price,
    realizedPnlUsd: toNumber(raw.closedPnl),
    providerId,
  };
}

export function normalizeFills(raw: HyperliquidFill[]): Fill[] {
  return raw.map(normalizeFill).filter((f): f is Fill => f !== null);
}

export function normalizeAccountState(raw: HyperliquidClearinghouseState): AccountState {
  const openPositions: AccountPosition[] = [];

  for (const entry of raw.assetPositions ?? []) {
    const pos = entry.position;
    const coin = pos?.coin?.trim();
    const signedSize = toNumber(pos?.szi);
    if (!pos || !coin || signedSize === null || signedSize === 0) continue;

    // No mark in the payload; derive it from position value
    const positionValue = toNumber(pos.positionValue);
    openPositions.push({
      asset: coin.toUpperCase(),
      signedSize,
      entryPrice: toNumber(pos.entryPx),
      markPrice: positionValue !== null ? Math.abs(positionValue) / Math.abs(signedSize) : null,
      unrealizedPnlUsd: toNumber(pos.unrealizedPnl),
    });
  }

  return {
    accountValueUsd: toNumber(raw.marginSummary?.accountValue),
    openPositions,
  };
}

export function fillToTradeEvent(fill: Fill, accountId: string): TradeEvent {
  return {
    id: fill.providerId,
    timestamp: fill.time,
    accountId,
    asset: fill.asset,
    direction: fill.direction,
    baseQuantity: fill.size,
    valueUsd: fill.size * fill.price,
    realizedPnlUsd: fill.realizedPnlUsd,
  };
}
