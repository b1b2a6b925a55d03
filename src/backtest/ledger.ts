/**
 * Position Ledger
 *
 * Average-cost position accounting with proportional margin release.
 * Shared by the backtest simulator and the live copier.
 */

import type { PriceResolver } from './prices.js';
import type {
  ClosingDirection,
  CloseOutcome,
  EntryDirection,
  Position,
  TradeDirection,
} from './types.js';

const ENTRY_DIRECTIONS: ReadonlySet<TradeDirection> = new Set<TradeDirection>(['buy', 'long', 'short']);
const CLOSING_DIRECTIONS: ReadonlySet<TradeDirection> = new Set<TradeDirection>([
  'sell',
  'withdraw',
  'close_long',
  'close_short',
]);

export function isEntryDirection(direction: TradeDirection): direction is EntryDirection {
  return ENTRY_DIRECTIONS.has(direction);
}

export function isClosingDirection(direction: TradeDirection): direction is ClosingDirection {
  return CLOSING_DIRECTIONS.has(direction);
}

/**
 * Long-family vs short-family for an entry
 */
export function entrySide(direction: EntryDirection): 'long' | 'short' {
  return direction === 'short' ? 'short' : 'long';
}

export function emptyPosition(): Position {
  return { quantity: 0, avgPrice: 0, margin: 0 };
}

function reset(position: Position): void {
  position.quantity = 0;
  position.avgPrice = 0;
  position.margin = 0;
}

/**
 * Add to (or flip through) a position at `price`
 */
export function applyEntry(
  position: Position,
  direction: EntryDirection,
  quantity: number,
  price: number,
  marginRequired: number
): void {
  const signedQty = entrySide(direction) === 'long' ? Math.abs(quantity) : -Math.abs(quantity);
  if (signedQty === 0) return;

  const newQty = position.quantity + signedQty;
  if (newQty === 0) {
    // Round trip within the same tick
    reset(position);
    return;
  }

  const existingCost = position.avgPrice * position.quantity;
  const addedCost = price * signedQty;
  position.avgPrice = (existingCost + addedCost) / newQty;
  position.quantity = newQty;
  position.margin += marginRequired;
}

/**
 * Close up to `quantity` of the open position at `price`.
 * Returns null when the position is flat.
 */
export function applyClose(position: Position, quantity: number, price: number): CloseOutcome | null {
  const openQty = position.quantity;
  if (openQty === 0) return null;

  const closedQuantity = Math.min(Math.abs(quantity), Math.abs(openQty));
  const isLong = openQty > 0;
  const signedClose = isLong ? closedQuantity : -closedQuantity;
  const avg = position.avgPrice;

  const pnl = isLong ? (price - avg) * closedQuantity : (avg - price) * closedQuantity;
  const marginReleased = position.margin * (closedQuantity / Math.abs(openQty));

  position.quantity = openQty - signedClose;
  if (position.quantity === 0) {
    reset(position);
  } else {
    position.margin -= marginReleased;
  }

  return { closedQuantity, pnl, marginReleased };
}

/**
 * Unrealized PnL and reserved margin across all positions at `asOf`.
 * Positions without a mark are valued at their average price (zero unrealized).
 */
export function unrealizedAndMargin(
  positions: ReadonlyMap<string, Position>,
  asOf: number,
  prices: PriceResolver
): { unrealized: number; margin: number } {
  let unrealized = 0;
  let margin = 0;

  for (const [asset, pos] of positions) {
    margin += pos.margin;
    if (pos.quantity === 0) continue;

    const mark = prices.resolve(asset, asOf, pos.avgPrice) ?? pos.avgPrice;
    unrealized +=
      pos.quantity > 0
        ? (mark - pos.avgPrice) * pos.quantity
        : (pos.avgPrice - mark) * Math.abs(pos.quantity);
  }

  return { unrealized, margin };
}
