/**
 * Hyperliquid info API types
 * Numeric fields arrive as decimal strings.
 */

type NumericField = string | number | null | undefined;

// Entry of a userFills response
export interface HyperliquidFill {
  coin?: string | null;
  px?: NumericField;
  sz?: NumericField;
  side?: string | null; // 'B' = bid/buy, 'A' = ask/sell
  time?: NumericField;
  dir?: string | null; // e.g. 'Open Long', 'Close Short'
  closedPnl?: NumericField;
  hash?: string | null;
  oid?: NumericField;
  tid?: NumericField;
  fee?: NumericField;
}

export interface HyperliquidPosition {
  coin?: string | null;
  szi?: NumericField; // signed size
  entryPx?: NumericField;
  positionValue?: NumericField;
  unrealizedPnl?: NumericField;
}

export interface HyperliquidClearinghouseState {
  marginSummary?: {
    accountValue?: NumericField;
    totalNtlPos?: NumericField;
  } | null;
  assetPositions?: Array<{ type?: string; position?: HyperliquidPosition | null }> | null;
}

export interface HyperliquidMeta {
  universe?: Array<{ name?: string | null; szDecimals?: number | null }> | null;
}

export interface HyperliquidSpotMeta {
  universe?: Array<{ name?: string | null; index?: number | null; tokens?: number[] | null }> | null;
  tokens?: Array<{ name?: string | null; szDecimals?: number | null }> | null;
}

export type InfoRequest =
  | { type: 'userFills'; user: string; startTime?: number }
  | { type: 'clearinghouseState'; user: string }
  | { type: 'meta' }
  | { type: 'spotMeta' };
