/**
 * Backtesting types
 */

// Normalized trade direction (ingestion maps provider hints onto this)
export type TradeDirection =
  | 'buy'
  | 'sell'
  | 'deposit'
  | 'withdraw'
  | 'long'
  | 'short'
  | 'close_long'
  | 'close_short';

export type EntryDirection = 'buy' | 'long' | 'short';
export type ClosingDirection = 'sell' | 'withdraw' | 'close_long' | 'close_short';

// Historical trade of a tracked account; read-only to the simulator
export interface TradeEvent {
  id: string;
  timestamp: number; // epoch ms
  accountId: string;
  asset: string;
  direction: TradeDirection;
  baseQuantity: number | null; // absolute
  valueUsd: number | null; // absolute notional
  realizedPnlUsd: number | null;
}

// One account x one asset exposure
export interface Position {
  quantity: number; // signed: > 0 long, < 0 short
  avgPrice: number;
  margin: number; // reserved collateral
}

export interface CloseOutcome {
  closedQuantity: number;
  pnl: number;
  marginReleased: number;
}

export interface PricePoint {
  timestamp: number; // epoch ms
  price: number;
}

// Backtest configuration
export interface CopierBacktestConfig {
  initialDepositUsd: number;
  leverage: number; // clamped to [0.1, 100]
  positionSizePct: number | null; // percent of the whale's notional; null = recommended
  feeBps: number;
  slippageBps: number;
  assetSymbols: string[] | null;
  includePricePoints: boolean;
  // Whale's historical entry notionals for recommended sizing; defaults to the replayed entries
  entrySizesUsd?: number[];
}

// Result of one executed simulated trade
export interface TradeResult {
  id: string;
  timestamp: string;
  direction: TradeDirection;
  asset: string;
  notionalUsd: number;
  pnlUsd: number;
  feeUsd: number;
  slippageUsd: number;
  netPnlUsd: number;
  cumulativePnlUsd: number;
  equityUsd: number;
  unrealizedPnlUsd: number;
  positionSizeBase: number;
}

// Equity curve point
export interface EquityPoint {
  timestamp: string;
  equityUsd: number;
  unrealizedPnlUsd: number;
  cashUsd: number;
  marginUsd: number;
}

export interface BacktestSummary {
  initialDepositUsd: number;
  recommendedPositionPct: number;
  usedPositionPct: number;
  leverageUsed: number;
  assetSymbols: string[] | null;
  totalFeesUsd: number;
  totalSlippageUsd: number;
  grossPnlUsd: number;
  netPnlUsd: number;
  roiPercent: number;
  tradesCopied: number;
  tradesSkipped: number;
  closingTrades: number;
  winningTrades: number;
  winRatePercent: number | null;
  maxDrawdownPercent: number;
  maxDrawdownUsd: number;
  start: string | null;
  end: string | null;
}

export interface BacktestResult {
  summary: BacktestSummary;
  trades: TradeResult[];
  equityCurve: EquityPoint[];
  pricePoints?: Record<string, Array<{ timestamp: string; price: number }>>;
}

// Saved backtest, used to parameterize a live copy session
export interface BacktestRun {
  id: number;
  accountId: string;
  createdAt: string;
  leverage: number | null;
  positionSizePct: number | null;
  assetSymbols: string[] | null;
  winRatePercent: number | null;
  tradesCopied: number | null;
  maxDrawdownPercent: number | null;
  maxDrawdownUsd: number | null;
  initialDepositUsd: number | null;
  netPnlUsd: number | null;
  roiPercent: number | null;
}

// Per-asset price series, e.g. 1m closes from persistence
export interface PriceSeriesSource {
  loadSeries(assets: string[], fromTs: number, toTs: number): Promise<Map<string, PricePoint[]>>;
}
