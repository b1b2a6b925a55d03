/**
 * Backtest metrics calculations
 */

import type { BacktestSummary, EquityPoint } from './types.js';

export const MIN_LEVERAGE = 0.1;
export const MAX_LEVERAGE = 100;
export const MAX_POSITION_PCT = 200;

// Anchor percentile of the whale's entry sizes for recommended sizing
const RECOMMENDED_SIZE_PERCENTILE = 75;

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

export function clampLeverage(leverage: number): number {
  return clamp(leverage, MIN_LEVERAGE, MAX_LEVERAGE);
}

export function clampPositionPct(pct: number): number {
  return clamp(pct, 0, MAX_POSITION_PCT);
}

/**
 * Percentile with linear interpolation between order statistics
 * (rank k = (n - 1) * pct / 100)
 */
export function percentile(values: number[], pct: number): number {
  if (values.length === 0) return 0;
  if (pct <= 0) return values.reduce((min, v) => Math.min(min, v), Infinity);
  if (pct >= 100) return values.reduce((max, v) => Math.max(max, v), -Infinity);

  const sorted = [...values].sort((a, b) => a - b);
  const k = ((sorted.length - 1) * pct) / 100;
  const f = Math.floor(k);
  const c = Math.min(f + 1, sorted.length - 1);
  if (f === c) return sorted[f];

  const weightC = k - f;
  return sorted[f] * (1 - weightC) + sorted[c] * weightC;
}

/**
 * Suggested copy ratio (0..1): user capital vs. the whale's typical entry size
 */
export function recommendedPositionRatio(initialDepositUsd: number, entrySizesUsd: number[]): number {
  const sizes = entrySizesUsd.filter((v) => Number.isFinite(v) && v > 0);
  if (sizes.length === 0) return 1;

  const anchor = percentile(sizes, RECOMMENDED_SIZE_PERCENTILE);
  if (anchor <= 0) return 1;

  return clamp(initialDepositUsd / anchor, 0, 1);
}

/**
 * Max peak-to-trough drawdown over an equity curve
 */
export function computeDrawdown(curve: Array<Pick<EquityPoint, 'equityUsd'>>): {
  maxDrawdownPercent: number;
  maxDrawdownUsd: number;
} {
  let peak = Number.NEGATIVE_INFINITY;
  let maxRatio = 0;
  let maxDrawdownUsd = 0;

  for (const point of curve) {
    if (point.equityUsd > peak) peak = point.equityUsd;
    if (peak <= 0) continue;

    const gap = peak - point.equityUsd;
    // Equity can dip below zero on levered unrealized losses
    const ratio = Math.min(gap / peak, 1);
    if (ratio > maxRatio) {
      maxRatio = ratio;
      maxDrawdownUsd = gap;
    }
  }

  return { maxDrawdownPercent: maxRatio * 100, maxDrawdownUsd };
}

/**
 * Synthetic clock step: 1m, widened for multi-month / multi-year spans
 */
export function stepSizeMs(spanMs: number): number {
  const day = 24 * 60 * 60 * 1000;
  if (spanMs > 730 * day) return 15 * 60 * 1000;
  if (spanMs > 60 * day) return 5 * 60 * 1000;
  return 60 * 1000;
}

/**
 * Summary for a run with nothing to simulate
 */
export function emptySummary(
  initialDepositUsd: number,
  leverageUsed: number,
  recommendedPositionPct: number,
  usedPositionPct: number,
  assetSymbols: string[] | null
): BacktestSummary {
  return {
    initialDepositUsd,
    recommendedPositionPct,
    usedPositionPct,
    leverageUsed,
    assetSymbols,
    totalFeesUsd: 0,
    totalSlippageUsd: 0,
    grossPnlUsd: 0,
    netPnlUsd: 0,
    roiPercent: 0,
    tradesCopied: 0,
    tradesSkipped: 0,
    closingTrades: 0,
    winningTrades: 0,
    winRatePercent: null,
    maxDrawdownPercent: 0,
    maxDrawdownUsd: 0,
    start: null,
    end: null,
  };
}

/**
 * Format summary for display
 */
export function formatSummary(summary: BacktestSummary): string {
  const winRate = summary.winRatePercent === null ? 'n/a' : `${summary.winRatePercent.toFixed(1)}%`;
  const lines = [
    '=== Copier Backtest ===',
    '',
    `Window: ${summary.start ?? '-'} → ${summary.end ?? '-'}`,
    `Deposit: $${summary.initialDepositUsd.toFixed(2)} @ ${summary.leverageUsed}x`,
    `Size: ${summary.usedPositionPct.toFixed(2)}% (recommended ${summary.recommendedPositionPct.toFixed(2)}%)`,
    '',
    `Trades: ${summary.tradesCopied} copied, ${summary.tradesSkipped} skipped`,
    `Closes: ${summary.closingTrades} (${summary.winningTrades}W) win rate ${winRate}`,
    '',
    `Gross P&L: $${summary.grossPnlUsd.toFixed(2)}`,
    `Fees: $${summary.totalFeesUsd.toFixed(2)}  Slippage: $${summary.totalSlippageUsd.toFixed(2)}`,
    `Net P&L: $${summary.netPnlUsd.toFixed(2)} (${summary.roiPercent.toFixed(2)}%)`,
    `Max Drawdown: ${summary.maxDrawdownPercent.toFixed(1)}% ($${summary.maxDrawdownUsd.toFixed(2)})`,
  ];

  return lines.join('\n');
}
