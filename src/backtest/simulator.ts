/**
 * Copier Backtest Simulator
 *
 * Replays a whale's trade events on a synthetic minute clock through the
 * position ledger, applying copy sizing, leverage, fees and slippage.
 * Pure and synchronous: every call owns its state.
 */

import { toISO } from '../db/client.js';
import {
  applyClose,
  applyEntry,
  emptyPosition,
  isClosingDirection,
  isEntryDirection,
  unrealizedAndMargin,
} from './ledger.js';
import {
  clampLeverage,
  clampPositionPct,
  computeDrawdown,
  emptySummary,
  recommendedPositionRatio,
  stepSizeMs,
} from './metrics.js';
import { PriceResolver } from './prices.js';
import type {
  BacktestResult,
  CopierBacktestConfig,
  EquityPoint,
  Position,
  TradeEvent,
  TradeResult,
} from './types.js';

// At most 5% of levered equity per copied entry
const PER_TRADE_CAP_RATIO = 0.05;
const MINUTE_MS = 60 * 1000;
const BPS = 10_000;

export const DEFAULT_BACKTEST_CONFIG: CopierBacktestConfig = {
  initialDepositUsd: 10_000,
  leverage: 1,
  positionSizePct: null,
  feeBps: 0,
  slippageBps: 0,
  assetSymbols: null,
  includePricePoints: false,
};

interface SimulationState {
  cash: number;
  positions: Map<string, Position>;
  grossPnl: number;
  totalFees: number;
  totalSlippage: number;
  wins: number;
  closingTrades: number;
  skipped: number;
  trades: TradeResult[];
  equityCurve: EquityPoint[];
}

/**
 * Run the copier simulation over `events` (ordered by time, then insertion)
 */
export function simulateCopierBacktest(
  events: TradeEvent[],
  config: Partial<CopierBacktestConfig> = {},
  prices: PriceResolver = new PriceResolver()
): BacktestResult {
  const cfg: CopierBacktestConfig = { ...DEFAULT_BACKTEST_CONFIG, ...config };

  const leverage = clampLeverage(cfg.leverage);
  const feeRate = cfg.feeBps / BPS;
  const slippageRate = cfg.slippageBps / BPS;
  const initialDeposit = cfg.initialDepositUsd;
  const allowed = cfg.assetSymbols?.length
    ? new Set(cfg.assetSymbols.map((a) => a.toUpperCase()))
    : null;

  const replay = events
    .map((event, index) => ({ event, index }))
    .filter(({ event }) => isEntryDirection(event.direction) || isClosingDirection(event.direction))
    .filter(({ event }) => !allowed || allowed.has(event.asset.toUpperCase()))
    .sort((a, b) => a.event.timestamp - b.event.timestamp || a.index - b.index)
    .map(({ event }) => event);

  const entrySizes =
    cfg.entrySizesUsd ??
    replay.filter((e) => isEntryDirection(e.direction)).map((e) => Math.abs(e.valueUsd ?? 0));
  const recommendedPct = recommendedPositionRatio(initialDeposit, entrySizes) * 100;
  const usedPct = cfg.positionSizePct !== null ? clampPositionPct(cfg.positionSizePct) : recommendedPct;
  const scale = usedPct / 100;

  const pricePoints = cfg.includePricePoints ? prices.toRecord() : undefined;

  if (replay.length === 0) {
    return {
      summary: emptySummary(initialDeposit, leverage, recommendedPct, usedPct, cfg.assetSymbols),
      trades: [],
      equityCurve: [],
      pricePoints,
    };
  }

  const state: SimulationState = {
    cash: initialDeposit,
    positions: new Map(),
    grossPnl: 0,
    totalFees: 0,
    totalSlippage: 0,
    wins: 0,
    closingTrades: 0,
    skipped: 0,
    trades: [],
    equityCurve: [],
  };

  const equityAt = (ts: number) => {
    const { unrealized, margin } = unrealizedAndMargin(state.positions, ts, prices);
    return { unrealized, margin, equity: state.cash + margin + unrealized };
  };

  const processEvent = (event: TradeEvent): void => {
    const desiredNotional = Math.abs(event.valueUsd ?? 0) * scale;
    const asset = event.asset.toUpperCase();

    let notional = desiredNotional;
    if (isEntryDirection(event.direction)) {
      const leveredEquity = equityAt(event.timestamp).equity * leverage;
      notional = leveredEquity > 0 ? Math.min(desiredNotional, leveredEquity * PER_TRADE_CAP_RATIO) : 0;
    }
    if (!(notional > 0)) {
      state.skipped++;
      return;
    }

    const implied =
      event.valueUsd && event.baseQuantity ? Math.abs(event.valueUsd) / Math.abs(event.baseQuantity) : null;
    const price = prices.resolve(asset, event.timestamp, implied);
    if (price === null || !(price > 0)) {
      state.skipped++;
      return;
    }

    let pnl = 0;
    let fee: number;
    let slippage: number;
    let netPnl: number;

    if (isEntryDirection(event.direction)) {
      fee = notional * feeRate;
      slippage = notional * slippageRate;
      let marginRequired = notional / leverage;
      const totalCost = marginRequired + fee + slippage;

      if (totalCost > state.cash) {
        // Scale down to what the remaining cash affords
        const affordable = totalCost > 0 ? Math.max(state.cash, 0) / totalCost : 0;
        notional *= affordable;
        fee = notional * feeRate;
        slippage = notional * slippageRate;
        marginRequired = notional / leverage;
      }
      if (!(notional > 0)) {
        state.skipped++;
        return;
      }

      const position = state.positions.get(asset) ?? emptyPosition();
      state.positions.set(asset, position);
      applyEntry(position, event.direction, notional / price, price, marginRequired);

      state.cash -= marginRequired + fee + slippage;
      netPnl = -(fee + slippage);
    } else {
      const position = state.positions.get(asset);
      const outcome = position ? applyClose(position, desiredNotional / price, price) : null;
      if (!outcome) {
        // Nothing open to close (copy started mid-position or duplicate close)
        state.skipped++;
        return;
      }

      notional = outcome.closedQuantity * price;
      fee = notional * feeRate;
      slippage = notional * slippageRate;
      pnl = outcome.pnl;
      netPnl = pnl - fee - slippage;

      state.cash += outcome.marginReleased + netPnl;
      state.grossPnl += pnl;
      state.closingTrades++;
      if (netPnl > 0) state.wins++;
    }

    state.totalFees += fee;
    state.totalSlippage += slippage;

    const { unrealized, equity } = equityAt(event.timestamp);
    state.trades.push({
      id: event.id,
      timestamp: toISO(event.timestamp),
      direction: event.direction,
      asset,
      notionalUsd: notional,
      pnlUsd: pnl,
      feeUsd: fee,
      slippageUsd: slippage,
      netPnlUsd: netPnl,
      cumulativePnlUsd: equity - initialDeposit,
      equityUsd: equity,
      unrealizedPnlUsd: unrealized,
      positionSizeBase: state.positions.get(asset)?.quantity ?? 0,
    });
  };

  const start = floorToMinute(replay[0].timestamp);
  const end = floorToMinute(replay[replay.length - 1].timestamp);
  const step = stepSizeMs(end - start);

  let cursor = 0;
  for (let bucket = start; bucket <= end; bucket += step) {
    const bucketEnd = bucket + step - 1;
    while (cursor < replay.length && replay[cursor].timestamp <= bucketEnd) {
      processEvent(replay[cursor]);
      cursor++;
    }

    const { unrealized, margin, equity } = equityAt(bucketEnd);
    state.equityCurve.push({
      timestamp: toISO(bucket),
      equityUsd: equity,
      unrealizedPnlUsd: unrealized,
      cashUsd: state.cash,
      marginUsd: margin,
    });
  }

  const finalEquity = state.equityCurve[state.equityCurve.length - 1].equityUsd;
  const netPnl = finalEquity - initialDeposit;
  const { maxDrawdownPercent, maxDrawdownUsd } = computeDrawdown(state.equityCurve);

  return {
    summary: {
      initialDepositUsd: initialDeposit,
      recommendedPositionPct: recommendedPct,
      usedPositionPct: usedPct,
      leverageUsed: leverage,
      assetSymbols: cfg.assetSymbols,
      totalFeesUsd: state.totalFees,
      totalSlippageUsd: state.totalSlippage,
      grossPnlUsd: state.grossPnl,
      netPnlUsd: netPnl,
      roiPercent: initialDeposit > 0 ? (netPnl / initialDeposit) * 100 : 0,
      tradesCopied: state.trades.length,
      tradesSkipped: state.skipped,
      closingTrades: state.closingTrades,
      winningTrades: state.wins,
      winRatePercent: state.closingTrades > 0 ? (state.wins / state.closingTrades) * 100 : null,
      maxDrawdownPercent,
      maxDrawdownUsd,
      start: toISO(replay[0].timestamp),
      end: toISO(replay[replay.length - 1].timestamp),
    },
    trades: state.trades,
    equityCurve: state.equityCurve,
    pricePoints,
  };
}

function floorToMinute(ms: number): number {
  return Math.floor(ms / MINUTE_MS) * MINUTE_MS;
}
