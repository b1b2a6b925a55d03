/**
 * Backtest Service
 *
 * Loads a tracked account's trades and price history, then replays them
 * through the copier simulator. Multi-account runs go through the
 * signal aggregator first.
 */

import { tradeStore, type TradeQuery, type TradeStore } from '../accounts/index.js';
import { config } from '../config/index.js';
import { PriceHistoryService } from '../prices/index.js';
import { aggregateSignals, signalsToTradeEvents, type Signal } from '../signals/index.js';
import { PriceResolver } from './prices.js';
import { DEFAULT_BACKTEST_CONFIG, simulateCopierBacktest } from './simulator.js';
import type { BacktestResult, CopierBacktestConfig, TradeEvent } from './types.js';

// Extra price history either side of the trade window
const PRICE_WINDOW_PAD_MS = 60 * 60 * 1000;

export type BacktestOptions = Partial<Omit<CopierBacktestConfig, 'entrySizesUsd'>> & TradeQuery;

export interface MultiAccountOptions extends BacktestOptions {
  windowMs: number;
  minAccounts: number;
}

export interface MultiAccountResult {
  signals: Signal[];
  result: BacktestResult;
}

function withDefaults(options: BacktestOptions): Partial<CopierBacktestConfig> {
  return {
    initialDepositUsd: options.initialDepositUsd ?? DEFAULT_BACKTEST_CONFIG.initialDepositUsd,
    leverage: options.leverage ?? 1,
    positionSizePct: options.positionSizePct ?? null,
    feeBps: options.feeBps ?? config.backtest.defaultFeeBps,
    slippageBps: options.slippageBps ?? config.backtest.defaultSlippageBps,
    assetSymbols: options.assetSymbols?.length ? options.assetSymbols.map((a) => a.toUpperCase()) : null,
    includePricePoints: options.includePricePoints ?? false,
  };
}

export class CopierBacktestService {
  constructor(
    private trades: TradeStore = tradeStore,
    private prices: PriceHistoryService | null = new PriceHistoryService()
  ) {}

  listAssets(accountId: string): string[] {
    return this.trades.distinctAssets(accountId);
  }

  /**
   * Single-account copy backtest; null when no trades match
   */
  async runForAccount(accountId: string, options: BacktestOptions = {}): Promise<BacktestResult | null> {
    const events = this.trades.load(accountId, options);
    if (events.length === 0) return null;

    const resolver = await this.loadPrices(events);
    return simulateCopierBacktest(
      events,
      { ...withDefaults(options), entrySizesUsd: this.trades.entrySizes(accountId) },
      resolver
    );
  }

  /**
   * Consensus backtest across accounts; null when none of them has trades
   */
  async runMultiAccount(accountIds: string[], options: MultiAccountOptions): Promise<MultiAccountResult | null> {
    const events = accountIds.flatMap((id) => this.trades.load(id, options));
    if (events.length === 0) return null;

    const signals = aggregateSignals(events, { windowMs: options.windowMs, minAccounts: options.minAccounts });
    const synthetic = signalsToTradeEvents(signals);
    const resolver = await this.loadPrices(synthetic);

    return {
      signals,
      result: simulateCopierBacktest(synthetic, withDefaults(options), resolver),
    };
  }

  private async loadPrices(events: TradeEvent[]): Promise<PriceResolver> {
    if (!this.prices || events.length === 0) return new PriceResolver();

    const assets = [...new Set(events.map((e) => e.asset.toUpperCase()))];
    // Consensus events are not in time order
    let first = events[0].timestamp;
    let last = first;
    for (const event of events) {
      if (event.timestamp < first) first = event.timestamp;
      if (event.timestamp > last) last = event.timestamp;
    }
    const from = first - PRICE_WINDOW_PAD_MS;
    const to = last + PRICE_WINDOW_PAD_MS;

    await this.prices.ensureSeries(assets, from, to);
    return new PriceResolver(await this.prices.loadSeries(assets, from, to));
  }
}

export const copierBacktestService = new CopierBacktestService();

export { simulateCopierBacktest, DEFAULT_BACKTEST_CONFIG } from './simulator.js';
export { PriceResolver } from './prices.js';
export { BacktestRunStore, backtestRunStore } from './runs.js';
export { formatSummary } from './metrics.js';
export type {
  BacktestResult,
  BacktestRun,
  BacktestSummary,
  CopierBacktestConfig,
  EquityPoint,
  TradeDirection,
  TradeEvent,
  TradeResult,
} from './types.js';
