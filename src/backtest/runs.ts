import { db, nowISO, type DatabaseClient } from '../db/client.js';
import type { BacktestRun, BacktestSummary } from './types.js';

interface BacktestRunRow {
  id: number;
  account_id: string;
  created_at: string;
  leverage: number | null;
  position_size_pct: number | null;
  asset_symbols_json: string | null;
  win_rate_percent: number | null;
  trades_copied: number | null;
  max_drawdown_percent: number | null;
  max_drawdown_usd: number | null;
  initial_deposit_usd: number | null;
  net_pnl_usd: number | null;
  roi_percent: number | null;
}

function parseAssets(json: string | null): string[] | null {
  if (!json) return null;
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed.filter((a): a is string => typeof a === 'string') : null;
  } catch {
    return null;
  }
}

function rowToRun(row: BacktestRunRow): BacktestRun {
  return {
    id: row.id,
    accountId: row.account_id,
    createdAt: row.created_at,
    leverage: row.leverage,
    positionSizePct: row.position_size_pct,
    assetSymbols: parseAssets(row.asset_symbols_json),
    winRatePercent: row.win_rate_percent,
    tradesCopied: row.trades_copied,
    maxDrawdownPercent: row.max_drawdown_percent,
    maxDrawdownUsd: row.max_drawdown_usd,
    initialDepositUsd: row.initial_deposit_usd,
    netPnlUsd: row.net_pnl_usd,
    roiPercent: row.roi_percent,
  };
}

/**
 * Saved backtest runs
 */
export class BacktestRunStore {
  constructor(private database: DatabaseClient = db) {}

  save(accountId: string, summary: BacktestSummary): BacktestRun {
    const result = this.database.run(
      `INSERT INTO backtest_runs (
        account_id, created_at, leverage, position_size_pct, asset_symbols_json,
        win_rate_percent, trades_copied, max_drawdown_percent, max_drawdown_usd,
        initial_deposit_usd, net_pnl_usd, roi_percent
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        accountId,
        nowISO(),
        summary.leverageUsed,
        summary.usedPositionPct,
        summary.assetSymbols ? JSON.stringify(summary.assetSymbols) : null,
        summary.winRatePercent,
        summary.tradesCopied,
        summary.maxDrawdownPercent,
        summary.maxDrawdownUsd,
        summary.initialDepositUsd,
        summary.netPnlUsd,
        summary.roiPercent,
      ]
    );

    const run = this.get(Number(result.lastInsertRowid));
    if (!run) throw new Error('Failed to save backtest run');
    return run;
  }

  get(id: number): BacktestRun | null {
    const row = this.database.first<BacktestRunRow>('SELECT * FROM backtest_runs WHERE id = ?', [id]);
    return row ? rowToRun(row) : null;
  }

  list(accountId?: string): BacktestRun[] {
    const rows = accountId
      ? this.database.all<BacktestRunRow>(
          'SELECT * FROM backtest_runs WHERE account_id = ? ORDER BY id DESC',
          [accountId]
        )
      : this.database.all<BacktestRunRow>('SELECT * FROM backtest_runs ORDER BY id DESC');
    return rows.map(rowToRun);
  }
}

export const backtestRunStore = new BacktestRunStore();
