/**
 * Tracked accounts and their normalized trade history
 */

import { v4 as uuid } from 'uuid';
import { db, nowISO, type DatabaseClient } from '../db/client.js';
import type { TradeDirection, TradeEvent } from '../backtest/types.js';

export const DEFAULT_CHAIN = 'hyperliquid';

export interface Account {
  id: string;
  chain: string;
  address: string;
  label: string | null;
  createdAt: string;
  lastIngestAt: string | null;
}

interface AccountRow {
  id: string;
  chain: string;
  address: string;
  label: string | null;
  created_at: string;
  last_ingest_at: string | null;
}

interface TradeRow {
  id: number;
  account_id: string;
  timestamp: number;
  asset: string;
  direction: TradeDirection;
  base_quantity: number | null;
  value_usd: number | null;
  realized_pnl_usd: number | null;
}

export interface TradeQuery {
  start?: number | null;
  end?: number | null;
  assetSymbols?: string[] | null;
  maxTrades?: number | null;
}

function rowToAccount(row: AccountRow): Account {
  return {
    id: row.id,
    chain: row.chain,
    address: row.address,
    label: row.label,
    createdAt: row.created_at,
    lastIngestAt: row.last_ingest_at,
  };
}

function rowToTradeEvent(row: TradeRow): TradeEvent {
  return {
    id: String(row.id),
    timestamp: row.timestamp,
    accountId: row.account_id,
    asset: row.asset,
    direction: row.direction,
    baseQuantity: row.base_quantity,
    valueUsd: row.value_usd,
    realizedPnlUsd: row.realized_pnl_usd,
  };
}

export class AccountStore {
  constructor(private database: DatabaseClient = db) {}

  /**
   * Track an address (idempotent per chain + address)
   */
  track(address: string, label: string | null = null, chain = DEFAULT_CHAIN): Account {
    const existing = this.resolve(chain, address);
    if (existing) return existing;

    const id = uuid();
    this.database.run(
      'INSERT INTO accounts (id, chain, address, label, created_at) VALUES (?, ?, ?, ?, ?)',
      [id, chain.toLowerCase(), address.toLowerCase(), label, nowISO()]
    );
    const created = this.get(id);
    if (!created) throw new Error(`Failed to track account ${address}`);
    return created;
  }

  get(id: string): Account | null {
    const row = this.database.first<AccountRow>('SELECT * FROM accounts WHERE id = ?', [id]);
    return row ? rowToAccount(row) : null;
  }

  resolve(chain: string, address: string): Account | null {
    const row = this.database.first<AccountRow>(
      'SELECT * FROM accounts WHERE chain = ? AND lower(address) = ?',
      [chain.toLowerCase(), address.toLowerCase()]
    );
    return row ? rowToAccount(row) : null;
  }

  list(): Account[] {
    return this.database.all<AccountRow>('SELECT * FROM accounts ORDER BY created_at').map(rowToAccount);
  }

  markIngested(id: string, at: string = nowISO()): void {
    this.database.run('UPDATE accounts SET last_ingest_at = ? WHERE id = ?', [at, id]);
  }
}

export class TradeStore {
  constructor(private database: DatabaseClient = db) {}

  /**
   * Insert events, ignoring provider ids already stored; returns rows inserted
   */
  insertMany(accountId: string, events: TradeEvent[]): number {
    const stmt = this.database.get().prepare(`
      INSERT OR IGNORE INTO trades
        (account_id, timestamp, asset, direction, base_quantity, value_usd, realized_pnl_usd, provider_id)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    return this.database.transaction(() => {
      let inserted = 0;
      // Oldest first so row ids follow time
      for (const event of [...events].sort((a, b) => a.timestamp - b.timestamp)) {
        const result = stmt.run(
          accountId,
          event.timestamp,
          event.asset.toUpperCase(),
          event.direction,
          event.baseQuantity,
          event.valueUsd,
          event.realizedPnlUsd,
          event.id
        );
        inserted += result.changes;
      }
      return inserted;
    });
  }

  /**
   * Trades for one account ordered by time then insertion, deposits excluded
   */
  load(accountId: string, query: TradeQuery = {}): TradeEvent[] {
    const clauses = ['account_id = ?', "direction != 'deposit'"];
    const params: unknown[] = [accountId];

    if (query.start !== undefined && query.start !== null) {
      clauses.push('timestamp >= ?');
      params.push(query.start);
    }
    if (query.end !== undefined && query.end !== null) {
      clauses.push('timestamp <= ?');
      params.push(query.end);
    }
    if (query.assetSymbols?.length) {
      clauses.push(`asset IN (${query.assetSymbols.map(() => '?').join(', ')})`);
      params.push(...query.assetSymbols.map((a) => a.toUpperCase()));
    }

    let sql = `SELECT * FROM trades WHERE ${clauses.join(' AND ')} ORDER BY timestamp ASC, id ASC`;
    if (query.maxTrades) {
      sql += ' LIMIT ?';
      params.push(query.maxTrades);
    }

    return this.database.all<TradeRow>(sql, params).map(rowToTradeEvent);
  }

  /**
   * All-time entry notionals, for recommended sizing
   */
  entrySizes(accountId: string): number[] {
    return this.database
      .all<{ value_usd: number }>(
        `SELECT value_usd FROM trades
         WHERE account_id = ? AND direction IN ('buy', 'long', 'short') AND value_usd IS NOT NULL
         ORDER BY timestamp ASC`,
        [accountId]
      )
      .map((r) => Math.abs(r.value_usd));
  }

  distinctAssets(accountId: string): string[] {
    return this.database
      .all<{ asset: string }>('SELECT DISTINCT asset FROM trades WHERE account_id = ? ORDER BY asset', [accountId])
      .map((r) => r.asset);
  }

  latestTimestamp(accountId: string): number | null {
    const row = this.database.first<{ ts: number | null }>(
      'SELECT MAX(timestamp) AS ts FROM trades WHERE account_id = ?',
      [accountId]
    );
    return row?.ts ?? null;
  }
}

export const accountStore = new AccountStore();
export const tradeStore = new TradeStore();
