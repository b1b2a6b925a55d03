import { hyperliquidClient, type HyperliquidClient } from '../api/hyperliquid.js';
import { fillToTradeEvent, normalizeFills } from '../api/normalize.js';
import { accountStore, tradeStore, type Account, type AccountStore, type TradeStore } from '../accounts/index.js';
import { config } from '../config/index.js';

export interface IngestStats {
  accountsProcessed: number;
  fillsFetched: number;
  tradesInserted: number;
  errors: string[];
  durationMs: number;
}

export interface IngesterDeps {
  client?: HyperliquidClient;
  accounts?: AccountStore;
  trades?: TradeStore;
}

/**
 * Ingester Service
 * Polls tracked accounts' fills and stores them as normalized trades
 */
export class Ingester {
  private running = false;
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private intervalMs: number;
  private onCycleComplete?: (stats: IngestStats) => void;
  private client: HyperliquidClient;
  private accounts: AccountStore;
  private trades: TradeStore;

  constructor(intervalMs?: number, deps: IngesterDeps = {}) {
    this.intervalMs = intervalMs || config.ingest.pollIntervalMs;
    this.client = deps.client ?? hyperliquidClient;
    this.accounts = deps.accounts ?? accountStore;
    this.trades = deps.trades ?? tradeStore;
  }

  setOnCycleComplete(callback: (stats: IngestStats) => void): void {
    this.onCycleComplete = callback;
  }

  /**
   * Start continuous polling
   */
  start(): void {
    if (this.running) {
      console.warn('Ingester already running');
      return;
    }

    this.running = true;
    console.log(`🔄 Starting ingester with ${this.intervalMs / 1000}s interval`);

    // Run immediately, then on interval
    this.runCycle().catch(console.error);
    this.intervalHandle = setInterval(() => {
      this.runCycle().catch(console.error);
    }, this.intervalMs);
  }

  stop(): void {
    this.running = false;
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    console.log('⏹️  Ingester stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run a single ingest cycle over every tracked account
   */
  async runCycle(): Promise<IngestStats> {
    const startTime = Date.now();
    const stats: IngestStats = {
      accountsProcessed: 0,
      fillsFetched: 0,
      tradesInserted: 0,
      errors: [],
      durationMs: 0,
    };

    for (const account of this.accounts.list()) {
      try {
        await this.ingestAccount(account, stats);
      } catch (error) {
        // Counted, not logged one by one
        stats.errors.push(`${account.address}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    stats.durationMs = Date.now() - startTime;

    const errorSuffix = stats.errors.length > 0 ? ` (${stats.errors.length} errors)` : '';
    console.log(
      `✅ Ingest complete: ${stats.accountsProcessed} accounts, ` +
      `${stats.tradesInserted}/${stats.fillsFetched} new fills in ${stats.durationMs}ms${errorSuffix}`
    );

    if (this.onCycleComplete) {
      this.onCycleComplete(stats);
    }

    return stats;
  }

  /**
   * First ingest walks the full history; later ones start at the newest stored trade
   */
  async ingestAccount(account: Account, stats: IngestStats): Promise<void> {
    const latest = this.trades.latestTimestamp(account.id);
    const raw =
      latest === null
        ? await this.client.getUserFillsPaginated(account.address)
        : await this.client.getUserFills(account.address, latest);

    const events = normalizeFills(raw).map((fill) => fillToTradeEvent(fill, account.id));
    stats.fillsFetched += events.length;
    stats.tradesInserted += this.trades.insertMany(account.id, events);
    stats.accountsProcessed++;

    this.accounts.markIngested(account.id);
  }
}

// Singleton instance
export const ingester = new Ingester();
