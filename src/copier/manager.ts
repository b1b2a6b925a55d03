import { v4 as uuid } from 'uuid';
import { clamp, clampLeverage, clampPositionPct } from '../backtest/metrics.js';
import { AddressBackoff } from './backoff.js';
import { buildIocOrder, exchangeLeverage } from './orders.js';
import { Throttle, type Clock } from './throttle.js';
import type {
  AccountState,
  CopyMarketData,
  CopySession,
  CopySessionStatus,
  CreateSessionInput,
  Fill,
  OrderRequest,
  SizingSetting,
  TradingGateway,
} from './types.js';

export interface CopierOptions {
  pollIntervalMs: number;
  leverageThrottleMs: number;
  accountStateTtlMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  maxSessionMessages: number;
  slippagePct: number;
}

const DEFAULT_OPTIONS: CopierOptions = {
  pollIntervalMs: 1000,
  leverageThrottleMs: 2000,
  accountStateTtlMs: 5000,
  backoffBaseMs: 2000,
  backoffMaxMs: 60_000,
  maxSessionMessages: 200,
  slippagePct: 1,
};

export interface CopierDeps {
  marketData: CopyMarketData;
  trading: TradingGateway;
  options?: Partial<CopierOptions>;
  now?: Clock;
}

export class SessionValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionValidationError';
  }
}

interface CachedAccountState {
  state: AccountState;
  fetchedAt: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function validateSizing(name: string, value: SizingSetting): void {
  if (value === 'auto') return;
  if (!Number.isFinite(value) || value < 0) {
    throw new SessionValidationError(`${name} must be a non-negative number or "auto"`);
  }
}

/**
 * Live Copy Session Manager
 * Polls each active session's source account for fills and mirrors them,
 * scaled and leverage-adjusted, through the trading gateway.
 */
export class CopierManager {
  private sessions = new Map<string, CopySession>();
  private accountStates = new Map<string, CachedAccountState>();
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private ticking = false;

  private readonly options: CopierOptions;
  private readonly marketData: CopyMarketData;
  private readonly trading: TradingGateway;
  private readonly now: Clock;
  private readonly backoff: AddressBackoff;
  private readonly leverageThrottle: Throttle;

  constructor(deps: CopierDeps) {
    this.options = { ...DEFAULT_OPTIONS, ...deps.options };
    this.marketData = deps.marketData;
    this.trading = deps.trading;
    this.now = deps.now ?? Date.now;
    this.backoff = new AddressBackoff(this.options.backoffBaseMs, this.options.backoffMaxMs, this.now);
    this.leverageThrottle = new Throttle(this.options.leverageThrottleMs, this.now);
  }

  /**
   * Start the shared polling loop
   */
  start(): void {
    if (this.intervalHandle) {
      console.warn('Copier already running');
      return;
    }

    console.log(`🐋 Starting copier loop with ${this.options.pollIntervalMs}ms interval`);
    this.intervalHandle = setInterval(() => {
      this.tick().catch(console.error);
    }, this.options.pollIntervalMs);
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    console.log('⏹️  Copier stopped');
  }

  isRunning(): boolean {
    return this.intervalHandle !== null;
  }

  /**
   * One pass over every active session; skipped while a previous pass runs
   */
  async tick(): Promise<void> {
    if (this.ticking) return;
    this.ticking = true;
    try {
      for (const session of [...this.sessions.values()]) {
        if (!session.active) continue;
        await this.processSession(session);
      }
    } finally {
      this.ticking = false;
    }
  }

  async createSession(input: CreateSessionInput): Promise<CopySessionStatus> {
    const address = input.address.trim();
    if (!address) throw new SessionValidationError('address is required');
    validateSizing('leverage', input.leverage);
    validateSizing('positionSizePct', input.positionSizePct);

    const userDepositUsd = input.userDepositUsd ?? null;
    if (input.positionSizePct === 'auto' && !(userDepositUsd !== null && userDepositUsd > 0)) {
      throw new SessionValidationError('userDepositUsd is required for auto position sizing');
    }

    const session: CopySession = {
      id: uuid(),
      address,
      accountId: input.accountId,
      runId: input.runId ?? null,
      leverage: input.leverage,
      positionSizePct: input.positionSizePct,
      userDepositUsd,
      assetSymbols: input.assetSymbols?.length
        ? new Set(input.assetSymbols.map((a) => a.toUpperCase()))
        : null,
      cursor: this.now(),
      active: true,
      execute: input.execute ?? false,
      isCross: input.isCross ?? true,
      preSessionPositions: new Map(),
      seen: new Map(),
      lastLeverage: new Map(),
      processed: 0,
      errors: [],
      notifications: [],
      createdAt: new Date(this.now()).toISOString(),
    };

    // Never replay history: start after the latest known fill
    try {
      const history = await this.marketData.fetchFills(address, null);
      if (history.length > 0) {
        session.cursor = history.reduce((latest, f) => Math.max(latest, f.time), -Infinity);
        for (const fill of history) session.seen.set(fill.providerId, fill.time);
        this.notify(session, `Skipping historical fills up to ${new Date(session.cursor).toISOString()}`);
      }
    } catch (error) {
      this.recordError(session, `history fetch error: ${errorMessage(error)}`);
    }

    try {
      const state = await this.marketData.fetchAccountState(address);
      this.accountStates.set(address.toLowerCase(), { state, fetchedAt: this.now() });
      for (const pos of state.openPositions) {
        if (pos.signedSize !== 0) session.preSessionPositions.set(pos.asset.toUpperCase(), pos.signedSize);
      }
      if (session.preSessionPositions.size > 0) {
        const summary = [...session.preSessionPositions]
          .map(([asset, size]) => `${asset}=${size}`)
          .join(', ');
        this.notify(session, `Detected pre-session open positions: ${summary}`);
      }
    } catch (error) {
      this.recordError(session, `account state error: ${errorMessage(error)}`);
    }

    this.sessions.set(session.id, session);
    console.log(`🐋 Copy session ${session.id} started for ${address} (${session.execute ? 'execute' : 'dry run'})`);
    return this.snapshot(session);
  }

  stopSession(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.active = false;
    return true;
  }

  status(id: string): CopySessionStatus | null {
    const session = this.sessions.get(id);
    return session ? this.snapshot(session) : null;
  }

  listStatuses(): CopySessionStatus[] {
    return [...this.sessions.values()].map((s) => this.snapshot(s));
  }

  async processSession(session: CopySession): Promise<void> {
    if (this.backoff.isBlocked(session.address)) return;

    let fills: Fill[];
    try {
      fills = await this.marketData.fetchFills(session.address, session.cursor);
      this.backoff.recordSuccess(session.address);
    } catch (error) {
      const windowMs = this.backoff.recordFailure(session.address);
      this.recordError(session, `fill fetch error: ${errorMessage(error)} (backing off ${windowMs}ms)`);
      return;
    }

    const fresh = fills
      .filter((f) => !session.seen.has(f.providerId) && f.time >= session.cursor)
      .sort((a, b) => a.time - b.time);

    for (const fill of fresh) {
      if (!session.active) break;
      // Duplicates inside one response
      if (session.seen.has(fill.providerId)) continue;
      await this.processFill(session, fill);
    }

    for (const [providerId, time] of session.seen) {
      if (time < session.cursor) session.seen.delete(providerId);
    }
  }

  private async processFill(session: CopySession, fill: Fill): Promise<void> {
    session.cursor = Math.max(session.cursor, fill.time);
    session.seen.set(fill.providerId, fill.time);

    const asset = fill.asset.toUpperCase();
    if (session.assetSymbols && !session.assetSymbols.has(asset)) return;
    const copySize = this.unwindPreSession(session, fill, asset);
    if (!(copySize > 0)) return;

    let positionPct: number;
    let leverage: number;
    try {
      positionPct = await this.resolvePositionPct(session);
      leverage = await this.resolveLeverage(session, fill);
    } catch (error) {
      this.recordError(session, `sizing error: ${errorMessage(error)}`);
      return;
    }

    const size = copySize * (positionPct / 100);
    if (!(size > 0)) return;

    if (session.execute) await this.maybeUpdateLeverage(session, asset, leverage);

    let order: OrderRequest | null;
    try {
      const sizing = await this.trading.resolveAssetSizing(asset);
      order = buildIocOrder(
        { asset, isBuy: fill.side === 'buy', size, referencePrice: fill.price },
        sizing,
        this.options.slippagePct
      );
    } catch (error) {
      this.recordError(session, `build order error: ${errorMessage(error)}`);
      return;
    }

    if (!order) {
      this.notify(session, `Skipped ${asset} fill: size ${size} rounds to zero`);
      return;
    }

    if (session.execute) {
      try {
        await this.trading.submitOrder(order);
      } catch (error) {
        this.recordError(session, `order error: ${errorMessage(error)}`);
      }
    } else {
      this.notify(
        session,
        `dry run: ${order.isBuy ? 'buy' : 'sell'} ${order.size} ${order.asset} @ ${order.limitPrice} (${leverage}x)`
      );
    }

    session.processed++;
  }

  /**
   * Fills that unwind exposure held before the session started are not copied.
   * Returns the part of the fill left to copy: all of it when it does not
   * reduce pre-session exposure, the excess when it crosses through zero.
   */
  private unwindPreSession(session: CopySession, fill: Fill, asset: string): number {
    const current = session.preSessionPositions.get(asset);
    if (current === undefined || current === 0) return fill.size;

    const signed = fill.side === 'buy' ? fill.size : -fill.size;
    if (Math.sign(signed) === Math.sign(current)) return fill.size;

    const next = current + signed;
    const flipped = Math.sign(next) !== Math.sign(current);
    const remaining = flipped ? 0 : next;
    if (remaining === 0) {
      session.preSessionPositions.delete(asset);
    } else {
      session.preSessionPositions.set(asset, remaining);
    }
    this.notify(session, `Ignored close for pre-session position ${asset} (remaining ${remaining.toFixed(4)})`);

    // Past zero the fill opens new exposure
    return flipped ? Math.abs(next) : 0;
  }

  private async resolvePositionPct(session: CopySession): Promise<number> {
    if (session.positionSizePct !== 'auto') return clampPositionPct(session.positionSizePct);

    const state = await this.accountState(session.address);
    const accountValue = state.accountValueUsd;
    if (accountValue === null || !(accountValue > 0)) {
      throw new Error('source account value unavailable');
    }
    return clampPositionPct(((session.userDepositUsd ?? 0) / accountValue) * 100);
  }

  private async resolveLeverage(session: CopySession, fill: Fill): Promise<number> {
    if (session.leverage !== 'auto') return clampLeverage(session.leverage);

    const state = await this.accountState(session.address);
    const accountValue = state.accountValueUsd;
    if (accountValue === null || !(accountValue > 0)) {
      throw new Error('source account value unavailable');
    }

    let openNotional = 0;
    for (const pos of state.openPositions) {
      const mark = pos.markPrice ?? pos.entryPrice ?? 0;
      openNotional += Math.abs(pos.signedSize) * mark;
    }
    if (openNotional <= 0) openNotional = fill.size * fill.price;

    return clamp(openNotional / accountValue, 0.1, 100);
  }

  private async maybeUpdateLeverage(session: CopySession, asset: string, leverage: number): Promise<void> {
    const applied = exchangeLeverage(leverage);
    if (session.lastLeverage.get(asset) === applied) return;

    const key = `${session.id}:${asset}`;
    if (!this.leverageThrottle.canRun(key)) return;
    this.leverageThrottle.touch(key);

    try {
      await this.trading.updateLeverage(asset, applied, session.isCross);
      session.lastLeverage.set(asset, applied);
    } catch (error) {
      this.recordError(session, `leverage error (ignored): ${errorMessage(error)}`);
    }
  }

  /**
   * Per-address account state, refreshed after the TTL
   */
  private async accountState(address: string): Promise<AccountState> {
    const key = address.toLowerCase();
    const cached = this.accountStates.get(key);
    if (cached && this.now() - cached.fetchedAt < this.options.accountStateTtlMs) {
      return cached.state;
    }
    if (this.backoff.isBlocked(address)) {
      throw new Error(`account state for ${address} in backoff`);
    }

    try {
      const state = await this.marketData.fetchAccountState(address);
      this.accountStates.set(key, { state, fetchedAt: this.now() });
      this.backoff.recordSuccess(address);
      return state;
    } catch (error) {
      this.backoff.recordFailure(address);
      throw error;
    }
  }

  private notify(session: CopySession, message: string): void {
    this.pushBounded(session.notifications, message);
  }

  private recordError(session: CopySession, message: string): void {
    this.pushBounded(session.errors, message);
  }

  private pushBounded(list: string[], message: string): void {
    list.push(message);
    if (list.length > this.options.maxSessionMessages) {
      list.splice(0, list.length - this.options.maxSessionMessages);
    }
  }

  private snapshot(session: CopySession): CopySessionStatus {
    return {
      sessionId: session.id,
      active: session.active,
      processed: session.processed,
      errors: [...session.errors],
      notifications: [...session.notifications],
      cursor: session.cursor,
      execute: session.execute,
      accountAddress: session.address,
      runId: session.runId,
    };
  }
}
