/**
 * Live copy trading types
 */

import type { TradeDirection } from '../backtest/types.js';

// Fixed value or derived from the source account on every fill
export type SizingSetting = number | 'auto';

// Normalized provider fill
export interface Fill {
  time: number; // epoch ms
  asset: string;
  side: 'buy' | 'sell';
  direction: TradeDirection;
  size: number; // > 0
  price: number; // > 0
  realizedPnlUsd: number | null;
  providerId: string;
}

export interface AccountPosition {
  asset: string;
  signedSize: number;
  entryPrice: number | null;
  markPrice: number | null;
  unrealizedPnlUsd: number | null;
}

export interface AccountState {
  accountValueUsd: number | null;
  openPositions: AccountPosition[];
}

export interface AssetSizing {
  minSizeIncrement: number;
  priceIncrement: number;
}

export interface OrderRequest {
  asset: string;
  isBuy: boolean;
  size: number;
  limitPrice: number;
  reduceOnly: boolean;
  timeInForce: 'Ioc';
}

// Source-account reads
export interface CopyMarketData {
  fetchFills(address: string, since: number | null): Promise<Fill[]>;
  fetchAccountState(address: string): Promise<AccountState>;
}

// Side-effecting venue access for our own account
export interface TradingGateway {
  resolveAssetSizing(asset: string): Promise<AssetSizing>;
  submitOrder(order: OrderRequest): Promise<unknown>;
  updateLeverage(asset: string, leverage: number, isCross: boolean): Promise<unknown>;
}

export interface CopySession {
  id: string;
  address: string;
  accountId: string;
  runId: number | null;
  leverage: SizingSetting;
  positionSizePct: SizingSetting;
  userDepositUsd: number | null;
  assetSymbols: Set<string> | null;
  cursor: number;
  active: boolean;
  execute: boolean;
  isCross: boolean;
  // Source exposure at session start, by asset (signed size)
  preSessionPositions: Map<string, number>;
  seen: Map<string, number>; // providerId -> fill time
  lastLeverage: Map<string, number>;
  processed: number;
  errors: string[];
  notifications: string[];
  createdAt: string;
}

export interface CopySessionStatus {
  sessionId: string;
  active: boolean;
  processed: number;
  errors: string[];
  notifications: string[];
  cursor: number;
  execute: boolean;
  accountAddress: string;
  runId: number | null;
}

export interface CreateSessionInput {
  address: string;
  accountId: string;
  runId?: number | null;
  leverage: SizingSetting;
  positionSizePct: SizingSetting;
  userDepositUsd?: number | null;
  assetSymbols?: string[] | null;
  execute?: boolean;
  isCross?: boolean;
}
