/**
 * Process-wide copier wiring
 */

import { hyperliquidClient } from '../api/hyperliquid.js';
import { HyperliquidTradingClient } from '../api/trading.js';
import { config } from '../config/index.js';
import { CopierManager } from './manager.js';

// No signer by default: execute-mode orders are recorded as session errors
export const tradingClient = new HyperliquidTradingClient({ info: hyperliquidClient });

export const copierManager = new CopierManager({
  marketData: hyperliquidClient,
  trading: tradingClient,
  options: {
    pollIntervalMs: config.copier.pollIntervalMs,
    leverageThrottleMs: config.copier.leverageThrottleMs,
    accountStateTtlMs: config.copier.accountStateTtlMs,
    backoffBaseMs: config.copier.backoffBaseMs,
    backoffMaxMs: config.copier.backoffMaxMs,
    maxSessionMessages: config.copier.maxSessionMessages,
    slippagePct: config.hyperliquid.slippagePct,
  },
});

export { CopierManager, SessionValidationError } from './manager.js';
export type { CopierOptions, CopierDeps } from './manager.js';
export type { CopySessionStatus, CreateSessionInput, SizingSetting } from './types.js';
