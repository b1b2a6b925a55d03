/**
 * Application configuration
 * All configurable values in one place
 */

import { z } from 'zod';

const configSchema = z.object({
  // Server
  serverPort: z.number().int().positive(),
  dbPath: z.string().min(1).nullable(), // null = data/whales.db under the project root

  // Hyperliquid info/exchange API
  hyperliquid: z.object({
    apiUrl: z.string().url(),
    maxRps: z.number().positive(),
    slippagePct: z.number().min(0).max(50), // price nudge against the taker
    address: z.string().nullable(), // our own trading account
  }),

  // Public kline endpoint used for 1m price history
  binanceApiUrl: z.string().url(),

  // Fill ingestion for tracked accounts
  ingest: z.object({
    enabled: z.boolean(),
    pollIntervalMs: z.number().int().positive(),
  }),

  // Live copy sessions
  copier: z.object({
    enabled: z.boolean(),
    pollIntervalMs: z.number().int().positive(),
    leverageThrottleMs: z.number().int().nonnegative(),
    accountStateTtlMs: z.number().int().nonnegative(),
    backoffBaseMs: z.number().int().positive(),
    backoffMaxMs: z.number().int().positive(),
    maxSessionMessages: z.number().int().positive(), // errors/notifications kept per session
  }),

  // Backtest defaults
  backtest: z.object({
    defaultFeeBps: z.number().min(0),
    defaultSlippageBps: z.number().min(0),
  }),
});

export type Config = z.infer<typeof configSchema>;

function envNumber(name: string, fallback: string): number {
  return Number(process.env[name] || fallback);
}

// Default configuration
export const config: Config = configSchema.parse({
  serverPort: envNumber('PORT', '8000'),
  dbPath: process.env.DB_PATH || null,

  hyperliquid: {
    apiUrl: process.env.HYPERLIQUID_API_URL || 'https://api.hyperliquid.xyz',
    maxRps: envNumber('HYPERLIQUID_MAX_RPS', '3'),
    slippagePct: envNumber('HYPERLIQUID_SLIPPAGE_PCT', '1'),
    address: process.env.HYPERLIQUID_ADDRESS || null,
  },

  binanceApiUrl: process.env.BINANCE_API_URL || 'https://api.binance.com',

  ingest: {
    enabled: process.env.ENABLE_INGESTER !== 'false',
    pollIntervalMs: envNumber('INGEST_INTERVAL_MS', '300000'), // 5 minutes
  },

  copier: {
    enabled: process.env.ENABLE_COPIER !== 'false',
    pollIntervalMs: envNumber('COPIER_POLL_INTERVAL_MS', '1000'),
    leverageThrottleMs: envNumber('LEVERAGE_THROTTLE_MS', '2000'),
    accountStateTtlMs: envNumber('ACCOUNT_STATE_TTL_MS', '5000'),
    backoffBaseMs: envNumber('BACKOFF_BASE_MS', '2000'),
    backoffMaxMs: envNumber('BACKOFF_MAX_MS', '60000'),
    maxSessionMessages: envNumber('MAX_SESSION_MESSAGES', '200'),
  },

  backtest: {
    defaultFeeBps: envNumber('DEFAULT_FEE_BPS', '4.5'), // taker fee
    defaultSlippageBps: envNumber('DEFAULT_SLIPPAGE_BPS', '5'),
  },
});

export default config;
