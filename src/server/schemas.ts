/**
 * Request body / query schemas
 */

import { z } from 'zod';
import { DEFAULT_CHAIN } from '../accounts/index.js';

const isoToMs = z
  .string()
  .datetime({ offset: true })
  .transform((value) => Date.parse(value));

const assetList = z
  .array(z.string().min(1))
  .transform((assets) => assets.map((a) => a.toUpperCase()));

const sizing = z.union([z.literal('auto'), z.number().finite().nonnegative()]);

export const trackAccountSchema = z.object({
  chain: z.string().min(1).default(DEFAULT_CHAIN),
  address: z.string().trim().min(1),
  label: z.string().nullable().optional(),
});

const backtestOptionsSchema = z.object({
  initialDepositUsd: z.number().positive().default(10_000),
  leverage: z.number().finite().positive().default(1),
  positionSizePct: z.number().finite().nonnegative().nullable().optional(),
  feeBps: z.number().nonnegative().optional(),
  slippageBps: z.number().nonnegative().optional(),
  assetSymbols: assetList.nullable().optional(),
  start: isoToMs.nullable().optional(),
  end: isoToMs.nullable().optional(),
  maxTrades: z.number().int().positive().nullable().optional(),
  includePricePoints: z.boolean().default(false),
});

export const copierBacktestSchema = backtestOptionsSchema.extend({
  chain: z.string().min(1).default(DEFAULT_CHAIN),
  address: z.string().trim().min(1),
  save: z.boolean().default(false),
  page: z.number().int().positive().default(1),
  pageSize: z.number().int().positive().max(5000).default(500),
});

export const multiBacktestSchema = backtestOptionsSchema.extend({
  chain: z.string().min(1).default(DEFAULT_CHAIN),
  addresses: z.array(z.string().trim().min(1)).min(1),
  windowMinutes: z.number().positive().default(5),
  minAccounts: z.number().int().positive().default(2),
});

export const assetsQuerySchema = z.object({
  chain: z.string().min(1).default(DEFAULT_CHAIN),
  address: z.string().trim().min(1),
});

export const runsQuerySchema = z.object({
  accountId: z.string().min(1).optional(),
});

export const createSessionSchema = z
  .object({
    runId: z.number().int().positive().nullable().optional(),
    chain: z.string().min(1).default(DEFAULT_CHAIN),
    address: z.string().trim().min(1).optional(),
    leverage: sizing.optional(),
    positionSizePct: sizing.optional(),
    userDepositUsd: z.number().positive().nullable().optional(),
    assetSymbols: assetList.nullable().optional(),
    execute: z.boolean().default(false),
    isCross: z.boolean().default(true),
  })
  .refine((body) => body.runId || body.address, {
    message: 'runId or address is required',
    path: ['runId'],
  });

export type CopierBacktestRequest = z.infer<typeof copierBacktestSchema>;
export type MultiBacktestRequest = z.infer<typeof multiBacktestSchema>;
export type CreateSessionRequest = z.infer<typeof createSessionSchema>;
