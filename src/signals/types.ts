/**
 * Consensus signal types
 */

export type SignalDirection = 'long' | 'short';

// Asset + direction agreed by enough accounts inside one window
export interface Signal {
  timestamp: number; // first contributor's entry, epoch ms
  asset: string;
  direction: SignalDirection;
  notionalUsd: number; // mean across contributors
  accountIds: string[];
}

export interface AggregationConfig {
  windowMs: number;
  minAccounts: number;
}

// Account id stamped on synthetic trade events built from signals
export const CONSENSUS_ACCOUNT_ID = 'consensus';
