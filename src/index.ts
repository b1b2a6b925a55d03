/**
 * Whale Copier - Main Entry Point
 *
 * Starts the API server, the fill ingester and the live copier loop.
 */

import { db } from './db/client.js';
import { ingester } from './ingester/index.js';
import { copierManager, tradingClient } from './copier/index.js';
import { startServer } from './server/index.js';
import { config } from './config/index.js';

async function main() {
  console.log('');
  console.log('╔═══════════════════════════════════════════════════════╗');
  console.log('║           🐋 WHALE COPIER                             ║');
  console.log('║           Copy-trade Backtests & Live Sessions        ║');
  console.log('╚═══════════════════════════════════════════════════════╝');
  console.log('');

  // 1. Run database migrations
  console.log('📦 Running database migrations...');
  db.migrate();
  console.log(`   Database: ${db.getPath()}`);
  console.log('');

  // 2. Start API server
  console.log('🌐 Starting API server...');
  const server = startServer(config.serverPort);
  console.log('');

  // 3. Fill ingestion for tracked accounts
  if (config.ingest.enabled) {
    console.log(`⏱️  Starting fill ingestion (${config.ingest.pollIntervalMs / 1000}s interval)...`);
    ingester.start();
  } else {
    console.log('⏸️  Fill ingestion disabled');
  }

  // 4. Live copy sessions
  if (config.copier.enabled) {
    copierManager.start();
  } else {
    console.log('⏸️  Copier loop disabled');
  }
  console.log('');

  console.log('═══════════════════════════════════════════════════════════');
  console.log('');
  console.log(`  API:       http://localhost:${config.serverPort}`);
  console.log(`  Trading:   ${config.hyperliquid.address ?? 'no account'} (${tradingClient.hasSigner() ? 'signer ready' : 'dry run only'})`);
  console.log('');
  console.log('  Endpoints:');
  console.log('    POST /api/accounts                 - Track an account');
  console.log('    POST /api/backtest/copier          - Copy backtest');
  console.log('    POST /api/backtest/multi           - Consensus backtest');
  console.log('    GET  /api/backtest/runs            - Saved runs');
  console.log('    POST /api/copier/sessions          - Start a copy session');
  console.log('    GET  /api/copier/sessions          - Session statuses');
  console.log('');
  console.log('═══════════════════════════════════════════════════════════');
  console.log('');
  console.log('Press Ctrl+C to stop');
  console.log('');

  // Graceful shutdown
  const shutdown = () => {
    console.log('\n🛑 Shutting down...');
    copierManager.stop();
    ingester.stop();
    server.close();
    db.close();
    console.log('👋 Goodbye!');
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
