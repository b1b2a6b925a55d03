/**
 * Express API Server
 *
 * Tracked accounts, copier backtests, saved runs and live copy sessions.
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { ZodError } from 'zod';
import { accountStore, type Account } from '../accounts/index.js';
import { backtestRunStore, copierBacktestService, formatSummary } from '../backtest/index.js';
import { copierManager, SessionValidationError, type SizingSetting } from '../copier/index.js';
import { config } from '../config/index.js';
import {
  assetsQuerySchema,
  copierBacktestSchema,
  createSessionSchema,
  multiBacktestSchema,
  runsQuerySchema,
  trackAccountSchema,
} from './schemas.js';

const app = express();

app.use(cors());
app.use(express.json());

const NO_TRADES = 'No trades available for backtest';

function sendError(res: Response, error: unknown): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request', issues: error.issues });
    return;
  }
  if (error instanceof SessionValidationError) {
    res.status(400).json({ error: error.message });
    return;
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  res.status(500).json({ error: message });
}

/**
 * POST /api/accounts
 * Track an account for ingestion
 */
app.post('/api/accounts', (req: Request, res: Response) => {
  try {
    const body = trackAccountSchema.parse(req.body);
    const account = accountStore.track(body.address, body.label ?? null, body.chain);
    res.status(201).json(account);
  } catch (error: unknown) {
    sendError(res, error);
  }
});

/**
 * GET /api/accounts
 */
app.get('/api/accounts', (_req: Request, res: Response) => {
  try {
    const accounts = accountStore.list();
    res.json({ accounts, count: accounts.length });
  } catch (error: unknown) {
    sendError(res, error);
  }
});

/**
 * POST /api/backtest/copier
 * Single-account copy backtest, optionally saved as a run
 */
app.post('/api/backtest/copier', async (req: Request, res: Response) => {
  try {
    const body = copierBacktestSchema.parse(req.body);
    const account = accountStore.resolve(body.chain, body.address);
    if (!account) {
      res.status(404).json({ error: 'Account not found' });
      return;
    }

    const result = await copierBacktestService.runForAccount(account.id, body);
    if (!result) {
      res.status(404).json({ error: NO_TRADES });
      return;
    }

    const run = body.save ? backtestRunStore.save(account.id, result.summary) : null;
    if (run) console.log(`💾 Saved run ${run.id} for ${account.address}\n${formatSummary(result.summary)}`);
    const offset = (body.page - 1) * body.pageSize;

    res.json({
      runId: run?.id ?? null,
      summary: result.summary,
      trades: result.trades.slice(offset, offset + body.pageSize),
      totalTrades: result.trades.length,
      page: body.page,
      pageSize: body.pageSize,
      equityCurve: result.equityCurve,
      pricePoints: result.pricePoints,
    });
  } catch (error: unknown) {
    sendError(res, error);
  }
});

/**
 * POST /api/backtest/multi
 * Consensus backtest across several accounts
 */
app.post('/api/backtest/multi', async (req: Request, res: Response) => {
  try {
    const body = multiBacktestSchema.parse(req.body);

    const accounts: Account[] = [];
    for (const address of body.addresses) {
      const account = accountStore.resolve(body.chain, address);
      if (!account) {
        res.status(404).json({ error: `Account not found: ${address}` });
        return;
      }
      accounts.push(account);
    }

    const outcome = await copierBacktestService.runMultiAccount(
      accounts.map((a) => a.id),
      { ...body, windowMs: body.windowMinutes * 60 * 1000 }
    );
    if (!outcome) {
      res.status(404).json({ error: NO_TRADES });
      return;
    }

    res.json({
      signals: outcome.signals.map((s) => ({ ...s, timestamp: new Date(s.timestamp).toISOString() })),
      ...outcome.result,
    });
  } catch (error: unknown) {
    sendError(res, error);
  }
});

/**
 * GET /api/backtest/assets?chain&address
 */
app.get('/api/backtest/assets', (req: Request, res: Response) => {
  try {
    const query = assetsQuerySchema.parse(req.query);
    const account = accountStore.resolve(query.chain, query.address);
    if (!account) {
      res.status(404).json({ error: 'Account not found' });
      return;
    }
    res.json({ assets: copierBacktestService.listAssets(account.id) });
  } catch (error: unknown) {
    sendError(res, error);
  }
});

/**
 * GET /api/backtest/runs?accountId
 */
app.get('/api/backtest/runs', (req: Request, res: Response) => {
  try {
    const query = runsQuerySchema.parse(req.query);
    const runs = backtestRunStore.list(query.accountId);
    res.json({ runs, count: runs.length });
  } catch (error: unknown) {
    sendError(res, error);
  }
});

/**
 * GET /api/backtest/runs/:id
 */
app.get('/api/backtest/runs/:id', (req: Request, res: Response) => {
  try {
    const id = Number(req.params.id);
    const run = Number.isInteger(id) ? backtestRunStore.get(id) : null;
    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }
    res.json(run);
  } catch (error: unknown) {
    sendError(res, error);
  }
});

/**
 * POST /api/copier/sessions
 * Start a live copy session from a saved run and/or explicit settings
 */
app.post('/api/copier/sessions', async (req: Request, res: Response) => {
  try {
    const body = createSessionSchema.parse(req.body);

    const run = body.runId ? backtestRunStore.get(body.runId) : null;
    if (body.runId && !run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }

    const account = run ? accountStore.get(run.accountId) : accountStore.resolve(body.chain, body.address ?? '');
    if (!account) {
      res.status(404).json({ error: 'Account not found' });
      return;
    }

    const leverage: SizingSetting = body.leverage ?? run?.leverage ?? 1;
    const positionSizePct: SizingSetting = body.positionSizePct ?? run?.positionSizePct ?? 100;

    const status = await copierManager.createSession({
      address: account.address,
      accountId: account.id,
      runId: run?.id ?? null,
      leverage,
      positionSizePct,
      userDepositUsd: body.userDepositUsd ?? run?.initialDepositUsd ?? null,
      assetSymbols: body.assetSymbols ?? run?.assetSymbols ?? null,
      execute: body.execute,
      isCross: body.isCross,
    });
    res.status(201).json(status);
  } catch (error: unknown) {
    sendError(res, error);
  }
});

/**
 * GET /api/copier/sessions
 */
app.get('/api/copier/sessions', (_req: Request, res: Response) => {
  const sessions = copierManager.listStatuses();
  res.json({ sessions, count: sessions.length });
});

/**
 * GET /api/copier/sessions/:id
 */
app.get('/api/copier/sessions/:id', (req: Request, res: Response) => {
  const status = copierManager.status(req.params.id);
  if (!status) {
    res.status(404).json({ error: 'Session not found' });
    return;
  }
  res.json(status);
});

/**
 * POST /api/copier/sessions/:id/stop
 */
app.post('/api/copier/sessions/:id/stop', (req: Request, res: Response) => {
  if (!copierManager.stopSession(req.params.id)) {
    res.status(404).json({ error: 'Session not found' });
    return;
  }
  res.json(copierManager.status(req.params.id));
});

// Error handler (malformed JSON and anything thrown outside a route's try)
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }
  console.error('API Error:', err);
  sendError(res, err);
});

/**
 * Start the server
 */
export function startServer(port?: number): ReturnType<typeof app.listen> {
  const serverPort = port || config.serverPort;
  return app.listen(serverPort, () => {
    console.log(`🚀 API server running on http://localhost:${serverPort}`);
  });
}

export { app };
