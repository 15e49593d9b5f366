import express from 'express';
import cors from 'cors';
import { buildDashboard } from '../../src/domain/dashboard.js';
import type { Ledger, Transaction } from '../../src/domain/types.js';
import { transactionInputSchema } from './schemas.js';
import type { LedgerStore } from './store.js';

export function createApp(store: LedgerStore, initial: Ledger = store.load()) {
  // Single in-process ledger; replaced only after a successful save
  let ledger: Ledger = initial;

  const app = express();
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // GET /transactions - Full ledger in entry order
  app.get('/transactions', (_req, res) => {
    try {
      res.json(ledger);
    } catch (error) {
      console.error('[API] Error fetching transactions:', error);
      res.status(500).json({ error: 'Failed to fetch transactions' });
    }
  });

  // POST /transactions - Append one entry and rewrite the file
  app.post('/transactions', (req, res) => {
    const parsed = transactionInputSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid transaction',
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
      return;
    }

    const record: Transaction = { ...parsed.data };
    try {
      ledger = store.appendAndSave(ledger, record);
      res.status(201).json(record);
    } catch (error) {
      console.error('[API] Error saving transaction:', error);
      res.status(500).json({ error: error instanceof Error ? error.message : 'Failed to save transaction' });
    }
  });

  // GET /summary - Totals and chart series
  app.get('/summary', (_req, res) => {
    try {
      const { totals, chart } = buildDashboard(ledger);
      res.json({
        total_income: totals.income,
        total_expense: totals.expense,
        balance: totals.balance,
        chart,
      });
    } catch (error) {
      console.error('[API] Error computing summary:', error);
      res.status(500).json({ error: 'Failed to compute summary' });
    }
  });

  return app;
}
