import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../src/app';
import { createFileStore, type LedgerStore } from '../src/store';
import type { Ledger } from '../../src/domain/types';

let dir: string;
let server: Server | null = null;

async function start(store: LedgerStore, initial: Ledger = []): Promise<string> {
  const listening = createApp(store, initial).listen(0, '127.0.0.1');
  server = listening;
  await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
  const address = listening.address();
  if (address === null || typeof address === 'string') throw new Error('Server has no port');
  return `http://127.0.0.1:${address.port}`;
}

async function request(url: string, options?: RequestInit): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, {
    ...options,
    headers: { 'Content-Type': 'application/json', ...options?.headers },
  });
  return { status: response.status, body: await response.json() };
}

const entry = {
  date: '2025-01-15',
  type: 'รายจ่าย',
  category: 'ค่าอาหาร',
  description: ' ข้าวผัด ',
  amount: 55,
};

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-app-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  const running = server;
  server = null;
  if (running) {
    running.closeAllConnections();
    await new Promise<void>((resolve) => running.close(() => resolve()));
  }
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('POST /transactions', () => {
  it('stores the entry and answers 201 with it', async () => {
    const file = path.join(dir, 'transactions.csv');
    const base = await start(createFileStore(file));

    const created = await request(`${base}/transactions`, { method: 'POST', body: JSON.stringify(entry) });
    const stored = { ...entry, description: 'ข้าวผัด' };
    expect(created).toEqual({ status: 201, body: stored });

    const listed = await request(`${base}/transactions`);
    expect(listed).toEqual({ status: 200, body: [stored] });
    expect(createFileStore(file).load()).toEqual([stored]);
  });

  it('answers 400 with the failing fields', async () => {
    const base = await start(createFileStore(path.join(dir, 'transactions.csv')));

    const { status, body } = await request(`${base}/transactions`, {
      method: 'POST',
      body: JSON.stringify({ ...entry, description: '   ', amount: 0 }),
    });
    expect(status).toBe(400);
    expect(body).toMatchObject({ error: 'Invalid transaction' });
    const issues = typeof body === 'object' && body !== null && 'issues' in body ? body.issues : null;
    expect(Array.isArray(issues) ? issues.map((i: { path: string }) => i.path) : null).toEqual(['description', 'amount']);
  });

  it('answers 500 and keeps the ledger unchanged when saving fails', async () => {
    // the ledger path is a directory, so the write fails
    const base = await start(createFileStore(dir));

    const { status, body } = await request(`${base}/transactions`, { method: 'POST', body: JSON.stringify(entry) });
    expect(status).toBe(500);
    expect(body).toMatchObject({ error: expect.stringContaining('Failed to save ledger') });

    expect(await request(`${base}/transactions`)).toEqual({ status: 200, body: [] });
  });
});

describe('GET /summary', () => {
  it('returns totals and chart series', async () => {
    const base = await start(createFileStore(path.join(dir, 'transactions.csv')), [
      { date: '2025-01-01', type: 'รายรับ', category: 'เงินรายวัน', description: 'ค่าขนม', amount: 300 },
      { date: '2025-01-02', type: 'รายจ่าย', category: 'ค่าอาหาร', description: 'ข้าว', amount: 120 },
    ]);

    expect(await request(`${base}/summary`)).toEqual({
      status: 200,
      body: {
        total_income: 300,
        total_expense: 120,
        balance: 180,
        chart: { categories: ['เงินรายวัน', 'ค่าอาหาร'], income: [300, 0], expense: [0, 120] },
      },
    });
  });

  it('returns no chart for an empty ledger', async () => {
    const base = await start(createFileStore(path.join(dir, 'transactions.csv')));
    expect(await request(`${base}/summary`)).toEqual({
      status: 200,
      body: { total_income: 0, total_expense: 0, balance: 0, chart: null },
    });
  });
});
