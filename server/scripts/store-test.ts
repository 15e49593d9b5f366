import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createFileStore, LedgerWriteError } from '../src/store';
import { INVALID_DATE, type Transaction } from '../../src/domain/types';

function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
  return {
    date: '2025-02-01',
    type: 'รายจ่าย',
    category: 'ค่าอาหาร',
    description: 'ก๋วยเตี๋ยว',
    amount: 60,
    ...overrides,
  };
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-test-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('createFileStore', () => {
  it('loads an empty ledger when the file is missing', () => {
    expect(createFileStore(path.join(dir, 'missing.csv')).load()).toEqual([]);
  });

  it('loads an empty ledger from a zero-byte file', () => {
    const file = path.join(dir, 'empty.csv');
    fs.writeFileSync(file, '');
    expect(createFileStore(file).load()).toEqual([]);
  });

  it('keeps entry order across appends and reloads', () => {
    const file = path.join(dir, 'nested', 'transactions.csv');
    const store = createFileStore(file);

    let ledger = store.load();
    for (let i = 1; i <= 5; i++) {
      ledger = store.appendAndSave(ledger, makeTxn({ description: `entry ${i}`, amount: i * 10 }));
    }

    const reloaded = createFileStore(file).load();
    expect(reloaded).toHaveLength(5);
    expect(reloaded.map((t) => t.description)).toEqual(['entry 1', 'entry 2', 'entry 3', 'entry 4', 'entry 5']);
    expect(reloaded).toEqual(ledger);
  });

  it('returns a new ledger and leaves the old one untouched', () => {
    const store = createFileStore(path.join(dir, 'transactions.csv'));
    const before = [makeTxn()];
    const after = store.appendAndSave(before, makeTxn({ amount: 1 }));
    expect(before).toHaveLength(1);
    expect(after).toHaveLength(2);
  });

  it('rewrites the whole file as UTF-8 with a BOM', () => {
    const file = path.join(dir, 'transactions.csv');
    const store = createFileStore(file);
    store.appendAndSave([], makeTxn());

    const bytes = fs.readFileSync(file);
    expect(Array.from(bytes.subarray(0, 3))).toEqual([0xef, 0xbb, 0xbf]);
    expect(bytes.toString('utf8').slice(1)).toBe(
      'วันที่,ประเภท,หมวดหมู่,รายละเอียด,จำนวนเงิน\n2025-02-01,รายจ่าย,ค่าอาหาร,ก๋วยเตี๋ยว,60\n',
    );
  });

  it('keeps rows with unreadable dates', () => {
    const file = path.join(dir, 'transactions.csv');
    fs.writeFileSync(file, 'วันที่,ประเภท,หมวดหมู่,รายละเอียด,จำนวนเงิน\n??,รายรับ,เงินรายวัน,x,5\n');
    expect(createFileStore(file).load()).toEqual([
      { date: INVALID_DATE, type: 'รายรับ', category: 'เงินรายวัน', description: 'x', amount: 5 },
    ]);
  });

  it('throws LedgerWriteError when the file cannot be written', () => {
    // the target path is a directory
    const store = createFileStore(dir);
    expect(() => store.appendAndSave([], makeTxn())).toThrow(LedgerWriteError);
  });
});
