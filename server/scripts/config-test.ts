import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { transactionInputSchema } from '../src/schemas';

describe('loadConfig', () => {
  it('defaults to port 8787 and the bundled data file', () => {
    const config = loadConfig({});
    expect(config.port).toBe(8787);
    expect(config.ledgerFile.endsWith(path.join('server', 'data', 'transactions.csv'))).toBe(true);
  });

  it('reads PORT and resolves LEDGER_FILE', () => {
    const config = loadConfig({ PORT: '9000', LEDGER_FILE: 'ledger.csv' });
    expect(config).toEqual({ port: 9000, ledgerFile: path.resolve('ledger.csv') });
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/Invalid server configuration/);
  });
});

describe('transactionInputSchema', () => {
  const valid = {
    date: '2025-01-15',
    type: 'รายจ่าย',
    category: 'ค่าเดินทาง',
    description: ' BTS ',
    amount: 44,
  };

  it('accepts a valid entry and trims the description', () => {
    const parsed = transactionInputSchema.safeParse(valid);
    expect(parsed.success).toBe(true);
    expect(parsed.data?.description).toBe('BTS');
  });

  it('rejects a category from the other type', () => {
    const parsed = transactionInputSchema.safeParse({ ...valid, category: 'เงินรายวัน' });
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues.map((i) => i.path.join('.'))).toEqual(['category']);
  });

  it('rejects blank descriptions and non-positive amounts', () => {
    expect(transactionInputSchema.safeParse({ ...valid, description: '   ' }).success).toBe(false);
    expect(transactionInputSchema.safeParse({ ...valid, amount: 0 }).success).toBe(false);
    expect(transactionInputSchema.safeParse({ ...valid, amount: -5 }).success).toBe(false);
  });

  it('rejects unknown types and malformed dates', () => {
    expect(transactionInputSchema.safeParse({ ...valid, type: 'income' }).success).toBe(false);
    expect(transactionInputSchema.safeParse({ ...valid, date: '15/01/2025' }).success).toBe(false);
  });

  it('rejects dates that do not exist on the calendar', () => {
    const parsed = transactionInputSchema.safeParse({ ...valid, date: '2025-02-30' });
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues.map((i) => i.path.join('.'))).toEqual(['date']);
    expect(transactionInputSchema.safeParse({ ...valid, date: '2024-02-29' }).success).toBe(true);
  });
});
