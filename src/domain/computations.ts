/**
 * Pure ledger computations.
 * No React, no file system, no IO — only data in, data out.
 */
import { TX_TYPES } from './categories';
import type { CategorySums, Ledger, Transaction } from './types';

/**
 * Partition the ledger into income and expense records, keeping entry order.
 * Records with any other type land in neither list, so they never reach a total.
 */
export function splitByType(ledger: Ledger): { income: Transaction[]; expense: Transaction[] } {
  const income: Transaction[] = [];
  const expense: Transaction[] = [];
  for (const t of ledger) {
    if (t.type === TX_TYPES.INCOME) income.push(t);
    else if (t.type === TX_TYPES.EXPENSE) expense.push(t);
  }
  return { income, expense };
}

/** Sum of amounts; 0 for no records */
export function total(records: readonly Transaction[]): number {
  return records.reduce((sum, t) => sum + t.amount, 0);
}

/** Income minus expense; negative when spending exceeds income */
export function balance(incomeTotal: number, expenseTotal: number): number {
  return incomeTotal - expenseTotal;
}

/** Amount per category, only for categories that have records */
export function sumByCategory(records: readonly Transaction[]): CategorySums {
  const map = new Map<string, number>();
  for (const t of records) {
    map.set(t.category, (map.get(t.category) || 0) + t.amount);
  }
  return map;
}
