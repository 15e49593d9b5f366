/**
 * Domain types for the ledger.
 * Pure data — no React, no file system, no HTTP.
 */

/** Marker stored in `Transaction.date` when a persisted date could not be parsed */
export const INVALID_DATE = 'invalid-date';

/** Income or expense, using the labels written to the ledger file */
export type TxType = 'รายรับ' | 'รายจ่าย';

/** One ledger entry as stored */
export interface Transaction {
  date: string;          // YYYY-MM-DD or INVALID_DATE
  type: string;          // a TxType, unless loaded from a malformed file
  category: string;
  description: string;
  amount: number;        // THB, non-negative
}

/** A candidate entry submitted from the form */
export interface TransactionInput {
  date: string;          // YYYY-MM-DD
  type: TxType;
  category: string;
  description: string;
  amount: number;
}

/** Full ordered collection of entries; insertion order is entry order */
export type Ledger = readonly Transaction[];

/** Category → summed amount, keys in first-appearance order */
export type CategorySums = ReadonlyMap<string, number>;

export interface Totals {
  income: number;
  expense: number;
  balance: number;      // can be negative
}

/** Aligned category axis with one income and one expense value per category */
export interface ChartSeries {
  categories: string[];
  income: number[];
  expense: number[];
}
