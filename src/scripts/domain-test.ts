import { describe, it, expect } from 'vitest';
import { balance, splitByType, sumByCategory, total } from '../domain/computations';
import { allTxTypes, categoryOptions, defaultCategory, isCategoryOf, isTxType, TX_TYPES } from '../domain/categories';
import { buildDashboard } from '../domain/dashboard';
import {
  canSubmit,
  changeType,
  entryFormReducer,
  initialDraft,
  initialFormState,
  resetAfterSubmit,
  toTransactionInput,
} from '../domain/entryForm';
import { formatBaht, formatDisplayDate, todayIso } from '../domain/format';
import { INVALID_DATE, type Transaction } from '../domain/types';

// --- Test data factories ---

function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
  return {
    date: '2025-01-15',
    type: TX_TYPES.EXPENSE,
    category: 'ค่าอาหาร',
    description: 'ข้าวมันไก่',
    amount: 50,
    ...overrides,
  };
}

describe('total', () => {
  it('is 0 for no records', () => {
    expect(total([])).toBe(0);
  });

  it('sums amounts', () => {
    expect(total([makeTxn({ amount: 10 }), makeTxn({ amount: 5.5 })])).toBe(15.5);
  });
});

describe('balance', () => {
  it('subtracts expense from income', () => {
    expect(balance(1000, 250)).toBe(750);
  });

  it('goes negative when expenses exceed income', () => {
    expect(balance(100, 400)).toBe(-300);
  });
});

describe('splitByType', () => {
  it('partitions by type and keeps entry order', () => {
    const ledger = [
      makeTxn({ description: 'e1' }),
      makeTxn({ type: TX_TYPES.INCOME, category: 'เงินรายวัน', description: 'i1' }),
      makeTxn({ description: 'e2' }),
      makeTxn({ type: TX_TYPES.INCOME, category: 'รายได้อื่นๆ', description: 'i2' }),
    ];
    const { income, expense } = splitByType(ledger);
    expect(income.map((t) => t.description)).toEqual(['i1', 'i2']);
    expect(expense.map((t) => t.description)).toEqual(['e1', 'e2']);
  });

  it('drops records with an unknown type from both sides', () => {
    const { income, expense } = splitByType([makeTxn({ type: 'โอนเงิน' }), makeTxn({ type: '' })]);
    expect(income).toEqual([]);
    expect(expense).toEqual([]);
  });
});

describe('sumByCategory', () => {
  it('sums per category in first-appearance order', () => {
    const sums = sumByCategory([
      makeTxn({ category: 'ค่าเดินทาง', amount: 30 }),
      makeTxn({ category: 'ค่าอาหาร', amount: 50 }),
      makeTxn({ category: 'ค่าเดินทาง', amount: 12.5 }),
    ]);
    expect(Array.from(sums.entries())).toEqual([
      ['ค่าเดินทาง', 42.5],
      ['ค่าอาหาร', 50],
    ]);
  });

  it('has no key for categories without records', () => {
    const sums = sumByCategory([makeTxn({ category: 'ค่าอาหาร', amount: 20 })]);
    expect(sums.has('ค่าเดินทาง')).toBe(false);
    expect(sums.size).toBe(1);
  });

  it('groups empty categories together', () => {
    const sums = sumByCategory([makeTxn({ category: '', amount: 5 }), makeTxn({ category: '', amount: 7 })]);
    expect(sums.get('')).toBe(12);
  });

  it('is empty for no records', () => {
    expect(sumByCategory([]).size).toBe(0);
  });
});

describe('category catalog', () => {
  it('offers two income and three expense categories', () => {
    expect(categoryOptions(TX_TYPES.INCOME)).toEqual(['เงินรายวัน', 'รายได้อื่นๆ']);
    expect(categoryOptions(TX_TYPES.EXPENSE)).toEqual(['ค่าอาหาร', 'ค่าเดินทาง', 'ค่าใช้จ่ายอื่นๆ']);
  });

  it('uses the first option as default', () => {
    for (const type of allTxTypes()) {
      expect(defaultCategory(type)).toBe(categoryOptions(type)[0]);
      expect(categoryOptions(type)).toContain(defaultCategory(type));
    }
  });

  it('never offers a category under both types', () => {
    for (const cat of categoryOptions(TX_TYPES.INCOME)) {
      expect(isCategoryOf(TX_TYPES.EXPENSE, cat)).toBe(false);
    }
  });

  it('recognises only the two types', () => {
    expect(isTxType('รายรับ')).toBe(true);
    expect(isTxType('รายจ่าย')).toBe(true);
    expect(isTxType('income')).toBe(false);
  });
});

describe('entry form', () => {
  it('starts as income with its default category', () => {
    expect(initialDraft('2025-03-01')).toEqual({
      date: '2025-03-01',
      type: 'รายรับ',
      category: 'เงินรายวัน',
      description: '',
      amount: 0,
    });
  });

  it('resets category to the new type default when type changes', () => {
    const draft = { ...initialDraft('2025-03-01'), category: 'รายได้อื่นๆ' };
    const expense = changeType(draft, TX_TYPES.EXPENSE);
    expect(expense.category).toBe('ค่าอาหาร');
    expect(categoryOptions(expense.type)).toContain(expense.category);
    expect(changeType(expense, TX_TYPES.INCOME).category).toBe('เงินรายวัน');
  });

  it('requires a description and a positive amount', () => {
    const draft = initialDraft('2025-03-01');
    expect(canSubmit(draft)).toBe(false);
    expect(canSubmit({ ...draft, description: 'เงินเดือน' })).toBe(false);
    expect(canSubmit({ ...draft, description: '   ', amount: 10 })).toBe(false);
    expect(canSubmit({ ...draft, description: 'เงินเดือน', amount: 10 })).toBe(true);
  });

  it('trims the description of the submitted record', () => {
    const draft = { ...initialDraft('2025-03-01'), description: '  ค่าขนม ', amount: 20 };
    expect(toTransactionInput(draft)).toEqual({
      date: '2025-03-01',
      type: 'รายรับ',
      category: 'เงินรายวัน',
      description: 'ค่าขนม',
      amount: 20,
    });
  });

  it('clears description and amount after submit', () => {
    const draft = changeType({ ...initialDraft('2025-03-01'), description: 'x', amount: 5 }, TX_TYPES.EXPENSE);
    expect(resetAfterSubmit(draft)).toEqual({
      date: '2025-03-01',
      type: 'รายจ่าย',
      category: 'ค่าอาหาร',
      description: '',
      amount: 0,
    });
  });
});

describe('entryFormReducer', () => {
  it('keeps edits made while a save is in flight', () => {
    let state = initialFormState('2025-03-01');
    state = entryFormReducer(state, { kind: 'edit', patch: { description: 'ค่าขนม', amount: 20 } });
    state = entryFormReducer(state, { kind: 'submitStarted' });
    state = entryFormReducer(state, { kind: 'edit', patch: { date: '2025-03-02' } });
    state = entryFormReducer(state, { kind: 'saved' });
    expect(state.draft).toEqual({
      date: '2025-03-02',
      type: 'รายรับ',
      category: 'เงินรายวัน',
      description: '',
      amount: 0,
    });
    expect(state.success).toBe(true);
  });

  it('clears the success message on the next edit', () => {
    const saved = entryFormReducer(initialFormState('2025-03-01'), { kind: 'saved' });
    expect(saved.success).toBe(true);
    expect(entryFormReducer(saved, { kind: 'edit', patch: { description: 'x' } }).success).toBe(false);
    expect(entryFormReducer(saved, { kind: 'changeType', type: TX_TYPES.EXPENSE }).success).toBe(false);
    expect(entryFormReducer(saved, { kind: 'submitStarted' }).success).toBe(false);
  });

  it('resets the category when the type changes', () => {
    const state = entryFormReducer(initialFormState('2025-03-01'), { kind: 'changeType', type: TX_TYPES.EXPENSE });
    expect(state.draft.category).toBe('ค่าอาหาร');
  });
});

describe('buildDashboard', () => {
  it('reports an empty ledger with no chart', () => {
    const dashboard = buildDashboard([]);
    expect(dashboard.isEmpty).toBe(true);
    expect(dashboard.totals).toEqual({ income: 0, expense: 0, balance: 0 });
    expect(dashboard.chart).toBeNull();
  });

  it('computes tables, totals and chart series', () => {
    const dashboard = buildDashboard([
      makeTxn({ type: TX_TYPES.INCOME, category: 'เงินรายวัน', amount: 300 }),
      makeTxn({ category: 'ค่าอาหาร', amount: 120 }),
      makeTxn({ category: 'ค่าเดินทาง', amount: 40 }),
      makeTxn({ category: 'ค่าอาหาร', amount: 60 }),
    ]);
    expect(dashboard.income).toHaveLength(1);
    expect(dashboard.expense).toHaveLength(3);
    expect(dashboard.totals).toEqual({ income: 300, expense: 220, balance: 80 });
    expect(dashboard.chart).toEqual({
      categories: ['เงินรายวัน', 'ค่าอาหาร', 'ค่าเดินทาง'],
      income: [300, 0, 0],
      expense: [0, 180, 40],
    });
  });

  it('leaves out unknown types from totals and chart', () => {
    const dashboard = buildDashboard([makeTxn({ type: 'อื่นๆ', amount: 999 })]);
    expect(dashboard.isEmpty).toBe(false);
    expect(dashboard.totals).toEqual({ income: 0, expense: 0, balance: 0 });
    expect(dashboard.chart).toBeNull();
  });
});

describe('formatting', () => {
  it('formats baht with separators and two decimals', () => {
    expect(formatBaht(1234.5)).toBe('1,234.50 บาท');
    expect(formatBaht(0)).toBe('0.00 บาท');
    expect(formatBaht(-250)).toBe('-250.00 บาท');
  });

  it('shows dates as DD/MM/YYYY', () => {
    expect(formatDisplayDate('2025-01-15')).toBe('15/01/2025');
    expect(formatDisplayDate(INVALID_DATE)).toBe('-');
  });

  it('gives the local date as YYYY-MM-DD', () => {
    expect(todayIso(new Date(2025, 0, 5, 23, 30))).toBe('2025-01-05');
  });
});
