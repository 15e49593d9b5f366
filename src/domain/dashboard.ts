/**
 * Dashboard view-model: everything the main screen shows, derived from the
 * ledger in one pass. Recomputed on every render.
 */
import { buildSeries } from './chartSeries';
import { balance, splitByType, sumByCategory, total } from './computations';
import type { ChartSeries, Ledger, Totals, Transaction } from './types';

export interface Dashboard {
  isEmpty: boolean;
  income: Transaction[];
  expense: Transaction[];
  totals: Totals;
  chart: ChartSeries | null;   // null when nothing can be plotted
}

export function buildDashboard(ledger: Ledger): Dashboard {
  const { income, expense } = splitByType(ledger);
  const incomeTotal = total(income);
  const expenseTotal = total(expense);

  const chart = income.length > 0 || expense.length > 0
    ? buildSeries(sumByCategory(income), sumByCategory(expense))
    : null;

  return {
    isEmpty: ledger.length === 0,
    income,
    expense,
    totals: {
      income: incomeTotal,
      expense: expenseTotal,
      balance: balance(incomeTotal, expenseTotal),
    },
    chart,
  };
}
