/**
 * Chart data for the per-category income/expense bar chart.
 * Produces numbers and labels only; drawing is left to the component.
 */
import type { CategorySums, ChartSeries } from './types';

/** Bar width in category-axis units (one category per unit) */
export const BAR_WIDTH = 0.35;

export type SeriesKind = 'income' | 'expense';

export interface BarLayout {
  kind: SeriesKind;
  category: string;
  x: number;             // bar centre on the category axis
  width: number;
  value: number;
  label: string | null;  // null for zero-height bars
}

export interface ChartLayout {
  ticks: { x: number; label: string }[];
  bars: BarLayout[];
  maxValue: number;
}

const labelFmt = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Merge income and expense sums onto one category axis.
 * Income categories come first, then expense-only categories; a category
 * missing on one side gets 0 there.
 */
export function buildSeries(incomeByCategory: CategorySums, expenseByCategory: CategorySums): ChartSeries {
  const categories = Array.from(new Set([...incomeByCategory.keys(), ...expenseByCategory.keys()]));
  return {
    categories,
    income: categories.map((c) => incomeByCategory.get(c) ?? 0),
    expense: categories.map((c) => expenseByCategory.get(c) ?? 0),
  };
}

export function hasChartData(series: ChartSeries): boolean {
  return series.categories.length > 0;
}

/** Nearest integer; exact halves go to the even neighbour (2.5 → 2, 3.5 → 4) */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Rounded value label, e.g. 1234.6 → "1,235" */
export function barLabel(value: number): string | null {
  return value > 0 ? labelFmt.format(roundHalfEven(value)) : null;
}

/**
 * Paired bar positions around each category tick: income half a bar to the
 * left of the tick, expense half a bar to the right.
 */
export function layoutBars(series: ChartSeries, barWidth: number = BAR_WIDTH): ChartLayout {
  const ticks = series.categories.map((label, i) => ({ x: i, label }));
  const bars: BarLayout[] = [];

  series.categories.forEach((category, i) => {
    const income = series.income[i] ?? 0;
    const expense = series.expense[i] ?? 0;
    bars.push({ kind: 'income', category, x: i - barWidth / 2, width: barWidth, value: income, label: barLabel(income) });
    bars.push({ kind: 'expense', category, x: i + barWidth / 2, width: barWidth, value: expense, label: barLabel(expense) });
  });

  const maxValue = bars.reduce((max, b) => Math.max(max, b.value), 0);
  return { ticks, bars, maxValue };
}
