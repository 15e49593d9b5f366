import { describe, it, expect } from 'vitest';
import { BAR_WIDTH, barLabel, buildSeries, hasChartData, layoutBars, roundHalfEven } from '../domain/chartSeries';

describe('buildSeries', () => {
  it('aligns categories from both sides, filling gaps with 0', () => {
    const series = buildSeries(new Map([['A', 100]]), new Map([['B', 50]]));
    expect(series.categories).toEqual(['A', 'B']);
    expect(series.income).toEqual([100, 0]);
    expect(series.expense).toEqual([0, 50]);
  });

  it('lists a shared category once', () => {
    const series = buildSeries(
      new Map([['A', 10], ['C', 5]]),
      new Map([['C', 7], ['B', 3]]),
    );
    expect(series).toEqual({
      categories: ['A', 'C', 'B'],
      income: [10, 5, 0],
      expense: [0, 7, 3],
    });
  });

  it('is empty when both sides are empty', () => {
    const series = buildSeries(new Map(), new Map());
    expect(series).toEqual({ categories: [], income: [], expense: [] });
    expect(hasChartData(series)).toBe(false);
  });

  it('gives the same order on repeated calls', () => {
    const income = new Map([['X', 1], ['Y', 2]]);
    const expense = new Map([['Z', 3], ['X', 4]]);
    expect(buildSeries(income, expense)).toEqual(buildSeries(income, expense));
  });
});

describe('barLabel', () => {
  it('rounds to whole baht with separators', () => {
    expect(barLabel(1234.6)).toBe('1,235');
    expect(barLabel(42)).toBe('42');
  });

  it('rounds exact halves to the even neighbour', () => {
    expect(barLabel(2.5)).toBe('2');
    expect(barLabel(3.5)).toBe('4');
    expect(barLabel(1500.5)).toBe('1,500');
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(7.25)).toBe(7);
  });

  it('leaves zero bars unlabeled', () => {
    expect(barLabel(0)).toBeNull();
  });
});

describe('layoutBars', () => {
  it('places income left and expense right of each tick', () => {
    const layout = layoutBars({ categories: ['A', 'B'], income: [100, 0], expense: [0, 50] });

    expect(layout.ticks).toEqual([{ x: 0, label: 'A' }, { x: 1, label: 'B' }]);
    expect(layout.maxValue).toBe(100);
    expect(layout.bars).toHaveLength(4);

    const [incomeA, expenseA, incomeB, expenseB] = layout.bars;
    expect(incomeA.kind).toBe('income');
    expect(incomeA.x).toBeCloseTo(-BAR_WIDTH / 2);
    expect(incomeA.label).toBe('100');
    expect(expenseA.kind).toBe('expense');
    expect(expenseA.x).toBeCloseTo(BAR_WIDTH / 2);
    expect(expenseA.label).toBeNull();
    expect(incomeB.x).toBeCloseTo(1 - BAR_WIDTH / 2);
    expect(incomeB.label).toBeNull();
    expect(expenseB.x).toBeCloseTo(1 + BAR_WIDTH / 2);
    expect(expenseB.value).toBe(50);
    expect(expenseB.label).toBe('50');
  });

  it('uses the given bar width', () => {
    const layout = layoutBars({ categories: ['A'], income: [1], expense: [2] }, 0.5);
    expect(layout.bars.map((b) => [b.x, b.width])).toEqual([[-0.25, 0.5], [0.25, 0.5]]);
  });

  it('has nothing to draw for an empty series', () => {
    expect(layoutBars({ categories: [], income: [], expense: [] })).toEqual({ ticks: [], bars: [], maxValue: 0 });
  });
});
