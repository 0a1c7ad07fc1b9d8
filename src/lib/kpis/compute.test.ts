import { describe, expect, it } from 'vitest';
import type { Granularity } from '../data/contract';
import { makeTxn } from '../../test/fixtures';
import {
  categoryTotals,
  computeExpenseSlices,
  computeTrend,
  subcategoryTotals,
  summarize,
  topCategories,
  topSubcategories,
} from './compute';

const txns = [
  makeTxn({ date: '2024-01-15', amount: 1000, kind: 'income', category: 'Salary' }),
  makeTxn({ date: '2024-01-20', amount: 200, kind: 'expense', category: 'Food', subcategory: 'Groceries' }),
  makeTxn({ date: '2024-01-22', amount: 50, kind: 'expense', category: 'Food' }),
  makeTxn({ date: '2024-02-05', amount: 300, kind: 'expense', category: 'Rent', subcategory: 'Housing' }),
  makeTxn({ date: '2024-02-06', amount: 250, kind: 'income', category: 'Gift' }),
  makeTxn({ date: '2024-02-06', amount: 25.5, kind: 'expense', category: 'Food', subcategory: 'Groceries' }),
];

describe('summarize', () => {
  it('reports income, expenses, net savings and savings rate', () => {
    const metrics = summarize(txns);
    expect(metrics).toMatchObject({
      totalIncome: 1250,
      totalExpenses: 575.5,
      netSavings: 674.5,
      transactionCount: 6,
    });
    expect(metrics.savingsRate).toBeCloseTo(53.96, 10);
  });

  it('uses a zero savings rate without income', () => {
    const metrics = summarize([makeTxn({ date: '2024-01-01', amount: 40, kind: 'expense', category: 'Food' })]);
    expect(metrics).toEqual({
      totalIncome: 0,
      totalExpenses: 40,
      netSavings: -40,
      savingsRate: 0,
      transactionCount: 1,
    });
  });

  it('computes a rate for income of any size above zero', () => {
    const metrics = summarize([makeTxn({ date: '2024-01-01', amount: 0.000008, kind: 'income', category: 'Interest' })]);
    expect(metrics.savingsRate).toBe(100);
  });

  it('matches the single trip example', () => {
    const metrics = summarize([
      makeTxn({ date: '2024-06-01', amount: 100, kind: 'expense', category: 'Travel', note: '#Trip' }),
      makeTxn({ date: '2024-06-01', amount: 500, kind: 'income', category: 'Salary' }),
    ]);
    expect(metrics).toEqual({
      totalIncome: 500,
      totalExpenses: 100,
      netSavings: 400,
      savingsRate: 80,
      transactionCount: 2,
    });
  });
});

describe('computeTrend', () => {
  it('sums income and expenses per month', () => {
    expect(computeTrend(txns, 'monthly')).toEqual([
      { period: '2024-01', income: 1000, expense: 250, net: 750 },
      { period: '2024-02', income: 250, expense: 325.5, net: -75.5 },
    ]);
  });

  it('sums per ISO week', () => {
    expect(computeTrend(txns, 'weekly')).toEqual([
      { period: '2024-W03', income: 1000, expense: 200, net: 800 },
      { period: '2024-W04', income: 0, expense: 50, net: -50 },
      { period: '2024-W06', income: 250, expense: 325.5, net: -75.5 },
    ]);
  });

  it('sums per day in ascending order', () => {
    expect(computeTrend(txns, 'daily').map((point) => point.period)).toEqual([
      '2024-01-15',
      '2024-01-20',
      '2024-01-22',
      '2024-02-05',
      '2024-02-06',
    ]);
  });

  it.each<Granularity>(['daily', 'weekly', 'monthly'])('keeps every amount once for %s buckets', (granularity) => {
    const points = computeTrend(txns, granularity);
    expect(points.reduce((sum, point) => sum + point.income, 0)).toBe(1250);
    expect(points.reduce((sum, point) => sum + point.expense, 0)).toBe(575.5);
  });

  it('returns no points for no transactions', () => {
    expect(computeTrend([], 'monthly')).toEqual([]);
  });
});

describe('category aggregation', () => {
  it('sums expenses per category, largest first', () => {
    expect(categoryTotals(txns)).toEqual([
      { category: 'Rent', amount: 300 },
      { category: 'Food', amount: 275.5 },
    ]);
  });

  it('keeps an empty subcategory as its own bucket', () => {
    expect(subcategoryTotals(txns)).toEqual([
      { category: 'Rent', subcategory: 'Housing', amount: 300 },
      { category: 'Food', subcategory: 'Groceries', amount: 225.5 },
      { category: 'Food', subcategory: '', amount: 50 },
    ]);
  });

  it('preserves totals across both levels', () => {
    const oneLevel = categoryTotals(txns);
    const twoLevel = subcategoryTotals(txns);

    oneLevel.forEach(({ category, amount }) => {
      const nested = twoLevel
        .filter((entry) => entry.category === category)
        .reduce((sum, entry) => sum + entry.amount, 0);
      expect(nested).toBe(amount);
    });
    expect(oneLevel.reduce((sum, entry) => sum + entry.amount, 0)).toBe(summarize(txns).totalExpenses);
  });

  it('breaks amount ties by name', () => {
    const tied = [
      makeTxn({ date: '2024-01-01', amount: 10, kind: 'expense', category: 'Zoo' }),
      makeTxn({ date: '2024-01-02', amount: 10, kind: 'expense', category: 'Art' }),
    ];
    expect(categoryTotals(tied).map((entry) => entry.category)).toEqual(['Art', 'Zoo']);
  });

  it('limits the top rankings', () => {
    expect(topCategories(txns, 1)).toEqual([{ category: 'Rent', amount: 300 }]);
    expect(topSubcategories(txns, 2).map((entry) => entry.subcategory)).toEqual(['Housing', 'Groceries']);
  });
});

describe('computeExpenseSlices', () => {
  it('shares each category against all expenses', () => {
    const slices = computeExpenseSlices(txns, 1);
    expect(slices).toHaveLength(1);
    expect(slices[0]).toMatchObject({ name: 'Rent', value: 300, color: '#76a8ff' });
    expect(slices[0].share).toBeCloseTo(300 / 575.5, 10);
  });

  it('gives a tiny expense total its full share', () => {
    const slices = computeExpenseSlices([makeTxn({ date: '2024-01-01', amount: 0.000004, kind: 'expense', category: 'Fees' })]);
    expect(slices[0].share).toBe(1);
  });
});
