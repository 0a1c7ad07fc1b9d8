import { TOP_N } from '../../config';
import type {
  CategoryTotal,
  ExpenseSlice,
  Granularity,
  SubcategoryTotal,
  SummaryMetrics,
  TrendPoint,
  Txn,
} from '../data/contract';
import { compareText } from '../data/compare';
import { periodKey } from './period';

const EXPENSE_COLORS = ['#76a8ff', '#5e84f1', '#4f6fdd', '#3f58c1', '#2f479f', '#243b82', '#1b2f67'];

function byAmountThenName<T extends { amount: number }>(name: (entry: T) => string) {
  return (a: T, b: T): number => b.amount - a.amount || compareText(name(a), name(b));
}

export function summarize(txns: readonly Txn[]): SummaryMetrics {
  let totalIncome = 0;
  let totalExpenses = 0;

  txns.forEach((txn) => {
    if (txn.kind === 'income') {
      totalIncome += txn.amount;
    } else {
      totalExpenses += txn.amount;
    }
  });

  const netSavings = totalIncome - totalExpenses;
  const savingsRate = totalIncome === 0 ? 0 : (netSavings / totalIncome) * 100;

  return {
    totalIncome,
    totalExpenses,
    netSavings,
    savingsRate,
    transactionCount: txns.length,
  };
}

export function computeTrend(txns: readonly Txn[], granularity: Granularity): TrendPoint[] {
  const periodMap = new Map<string, TrendPoint>();

  txns.forEach((txn) => {
    const period = periodKey(txn.date, granularity);
    let point = periodMap.get(period);
    if (!point) {
      point = { period, income: 0, expense: 0, net: 0 };
      periodMap.set(period, point);
    }

    if (txn.kind === 'income') {
      point.income += txn.amount;
    } else {
      point.expense += txn.amount;
    }
    point.net = point.income - point.expense;
  });

  return [...periodMap.values()].sort((a, b) => compareText(a.period, b.period));
}

export function categoryTotals(txns: readonly Txn[]): CategoryTotal[] {
  const totals = new Map<string, number>();
  txns.forEach((txn) => {
    if (txn.kind !== 'expense') return;
    totals.set(txn.category, (totals.get(txn.category) ?? 0) + txn.amount);
  });

  return [...totals.entries()]
    .map(([category, amount]) => ({ category, amount }))
    .sort(byAmountThenName<CategoryTotal>((entry) => entry.category));
}

export function subcategoryTotals(txns: readonly Txn[]): SubcategoryTotal[] {
  const totals = new Map<string, SubcategoryTotal>();
  txns.forEach((txn) => {
    if (txn.kind !== 'expense') return;
    // JSON keeps categories containing separators apart.
    const key = JSON.stringify([txn.category, txn.subcategory]);
    const entry = totals.get(key);
    if (entry) {
      entry.amount += txn.amount;
    } else {
      totals.set(key, { category: txn.category, subcategory: txn.subcategory, amount: txn.amount });
    }
  });

  return [...totals.values()].sort(
    byAmountThenName<SubcategoryTotal>((entry) => `${entry.category}\u0000${entry.subcategory}`)
  );
}

export function topCategories(txns: readonly Txn[], limit = TOP_N): CategoryTotal[] {
  return categoryTotals(txns).slice(0, limit);
}

export function topSubcategories(txns: readonly Txn[], limit = TOP_N): SubcategoryTotal[] {
  return subcategoryTotals(txns).slice(0, limit);
}

export function computeExpenseSlices(txns: readonly Txn[], limit = EXPENSE_COLORS.length): ExpenseSlice[] {
  const totals = categoryTotals(txns);
  const totalExpense = totals.reduce((sum, entry) => sum + entry.amount, 0);

  return totals.slice(0, limit).map(({ category, amount }, index) => ({
    name: category,
    value: amount,
    share: totalExpense > 0 ? amount / totalExpense : 0,
    color: EXPENSE_COLORS[index % EXPENSE_COLORS.length],
  }));
}
