import { compareText } from '../data/compare';
import type { GroupSummary, Txn } from '../data/contract';
import { daysBetween } from '../kpis/period';
import { hasTag } from './tags';

function topExpenseCategory(expenses: readonly Txn[]): string | null {
  const totals = new Map<string, number>();
  expenses.forEach((txn) => {
    totals.set(txn.category, (totals.get(txn.category) ?? 0) + txn.amount);
  });

  let top: string | null = null;
  let topAmount = 0;
  for (const [category, amount] of totals) {
    if (top === null || amount > topAmount || (amount === topAmount && compareText(category, top) < 0)) {
      top = category;
      topAmount = amount;
    }
  }
  return top;
}

/**
 * Summarizes every transaction tagged with `group`. Income rows only widen
 * the date span; spending figures count expenses alone.
 *
 * Throws when no transaction carries the tag: callers pick groups from the
 * data, so an empty group is a programming error.
 */
export function summarizeGroup(txns: readonly Txn[], group: string): GroupSummary {
  const members = txns.filter((txn) => hasTag(txn, group));
  if (members.length === 0) {
    throw new Error(`Group "${group}" has no transactions to summarize`);
  }

  let firstDate = members[0].date;
  let lastDate = members[0].date;
  members.forEach((txn) => {
    if (txn.date < firstDate) firstDate = txn.date;
    if (txn.date > lastDate) lastDate = txn.date;
  });

  const expenses = members.filter((txn) => txn.kind === 'expense');

  return {
    group,
    totalSpent: expenses.reduce((sum, txn) => sum + txn.amount, 0),
    durationDays: daysBetween(firstDate, lastDate) + 1,
    topCategory: topExpenseCategory(expenses),
    transactionCount: expenses.length,
  };
}

export function summarizeGroups(txns: readonly Txn[], groups: readonly string[]): GroupSummary[] {
  return groups.map((group) => summarizeGroup(txns, group));
}
