import { compareText } from '../data/compare';
import type { CategoryPivot, DrillDown, DrillDownRow, Txn } from '../data/contract';
import { hasTag, stripTagLines } from './tags';

function uniqueGroups(groups: readonly string[]): string[] {
  return [...new Set(groups)];
}

/**
 * Category × group expense matrix. A transaction carrying several selected
 * tags adds its full amount to each of their columns.
 */
export function buildPivot(txns: readonly Txn[], selectedGroups: readonly string[]): CategoryPivot {
  const groups = uniqueGroups(selectedGroups);
  const columnByGroup = new Map(groups.map((group, index) => [group, index] as const));
  const rowsByCategory = new Map<string, number[]>();

  txns.forEach((txn) => {
    if (txn.kind !== 'expense') return;
    const columns = groups.filter((group) => hasTag(txn, group));
    if (columns.length === 0) return;

    const row = rowsByCategory.get(txn.category) ?? groups.map(() => 0);
    rowsByCategory.set(txn.category, row);

    columns.forEach((group) => {
      const column = columnByGroup.get(group);
      if (column !== undefined) {
        row[column] += txn.amount;
      }
    });
  });

  const categories = [...rowsByCategory.keys()].sort(compareText);
  return {
    categories,
    groups,
    cells: categories.map((category) => rowsByCategory.get(category) ?? groups.map(() => 0)),
  };
}

export function pivotCell(pivot: CategoryPivot, category: string, group: string): number {
  const row = pivot.categories.indexOf(category);
  const column = pivot.groups.indexOf(group);
  if (row < 0 || column < 0) return 0;
  return pivot.cells[row][column];
}

export function drillDown(txns: readonly Txn[], category: string, group: string): DrillDown {
  const matches = txns.filter(
    (txn) => txn.kind === 'expense' && txn.category === category && hasTag(txn, group)
  );
  // Summed in collection order so the total matches the pivot cell exactly.
  const total = matches.reduce((sum, txn) => sum + txn.amount, 0);

  const rows: DrillDownRow[] = matches
    .map((txn) => ({
      id: txn.id,
      date: txn.date,
      title: txn.title,
      subcategory: txn.subcategory,
      amount: txn.amount,
      note: stripTagLines(txn.note),
    }))
    .sort((a, b) => b.amount - a.amount);

  return {
    category,
    group,
    rows,
    total,
  };
}
