import { describe, expect, it } from 'vitest';
import { groupTxns } from '../../test/groupData';
import { buildPivot, drillDown, pivotCell } from './pivot';

describe('buildPivot', () => {
  it('builds a dense category by group matrix of expenses', () => {
    expect(buildPivot(groupTxns, ['Beach Trip', 'Family'])).toEqual({
      categories: ['Food', 'Lodging'],
      groups: ['Beach Trip', 'Family'],
      cells: [
        [270, 40],
        [80, 80],
      ],
    });
  });

  it('keeps selection order and drops repeated groups', () => {
    const pivot = buildPivot(groupTxns, ['Family', 'Beach Trip', 'Family']);
    expect(pivot.groups).toEqual(['Family', 'Beach Trip']);
    expect(pivot.cells).toEqual([
      [40, 270],
      [80, 80],
    ]);
  });

  it('keeps a column for a group without expenses', () => {
    expect(buildPivot(groupTxns, ['Rewards'])).toEqual({ categories: [], groups: ['Rewards'], cells: [] });
  });

  it('reads absent cells as zero', () => {
    const pivot = buildPivot(groupTxns, ['Family']);
    expect(pivotCell(pivot, 'Lodging', 'Family')).toBe(80);
    expect(pivotCell(pivot, 'Travel', 'Family')).toBe(0);
    expect(pivotCell(pivot, 'Food', 'Beach Trip')).toBe(0);
  });
});

describe('drillDown', () => {
  it('lists matching expenses by amount with tag lines removed from notes', () => {
    const detail = drillDown(groupTxns, 'Food', 'Beach Trip');

    expect(detail.total).toBe(270);
    expect(detail.rows.map(({ title, amount, note, date, subcategory }) => ({ title, amount, note, date, subcategory }))).toEqual([
      { title: 'Seafood', amount: 150, note: '', date: '2024-03-02', subcategory: 'Restaurants' },
      { title: 'Dinner', amount: 120, note: 'sunset dinner', date: '2024-03-01', subcategory: 'Restaurants' },
    ]);
  });

  it('skips notes that only mention a hashtag inline', () => {
    const detail = drillDown(groupTxns, 'Food', 'Family');
    expect(detail.rows.map((row) => row.title)).toEqual(['Snacks']);
    expect(detail.total).toBe(40);
  });

  it('matches every pivot cell total', () => {
    const groups = ['Beach Trip', 'Family'];
    const pivot = buildPivot(groupTxns, groups);

    pivot.categories.forEach((category) => {
      groups.forEach((group) => {
        expect(drillDown(groupTxns, category, group).total).toBe(pivotCell(pivot, category, group));
      });
    });
  });
});
