import { describe, expect, it, vi } from 'vitest';
import { makeTxn } from '../../test/fixtures';
import { groupTxns } from '../../test/groupData';
import { analyzeGroups } from './analysis';

describe('analyzeGroups', () => {
  it('reports data without any tags', () => {
    const txns = [makeTxn({ date: '2024-01-01', amount: 5, kind: 'expense', category: 'Food', note: 'plain' })];
    expect(analyzeGroups(txns, ['Trip'])).toEqual({ status: 'no-groups' });
  });

  it('lists the available groups until some are selected', () => {
    expect(analyzeGroups(groupTxns, [])).toEqual({
      status: 'no-selection',
      groups: ['Beach Trip', 'Family', 'Rewards'],
    });
  });

  it('builds summaries and the pivot for the known selected groups', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const analysis = analyzeGroups(groupTxns, ['Family', 'Unknown']);

    expect(warn).toHaveBeenCalledWith('[groups] Ignored 1 selected group(s) absent from the data: Unknown');
    expect(analysis.status).toBe('ready');
    if (analysis.status !== 'ready') return;
    expect(analysis.selected).toEqual(['Family']);
    expect(analysis.summaries.map((summary) => summary.group)).toEqual(['Family']);
    expect(analysis.pivot.cells).toEqual([[40], [80]]);
  });
});
