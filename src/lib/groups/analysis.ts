import type { GroupAnalysis, Txn } from '../data/contract';
import { buildPivot } from './pivot';
import { summarizeGroups } from './summary';
import { listGroups } from './tags';

export function analyzeGroups(txns: readonly Txn[], selected: readonly string[]): GroupAnalysis {
  const groups = listGroups(txns);
  if (groups.length === 0) {
    return { status: 'no-groups' };
  }

  const known = new Set(groups);
  const requested = [...new Set(selected)];
  const active = requested.filter((group) => known.has(group));
  if (active.length < requested.length) {
    const unknown = requested.filter((group) => !known.has(group));
    console.warn(`[groups] Ignored ${unknown.length} selected group(s) absent from the data: ${unknown.join(', ')}`);
  }

  if (active.length === 0) {
    return { status: 'no-selection', groups };
  }

  return {
    status: 'ready',
    groups,
    selected: active,
    summaries: summarizeGroups(txns, active),
    pivot: buildPivot(txns, active),
  };
}
