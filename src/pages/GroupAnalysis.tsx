import { useMemo, useState } from 'react';
import CategoryGroupTable, { type PivotSelection } from '../components/CategoryGroupTable';
import DrillDownTable from '../components/DrillDownTable';
import GroupSummaryTable from '../components/GroupSummaryTable';
import type { Txn } from '../lib/data/contract';
import { analyzeGroups } from '../lib/groups/analysis';
import { drillDown } from '../lib/groups/pivot';

type GroupAnalysisProps = {
  txns: readonly Txn[];
  initialSelection?: string[];
};

export default function GroupAnalysis({ txns, initialSelection = [] }: GroupAnalysisProps) {
  const [selectedGroups, setSelectedGroups] = useState<string[]>(initialSelection);
  const [cell, setCell] = useState<PivotSelection | null>(null);

  const analysis = useMemo(() => analyzeGroups(txns, selectedGroups), [txns, selectedGroups]);
  const detail = useMemo(() => {
    if (!cell || analysis.status !== 'ready' || !analysis.selected.includes(cell.group)) return null;
    return drillDown(txns, cell.category, cell.group);
  }, [txns, cell, analysis]);

  if (analysis.status === 'no-groups') {
    return (
      <main className="page groups-page">
        <h1>Group Analysis</h1>
        <p className="empty-state">No groups found in the data. Make sure your notes contain hashtags.</p>
      </main>
    );
  }

  const toggleGroup = (group: string) => {
    if (!selectedGroups.includes(group)) {
      setSelectedGroups([...selectedGroups, group]);
      return;
    }

    setSelectedGroups(selectedGroups.filter((entry) => entry !== group));
    if (cell?.group === group) {
      setCell(null);
    }
  };

  return (
    <main className="page groups-page">
      <h1>Group Analysis</h1>
      <p className="subtle">Found {analysis.groups.length} groups in your data</p>

      <fieldset className="group-picker">
        <legend>Select Groups to Compare</legend>
        {analysis.groups.map((group) => (
          <label key={group}>
            <input type="checkbox" checked={selectedGroups.includes(group)} onChange={() => toggleGroup(group)} />
            {group}
          </label>
        ))}
      </fieldset>

      {analysis.status === 'ready' ? (
        <>
          <GroupSummaryTable summaries={analysis.summaries} />
          <CategoryGroupTable pivot={analysis.pivot} selection={cell} onSelect={setCell} />
          {detail ? <DrillDownTable drillDown={detail} /> : null}
        </>
      ) : null}
    </main>
  );
}
