import type { CategoryPivot } from '../lib/data/contract';
import { formatCurrency } from '../lib/format';

export type PivotSelection = {
  category: string;
  group: string;
};

type CategoryGroupTableProps = {
  pivot: CategoryPivot;
  selection?: PivotSelection | null;
  onSelect: (selection: PivotSelection) => void;
};

export default function CategoryGroupTable({ pivot, selection = null, onSelect }: CategoryGroupTableProps) {
  return (
    <article className="card table-card">
      <div className="card-head">
        <h3>Category Breakdown by Group</h3>
        <p className="subtle">Pick a cell to list its transactions</p>
      </div>

      {pivot.categories.length === 0 ? (
        <p className="empty-state">The selected groups have no expenses.</p>
      ) : (
        <table>
          <thead>
            <tr>
              <th>Category</th>
              {pivot.groups.map((group) => (
                <th key={group}>{group}</th>
              ))}
            </tr>
          </thead>
          <tbody>
            {pivot.categories.map((category, rowIndex) => (
              <tr key={category}>
                <td>{category}</td>
                {pivot.groups.map((group, columnIndex) => {
                  const isActive = selection?.category === category && selection.group === group;
                  return (
                    <td key={group}>
                      <button
                        type="button"
                        className={`pivot-cell${isActive ? ' is-active' : ''}`}
                        aria-label={`${category} in ${group}`}
                        aria-pressed={isActive}
                        onClick={() => onSelect({ category, group })}
                      >
                        {formatCurrency(pivot.cells[rowIndex][columnIndex])}
                      </button>
                    </td>
                  );
                })}
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </article>
  );
}
