import type { GroupSummary } from '../lib/data/contract';
import { formatCurrency } from '../lib/format';

type GroupSummaryTableProps = {
  summaries: GroupSummary[];
};

export default function GroupSummaryTable({ summaries }: GroupSummaryTableProps) {
  return (
    <article className="card table-card">
      <div className="card-head">
        <h3>Group Details</h3>
        <p className="subtle">Spending and span per selected group</p>
      </div>

      <table>
        <thead>
          <tr>
            <th>Group</th>
            <th>Total Spent</th>
            <th>Duration</th>
            <th>Top Category</th>
            <th>Transactions</th>
          </tr>
        </thead>
        <tbody>
          {summaries.map((row) => (
            <tr key={row.group}>
              <td>{row.group}</td>
              <td>{formatCurrency(row.totalSpent)}</td>
              <td>{row.durationDays === 1 ? '1 day' : `${row.durationDays} days`}</td>
              <td>{row.topCategory ?? '—'}</td>
              <td>{row.transactionCount}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </article>
  );
}
