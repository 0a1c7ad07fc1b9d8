import type { DrillDown } from '../lib/data/contract';
import { formatCurrency } from '../lib/format';

type DrillDownTableProps = {
  drillDown: DrillDown;
};

export default function DrillDownTable({ drillDown }: DrillDownTableProps) {
  return (
    <article className="card table-card">
      <div className="card-head">
        <h3>
          Transactions for {drillDown.category} in {drillDown.group}
        </h3>
        <p className="kpi-value" data-testid="drilldown-total">
          Total {formatCurrency(drillDown.total)}
        </p>
      </div>

      {drillDown.rows.length === 0 ? (
        <p className="empty-state">No transactions for this selection.</p>
      ) : (
        <table>
          <thead>
            <tr>
              <th>Date</th>
              <th>Description</th>
              <th>Subcategory</th>
              <th>Amount</th>
              <th>Note</th>
            </tr>
          </thead>
          <tbody>
            {drillDown.rows.map((row) => (
              <tr key={row.id}>
                <td>{row.date}</td>
                <td>{row.title}</td>
                <td>{row.subcategory}</td>
                <td>{formatCurrency(row.amount)}</td>
                <td className="note-cell">{row.note}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </article>
  );
}
