import type { Granularity, TrendPoint } from '../lib/data/contract';
import { formatCurrency } from '../lib/format';

type TrendTableProps = {
  points: TrendPoint[];
  granularity: Granularity;
};

const GRANULARITY_LABELS: Record<Granularity, string> = {
  daily: 'Daily',
  weekly: 'Weekly',
  monthly: 'Monthly',
};

export default function TrendTable({ points, granularity }: TrendTableProps) {
  return (
    <article className="card table-card">
      <div className="card-head">
        <h3>{GRANULARITY_LABELS[granularity]} Income vs Expenses</h3>
      </div>

      {points.length === 0 ? (
        <p className="empty-state">No transactions loaded.</p>
      ) : (
        <table>
          <thead>
            <tr>
              <th>Period</th>
              <th>Income</th>
              <th>Expenses</th>
              <th>Net</th>
            </tr>
          </thead>
          <tbody>
            {points.map((point) => (
              <tr key={point.period}>
                <td>{point.period}</td>
                <td>{formatCurrency(point.income)}</td>
                <td>{formatCurrency(point.expense)}</td>
                <td className={point.net < 0 ? 'is-down' : 'is-up'}>{formatCurrency(point.net)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </article>
  );
}
