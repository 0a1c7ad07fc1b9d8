import type { ExpenseSlice } from '../lib/data/contract';
import { formatCurrency, formatPercent } from '../lib/format';

type CategoryDonutProps = {
  slices: ExpenseSlice[];
  title?: string;
};

function buildConicGradient(slices: ExpenseSlice[]): string {
  if (slices.length === 0) {
    return 'conic-gradient(#d9e2f5 0deg, #d9e2f5 360deg)';
  }

  let cursor = 0;
  const stops: string[] = [];

  slices.forEach((slice) => {
    const degrees = Math.max(slice.share * 360, 1);
    const nextCursor = cursor + degrees;
    stops.push(`${slice.color} ${cursor}deg ${nextCursor}deg`);
    cursor = nextCursor;
  });

  // Categories past the legend share the neutral remainder.
  if (cursor < 360) {
    stops.push(`#d9e2f5 ${cursor}deg 360deg`);
  }

  return `conic-gradient(${stops.join(', ')})`;
}

export default function CategoryDonut({ slices, title = 'Expenses by Category' }: CategoryDonutProps) {
  const total = slices.reduce((sum, slice) => sum + slice.value, 0);

  return (
    <article className="card donut-card">
      <div className="card-head">
        <h3>{title}</h3>
        <p className="subtle">Largest spending categories</p>
      </div>

      {slices.length === 0 ? (
        <p className="empty-state">No expenses recorded.</p>
      ) : (
        <div className="donut-layout">
          <div className="donut-shell" style={{ background: buildConicGradient(slices) }}>
            <div className="donut-center">
              <span>Shown</span>
              <strong>{formatCurrency(total)}</strong>
            </div>
          </div>

          <ul className="legend-list">
            {slices.map((slice) => (
              <li key={slice.name}>
                <span className="legend-dot" style={{ background: slice.color }} aria-hidden="true" />
                <span className="legend-name">{slice.name}</span>
                <span className="legend-value">{formatCurrency(slice.value)}</span>
                <span className="legend-share">{formatPercent(slice.share * 100)}</span>
              </li>
            ))}
          </ul>
        </div>
      )}
    </article>
  );
}
