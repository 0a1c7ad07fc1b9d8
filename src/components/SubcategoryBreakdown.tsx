import type { CategoryTotal, SubcategoryTotal } from '../lib/data/contract';
import { formatCurrency, formatPercent } from '../lib/format';

type SubcategoryBreakdownProps = {
  categories: CategoryTotal[];
  subcategories: SubcategoryTotal[];
};

/** Category totals, each followed by its subcategories and their share of the category. */
export default function SubcategoryBreakdown({ categories, subcategories }: SubcategoryBreakdownProps) {
  const byCategory = new Map<string, SubcategoryTotal[]>();
  subcategories.forEach((entry) => {
    const rows = byCategory.get(entry.category) ?? [];
    rows.push(entry);
    byCategory.set(entry.category, rows);
  });

  return (
    <article className="card table-card">
      <div className="card-head">
        <h3>Category and Subcategory Breakdown</h3>
        <p className="subtle">Share of each subcategory within its category</p>
      </div>

      {categories.length === 0 ? (
        <p className="empty-state">No expenses recorded.</p>
      ) : (
        <table>
          <thead>
            <tr>
              <th>Category</th>
              <th>Subcategory</th>
              <th>Amount</th>
              <th>Share of Category</th>
            </tr>
          </thead>
          {categories.map((parent) => (
            <tbody key={parent.category}>
              <tr className="group-row">
                <th scope="row">{parent.category}</th>
                <td />
                <td>{formatCurrency(parent.amount)}</td>
                <td>{formatPercent(100)}</td>
              </tr>
              {(byCategory.get(parent.category) ?? []).map((row) => (
                <tr key={row.subcategory}>
                  <td />
                  <td>{row.subcategory || '—'}</td>
                  <td>{formatCurrency(row.amount)}</td>
                  <td>{formatPercent(parent.amount > 0 ? (row.amount / parent.amount) * 100 : 0)}</td>
                </tr>
              ))}
            </tbody>
          ))}
        </table>
      )}
    </article>
  );
}
