import { TOP_N } from '../config';
import type { SubcategoryTotal } from '../lib/data/contract';
import { formatCurrency } from '../lib/format';

type TopSubcategoriesTableProps = {
  subcategories: SubcategoryTotal[];
};

export default function TopSubcategoriesTable({ subcategories }: TopSubcategoriesTableProps) {
  return (
    <article className="card table-card">
      <div className="card-head">
        <h3>Top {TOP_N} Subcategories</h3>
      </div>

      {subcategories.length === 0 ? (
        <p className="empty-state">No expenses recorded.</p>
      ) : (
        <table>
          <thead>
            <tr>
              <th>Category</th>
              <th>Subcategory</th>
              <th>Amount</th>
            </tr>
          </thead>
          <tbody>
            {subcategories.map((row) => (
              <tr key={`${row.category}|${row.subcategory}`}>
                <td>{row.category}</td>
                <td>{row.subcategory || '—'}</td>
                <td>{formatCurrency(row.amount)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </article>
  );
}
