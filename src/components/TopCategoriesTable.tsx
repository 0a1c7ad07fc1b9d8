import type { CategoryTotal } from '../lib/data/contract';
import { formatCurrency } from '../lib/format';

type TopCategoriesTableProps = {
  categories: CategoryTotal[];
};

export default function TopCategoriesTable({ categories }: TopCategoriesTableProps) {
  return (
    <article className="card table-card">
      <div className="card-head">
        <h3>Top Spending Categories</h3>
        <p className="subtle">Highest expense categories</p>
      </div>

      {categories.length === 0 ? (
        <p className="empty-state">No expenses recorded.</p>
      ) : (
        <table>
          <thead>
            <tr>
              <th>Rank</th>
              <th>Category</th>
              <th>Amount</th>
            </tr>
          </thead>
          <tbody>
            {categories.map((row, index) => (
              <tr key={row.category}>
                <td>{index + 1}</td>
                <td>{row.category}</td>
                <td>{formatCurrency(row.amount)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </article>
  );
}
