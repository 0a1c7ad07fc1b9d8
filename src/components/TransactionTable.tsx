import type { Txn } from '../lib/data/contract';
import { formatCurrency } from '../lib/format';

type TransactionTableProps = {
  txns: readonly Txn[];
};

export default function TransactionTable({ txns }: TransactionTableProps) {
  return (
    <article className="card table-card">
      <div className="card-head">
        <h3>Raw Data</h3>
        <p className="subtle">{txns.length === 1 ? '1 transaction' : `${txns.length} transactions`}</p>
      </div>

      <table>
        <thead>
          <tr>
            <th>Date</th>
            <th>Type</th>
            <th>Category</th>
            <th>Subcategory</th>
            <th>Title</th>
            <th>Amount</th>
            <th>Tags</th>
            <th>Note</th>
          </tr>
        </thead>
        <tbody>
          {txns.map((txn) => (
            <tr key={txn.id}>
              <td>{txn.date}</td>
              <td>{txn.kind === 'income' ? 'Income' : 'Expense'}</td>
              <td>{txn.category}</td>
              <td>{txn.subcategory}</td>
              <td>{txn.title}</td>
              <td className={txn.kind === 'income' ? 'is-up' : 'is-down'}>{formatCurrency(txn.signedAmount)}</td>
              <td>{txn.tags.join(', ')}</td>
              <td className="note-cell">{txn.note}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </article>
  );
}
