import type { Transaction } from '../domain/types';
import { formatBaht, formatDisplayDate } from '../domain/format';

interface TransactionTableProps {
  title: string;
  emptyMessage: string;
  transactions: Transaction[];
}

export function TransactionTable({ title, emptyMessage, transactions }: TransactionTableProps) {
  return (
    <section className="transaction-table">
      <h3>{title}</h3>
      {transactions.length === 0 ? (
        <p className="no-data">{emptyMessage}</p>
      ) : (
        <table>
          <thead>
            <tr>
              <th>วันที่</th>
              <th>ประเภท</th>
              <th>หมวดหมู่</th>
              <th>รายละเอียด</th>
              <th>จำนวนเงิน</th>
            </tr>
          </thead>
          <tbody>
            {transactions.map((t, i) => (
              // entries have no id; position in the ledger is stable
              <tr key={i}>
                <td>{formatDisplayDate(t.date)}</td>
                <td>{t.type}</td>
                <td>{t.category}</td>
                <td>{t.description}</td>
                <td className="amount">{formatBaht(t.amount)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  );
}
