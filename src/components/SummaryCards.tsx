import type { Totals } from '../domain/types';
import { formatBaht } from '../domain/format';

interface SummaryCardsProps {
  totals: Totals;
}

export function SummaryCards({ totals }: SummaryCardsProps) {
  return (
    <section className="summary" aria-label="สรุปยอดรวม">
      <h2>📊 สรุปยอดรวม</h2>
      <div className="summary-cards">
        <div className="summary-card">
          <span className="summary-label">รวมรายรับ</span>
          <span className="summary-value">{formatBaht(totals.income)}</span>
        </div>
        <div className="summary-card">
          <span className="summary-label">รวมรายจ่าย</span>
          <span className="summary-value">{formatBaht(totals.expense)}</span>
        </div>
        <div className="summary-card">
          <span className="summary-label">คงเหลือ</span>
          <span className={`summary-value ${totals.balance < 0 ? 'negative' : 'positive'}`}>
            {formatBaht(totals.balance)}
          </span>
        </div>
      </div>
    </section>
  );
}
