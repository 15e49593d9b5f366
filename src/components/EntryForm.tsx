import { useReducer, useState } from 'react';
import { createTransaction } from '../api/client';
import { allTxTypes, categoryOptions, isTxType } from '../domain/categories';
import { canSubmit, entryFormReducer, initialFormState, toTransactionInput } from '../domain/entryForm';
import { todayIso } from '../domain/format';

interface EntryFormProps {
  onEntryComplete: () => void;
}

export function EntryForm({ onEntryComplete }: EntryFormProps) {
  const [{ draft, success }, dispatch] = useReducer(entryFormReducer, todayIso(), initialFormState);
  const [saving, setSaving] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    if (!canSubmit(draft)) return;

    setSaving(true);
    setError(null);
    dispatch({ kind: 'submitStarted' });

    try {
      await createTransaction(toTransactionInput(draft));
      dispatch({ kind: 'saved' });
      onEntryComplete();
    } catch (err) {
      setError(err instanceof Error ? err.message : 'บันทึกข้อมูลไม่สำเร็จ');
    } finally {
      setSaving(false);
    }
  };

  return (
    <section className="entry-form">
      <h2>บันทึกรายการใหม่</h2>
      <form onSubmit={(e) => void handleSubmit(e)}>
        <div className="form-grid">
          <div className="form-row">
            <label htmlFor="entry-date">วันที่</label>
            <input
              id="entry-date"
              type="date"
              value={draft.date}
              onChange={(e) => dispatch({ kind: 'edit', patch: { date: e.target.value } })}
              required
            />
          </div>
          <div className="form-row">
            <label htmlFor="entry-type">ประเภท</label>
            <select
              id="entry-type"
              value={draft.type}
              onChange={(e) => {
                const next = e.target.value;
                if (isTxType(next)) dispatch({ kind: 'changeType', type: next });
              }}
            >
              {allTxTypes().map((t) => (
                <option key={t} value={t}>{t}</option>
              ))}
            </select>
          </div>
        </div>
        <div className="form-row">
          <label htmlFor="entry-category">หมวดหมู่</label>
          <select
            id="entry-category"
            value={draft.category}
            onChange={(e) => dispatch({ kind: 'edit', patch: { category: e.target.value } })}
          >
            {categoryOptions(draft.type).map((cat) => (
              <option key={cat} value={cat}>{cat}</option>
            ))}
          </select>
        </div>
        <div className="form-row">
          <label htmlFor="entry-description">รายละเอียด</label>
          <input
            id="entry-description"
            type="text"
            value={draft.description}
            onChange={(e) => dispatch({ kind: 'edit', patch: { description: e.target.value } })}
          />
        </div>
        <div className="form-row">
          <label htmlFor="entry-amount">จำนวนเงิน</label>
          <input
            id="entry-amount"
            type="number"
            min="0"
            step="1"
            value={draft.amount}
            onChange={(e) => dispatch({ kind: 'edit', patch: { amount: e.target.valueAsNumber || 0 } })}
          />
        </div>
        <p className="form-hint">กดปุ่มด้านล่างเพื่อบันทึกข้อมูล</p>
        <button type="submit" disabled={saving || !canSubmit(draft)}>
          {saving ? 'กำลังบันทึก...' : 'บันทึกข้อมูล'}
        </button>
      </form>
      {error && <p className="status error">{error}</p>}
      {success && <p className="status success">บันทึกข้อมูลเรียบร้อย! ✅</p>}
    </section>
  );
}
