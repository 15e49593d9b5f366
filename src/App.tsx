import { useState, useEffect, useCallback, useMemo } from 'react';
import { getTransactions } from './api/client';
import { buildDashboard } from './domain/dashboard';
import type { Transaction } from './domain/types';
import { EntryForm } from './components/EntryForm';
import { TransactionTable } from './components/TransactionTable';
import { SummaryCards } from './components/SummaryCards';
import { CategoryBarChart } from './components/CategoryBarChart';
import './App.css';

function App() {
  const [transactions, setTransactions] = useState<Transaction[]>([]);
  const [loading, setLoading] = useState(true);
  const [loadError, setLoadError] = useState<string | null>(null);

  const fetchAll = useCallback(async () => {
    setLoading(true);
    try {
      setTransactions(await getTransactions());
      setLoadError(null);
    } catch (err) {
      console.error('Failed to load data:', err);
      setLoadError(err instanceof Error ? err.message : 'โหลดข้อมูลไม่สำเร็จ');
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void fetchAll();
  }, [fetchAll]);

  const dashboard = useMemo(() => buildDashboard(transactions), [transactions]);

  return (
    <div className="app-page">
      <header className="page-header">
        <h1 className="page-title">📊 ระบบบันทึกรายรับรายจ่าย</h1>
      </header>
      <main className="page-body">
        <EntryForm onEntryComplete={() => void fetchAll()} />

        {loadError && <p className="status error">{loadError}</p>}
        {loading && <p className="loading">กำลังโหลด...</p>}

        {!loading && !dashboard.isEmpty && (
          <>
            <div className="tables">
              <TransactionTable
                title="💰 ตารางรายรับ"
                emptyMessage="ไม่มีข้อมูลรายรับในขณะนี้"
                transactions={dashboard.income}
              />
              <TransactionTable
                title="💸 ตารางรายจ่าย"
                emptyMessage="ไม่มีข้อมูลรายจ่ายในขณะนี้"
                transactions={dashboard.expense}
              />
            </div>
            <SummaryCards totals={dashboard.totals} />
            <CategoryBarChart series={dashboard.chart} />
          </>
        )}
      </main>
    </div>
  );
}

export default App;
