import { INVALID_DATE } from './types';

const bahtFmt = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** 1234.5 → "1,234.50 บาท" */
export function formatBaht(amount: number): string {
  return `${bahtFmt.format(amount)} บาท`;
}

/** YYYY-MM-DD → DD/MM/YYYY; unparseable dates show as "-" */
export function formatDisplayDate(date: string): string {
  if (date === INVALID_DATE) return '-';
  const [y, m, d] = date.split('-');
  if (!y || !m || !d) return date;
  return `${d}/${m}/${y}`;
}

/** Local calendar date as YYYY-MM-DD */
export function todayIso(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}
