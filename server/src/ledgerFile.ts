/**
 * Ledger CSV file format.
 *
 * Header: วันที่,ประเภท,หมวดหมู่,รายละเอียด,จำนวนเงิน (date, type, category,
 * description, amount). Written as UTF-8 with a BOM; older files saved as
 * TIS-620 are still readable.
 */
import { INVALID_DATE, type Ledger, type Transaction } from '../../src/domain/types.js';

export const LEDGER_COLUMNS = ['วันที่', 'ประเภท', 'หมวดหมู่', 'รายละเอียด', 'จำนวนเงิน'] as const;

const BOM = '\uFEFF';

/**
 * Decode file bytes, trying UTF-8 first, then TIS-620 (windows-874).
 * Returns null when neither decodes cleanly.
 */
export function decodeLedgerFile(bytes: Uint8Array): string | null {
  for (const label of ['utf-8', 'windows-874']) {
    try {
      // the UTF-8 decoder drops a leading BOM itself
      return new TextDecoder(label, { fatal: true }).decode(bytes);
    } catch {
      // not this encoding, try the next one
    }
  }
  return null;
}

/**
 * Split CSV text into rows. Handles quoted fields, doubled quotes and
 * line breaks inside quotes. Blank lines are skipped.
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;

  const endRow = () => {
    row.push(current);
    current = '';
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(current);
      current = '';
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') i++;
      endRow();
    } else {
      current += char;
    }
  }
  if (current !== '' || row.length > 0) endRow();

  return rows;
}

/**
 * Parse a stored date. Accepts YYYY-MM-DD and YYYY/MM/DD, optionally followed
 * by a time part. Anything else, including impossible calendar dates,
 * becomes INVALID_DATE.
 */
export function parseStoredDate(raw: string): string {
  const match = /^(\d{4})[-/](\d{2})[-/](\d{2})(?:[ T]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?$/.exec(raw.trim());
  if (!match) return INVALID_DATE;

  const [, y, m, d] = match;
  const check = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (
    check.getUTCFullYear() !== Number(y) ||
    check.getUTCMonth() !== Number(m) - 1 ||
    check.getUTCDate() !== Number(d)
  ) {
    return INVALID_DATE;
  }
  return `${y}-${m}-${d}`;
}

function parseStoredAmount(raw: string): number {
  const amount = Number.parseFloat(raw.trim().replace(/,/g, ''));
  return Number.isFinite(amount) ? amount : 0;
}

export interface ParseResult {
  ledger: Transaction[];
  invalidDates: number;
}

/**
 * Parse ledger CSV text. Columns are looked up by header name; a missing
 * column reads as empty for every row.
 */
export function parseLedgerCsv(text: string): ParseResult {
  const rows = parseCsvRows(text);
  if (rows.length === 0) return { ledger: [], invalidDates: 0 };

  const header = rows[0].map((col) => col.trim());
  const [dateIdx, typeIdx, categoryIdx, descIdx, amountIdx] = LEDGER_COLUMNS.map((name) => header.indexOf(name));
  const cell = (row: string[], idx: number): string => (idx === -1 ? '' : row[idx] ?? '');

  const ledger: Transaction[] = [];
  let invalidDates = 0;

  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    const date = parseStoredDate(cell(row, dateIdx));
    if (date === INVALID_DATE) invalidDates++;

    ledger.push({
      date,
      type: cell(row, typeIdx).trim(),
      category: cell(row, categoryIdx),
      description: cell(row, descIdx),
      amount: parseStoredAmount(cell(row, amountIdx)),
    });
  }

  return { ledger, invalidDates };
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Serialize the whole ledger, BOM and header included */
export function serializeLedgerCsv(ledger: Ledger): string {
  const lines = [LEDGER_COLUMNS.join(',')];
  for (const t of ledger) {
    lines.push([
      t.date === INVALID_DATE ? '' : t.date,
      t.type,
      t.category,
      t.description,
      String(t.amount),
    ].map(escapeField).join(','));
  }
  return BOM + lines.join('\n') + '\n';
}
