import { describe, it, expect } from 'vitest';
import {
  decodeLedgerFile,
  parseCsvRows,
  parseLedgerCsv,
  parseStoredDate,
  serializeLedgerCsv,
} from '../src/ledgerFile';
import { INVALID_DATE, type Transaction } from '../../src/domain/types';

const HEADER = 'วันที่,ประเภท,หมวดหมู่,รายละเอียด,จำนวนเงิน';

/** Encode ASCII and Thai text as TIS-620 bytes */
function tis620(text: string): Uint8Array {
  return Uint8Array.from(Array.from(text), (ch) => {
    const code = ch.charCodeAt(0);
    return code < 0x80 ? code : code - 0x0e01 + 0xa1;
  });
}

describe('parseCsvRows', () => {
  it('handles quotes, doubled quotes, CRLF and line breaks inside quotes', () => {
    const text = 'a,"b,c","d ""q"""\r\n\r\nx,"line1\nline2",z';
    expect(parseCsvRows(text)).toEqual([
      ['a', 'b,c', 'd "q"'],
      ['x', 'line1\nline2', 'z'],
    ]);
  });

  it('keeps empty trailing cells', () => {
    expect(parseCsvRows('a,,\n')).toEqual([['a', '', '']]);
  });
});

describe('parseStoredDate', () => {
  it('accepts ISO dates with or without a time part', () => {
    expect(parseStoredDate('2025-01-15')).toBe('2025-01-15');
    expect(parseStoredDate('2025-01-15 00:00:00')).toBe('2025-01-15');
    expect(parseStoredDate('2025/01/15')).toBe('2025-01-15');
  });

  it('marks unreadable dates as invalid', () => {
    expect(parseStoredDate('')).toBe(INVALID_DATE);
    expect(parseStoredDate('yesterday')).toBe(INVALID_DATE);
    expect(parseStoredDate('2025-02-30')).toBe(INVALID_DATE);
  });
});

describe('parseLedgerCsv', () => {
  it('reads rows by header name', () => {
    const text = `${HEADER}\n2025-01-15,รายรับ,เงินรายวัน,ค่าขนม,100.0\n`;
    expect(parseLedgerCsv(text)).toEqual({
      ledger: [{ date: '2025-01-15', type: 'รายรับ', category: 'เงินรายวัน', description: 'ค่าขนม', amount: 100 }],
      invalidDates: 0,
    });
  });

  it('keeps rows with bad dates and counts them', () => {
    const text = `${HEADER}\nnot-a-date,รายจ่าย,ค่าอาหาร,ข้าว,45\n2025-01-16,รายจ่าย,ค่าเดินทาง,รถเมล์,8\n`;
    const { ledger, invalidDates } = parseLedgerCsv(text);
    expect(invalidDates).toBe(1);
    expect(ledger.map((t) => t.date)).toEqual([INVALID_DATE, '2025-01-16']);
  });

  it('reads missing cells as empty and bad amounts as 0', () => {
    const { ledger } = parseLedgerCsv(`${HEADER}\n2025-01-15,รายจ่าย,,,\n2025-01-15,รายจ่าย,ค่าอาหาร,x,abc\n`);
    expect(ledger[0]).toEqual({ date: '2025-01-15', type: 'รายจ่าย', category: '', description: '', amount: 0 });
    expect(ledger[1].amount).toBe(0);
  });

  it('reads a header-only file as empty', () => {
    expect(parseLedgerCsv(`${HEADER}\n`).ledger).toEqual([]);
  });
});

describe('decodeLedgerFile', () => {
  it('strips the UTF-8 byte-order mark', () => {
    const bytes = new TextEncoder().encode(`\uFEFF${HEADER}\n`);
    expect(decodeLedgerFile(bytes)).toBe(`${HEADER}\n`);
  });

  it('falls back to TIS-620', () => {
    const text = `${HEADER}\n2025-01-15,รายจ่าย,ค่าอาหาร,ข้าว,45\n`;
    expect(decodeLedgerFile(tis620(text))).toBe(text);
  });
});

describe('serializeLedgerCsv', () => {
  it('writes BOM, header and quoted fields', () => {
    const ledger: Transaction[] = [
      { date: '2025-01-15', type: 'รายจ่าย', category: 'ค่าอาหาร', description: 'ข้าว, น้ำ "เย็น"', amount: 45.5 },
      { date: INVALID_DATE, type: 'รายรับ', category: 'เงินรายวัน', description: 'x', amount: 10 },
    ];
    expect(serializeLedgerCsv(ledger)).toBe(
      `\uFEFF${HEADER}\n` +
      '2025-01-15,รายจ่าย,ค่าอาหาร,"ข้าว, น้ำ ""เย็น""",45.5\n' +
      ',รายรับ,เงินรายวัน,x,10\n',
    );
  });

  it('reads back what it writes', () => {
    const ledger: Transaction[] = [
      { date: '2025-01-15', type: 'รายรับ', category: 'เงินรายวัน', description: 'a,b', amount: 100 },
      { date: '2025-01-16', type: 'รายจ่าย', category: 'ค่าเดินทาง', description: 'line1\nline2', amount: 12.25 },
    ];
    const text = decodeLedgerFile(new TextEncoder().encode(serializeLedgerCsv(ledger)));
    expect(text).not.toBeNull();
    expect(parseLedgerCsv(text ?? '').ledger).toEqual(ledger);
  });
});
