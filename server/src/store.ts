/**
 * File-backed record store.
 *
 * The ledger lives in memory for the life of the process; every append
 * rewrites the whole CSV file synchronously before returning.
 */
import fs from 'fs';
import path from 'path';
import type { Ledger, Transaction } from '../../src/domain/types.js';
import { decodeLedgerFile, parseLedgerCsv, serializeLedgerCsv } from './ledgerFile.js';

export class LedgerWriteError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to save ledger to ${filePath}: ${reason}`, { cause });
    this.name = 'LedgerWriteError';
    this.filePath = filePath;
  }
}

export interface LedgerStore {
  readonly filePath: string;
  load(): Ledger;
  appendAndSave(ledger: Ledger, record: Transaction): Ledger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function createFileStore(filePath: string): LedgerStore {
  function readBytes(): Uint8Array | null {
    try {
      return fs.readFileSync(filePath);
    } catch (error) {
      if (isMissingFile(error)) return null;
      console.warn(`[Ledger] Could not read ${filePath}, starting empty:`, error);
      return null;
    }
  }

  return {
    filePath,

    load(): Ledger {
      const bytes = readBytes();
      if (!bytes || bytes.length === 0) {
        console.log(`[Ledger] No data at ${filePath}, starting empty`);
        return [];
      }

      const text = decodeLedgerFile(bytes);
      if (text === null) {
        console.warn(`[Ledger] ${filePath} is neither UTF-8 nor TIS-620, starting empty`);
        return [];
      }

      const { ledger, invalidDates } = parseLedgerCsv(text);
      if (invalidDates > 0) {
        console.warn(`[Ledger] ${invalidDates} row(s) with unreadable dates kept as invalid`);
      }
      console.log(`[Ledger] Loaded ${ledger.length} transaction(s) from ${filePath}`);
      return ledger;
    },

    appendAndSave(ledger: Ledger, record: Transaction): Ledger {
      const next = [...ledger, record];
      try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, serializeLedgerCsv(next), 'utf8');
      } catch (error) {
        throw new LedgerWriteError(filePath, error);
      }
      return next;
    },
  };
}
