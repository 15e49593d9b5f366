import path from 'path';
import { fileURLToPath } from 'url';
import * as z from 'zod/v4';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_LEDGER_FILE = path.join(__dirname, '../data/transactions.csv');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  LEDGER_FILE: z.string().trim().min(1).default(DEFAULT_LEDGER_FILE),
});

export interface ServerConfig {
  port: number;
  ledgerFile: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid server configuration: ${z.prettifyError(parsed.error)}`);
  }
  return {
    port: parsed.data.PORT,
    ledgerFile: path.resolve(parsed.data.LEDGER_FILE),
  };
}
