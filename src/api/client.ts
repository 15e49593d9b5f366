import type { Transaction, TransactionInput } from '../domain/types';

const API_BASE = '/api';

async function errorMessage(response: Response, fallback: string): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
      return body.error;
    }
  } catch (err) {
    console.warn('[API] Non-JSON error response:', err);
  }
  return fallback;
}

export async function getTransactions(): Promise<Transaction[]> {
  const response = await fetch(`${API_BASE}/transactions`);
  if (!response.ok) throw new Error(await errorMessage(response, 'Failed to fetch transactions'));
  return response.json();
}

export async function createTransaction(data: TransactionInput): Promise<Transaction> {
  const response = await fetch(`${API_BASE}/transactions`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(data),
  });
  if (!response.ok) {
    throw new Error(await errorMessage(response, 'Failed to create transaction'));
  }
  return response.json();
}
