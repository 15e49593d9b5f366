/**
 * Minimal API smoke check against a running server.
 * Run with: npm run smoke (requires `npm run dev:api`; appends one entry to the ledger file)
 */

const API_BASE = process.env.API_BASE ?? 'http://localhost:8787';

interface CheckResult {
  name: string;
  passed: boolean;
  error?: string;
}

const results: CheckResult[] = [];

async function check(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    results.push({ name, passed: true });
    console.log(`✓ ${name}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    results.push({ name, passed: false, error: message });
    console.log(`✗ ${name}: ${message}`);
  }
}

async function fetchJson(url: string, options?: RequestInit): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
  return { status: response.status, body: await response.json() };
}

async function runChecks(): Promise<void> {
  console.log('\n=== API Smoke Checks ===\n');

  await check('GET /health returns ok:true', async () => {
    const { body } = await fetchJson(`${API_BASE}/health`);
    if (typeof body !== 'object' || body === null || !('ok' in body) || body.ok !== true) {
      throw new Error('Expected ok:true');
    }
  });

  let countBefore = 0;
  await check('GET /transactions returns array', async () => {
    const { body } = await fetchJson(`${API_BASE}/transactions`);
    if (!Array.isArray(body)) throw new Error('Expected array');
    countBefore = body.length;
  });

  await check('POST /transactions rejects empty description', async () => {
    const { status } = await fetchJson(`${API_BASE}/transactions`, {
      method: 'POST',
      body: JSON.stringify({ date: '2024-01-15', type: 'รายจ่าย', category: 'ค่าอาหาร', description: ' ', amount: 50 }),
    });
    if (status !== 400) throw new Error(`Expected 400, got ${status}`);
  });

  await check('POST /transactions appends entry', async () => {
    const { status } = await fetchJson(`${API_BASE}/transactions`, {
      method: 'POST',
      body: JSON.stringify({
        date: '2024-01-15',
        type: 'รายจ่าย',
        category: 'ค่าอาหาร',
        description: `smoke-${Date.now()}`,
        amount: 50,
      }),
    });
    if (status !== 201) throw new Error(`Expected 201, got ${status}`);

    const { body } = await fetchJson(`${API_BASE}/transactions`);
    if (!Array.isArray(body) || body.length !== countBefore + 1) {
      throw new Error('Expected ledger to grow by one');
    }
  });

  await check('GET /summary returns totals', async () => {
    const { body } = await fetchJson(`${API_BASE}/summary`);
    if (typeof body !== 'object' || body === null || !('balance' in body) || typeof body.balance !== 'number') {
      throw new Error('Expected numeric balance');
    }
  });

  console.log('\n=== Summary ===');
  const passed = results.filter(r => r.passed).length;
  const failed = results.filter(r => !r.passed).length;
  console.log(`Passed: ${passed}, Failed: ${failed}`);

  if (failed > 0) {
    process.exit(1);
  }
}

async function checkApiReachable(): Promise<boolean> {
  try {
    const response = await fetch(`${API_BASE}/health`);
    return response.ok;
  } catch {
    return false;
  }
}

async function main(): Promise<void> {
  console.log('Checking if API server is running...');

  const reachable = await checkApiReachable();
  if (!reachable) {
    console.error(`\nError: API server not reachable at ${API_BASE}`);
    console.error('Please start the server with: npm run dev:api\n');
    process.exit(1);
  }

  await runChecks();
}

void main();
