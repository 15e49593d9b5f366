import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createFileStore } from './store.js';

const config = loadConfig();
const store = createFileStore(config.ledgerFile);
const app = createApp(store);

app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
  console.log(`[Ledger] Persisting to ${store.filePath}`);
});
