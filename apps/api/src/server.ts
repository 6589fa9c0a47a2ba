import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';

function main(): void {
  const config = loadConfig();
  const app = buildApp({ config });

  const server = app.listen(config.PORT, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.PORT}`);
    console.log(`[server] trip dataset: ${config.TRIP_DATA_PATH} (row limit ${config.TRIP_ROW_LIMIT})`);
  });

  const shutdown = () => {
    console.log('[server] shutting down...');
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

try {
  main();
} catch (err) {
  console.error('[server] fatal startup error', err);
  process.exit(1);
}
