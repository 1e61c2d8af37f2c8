import 'dotenv/config';
import { loadConfig } from './config/env.js';
import { startRuntime } from './runtime.js';

async function main() {
  const config = loadConfig();
  console.log('[server] vizvolt raw ingestion started');

  const runtime = await startRuntime(config);

  const shutdown = () => {
    console.log('[server] shutting down...');
    runtime
      .stop()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[server] shutdown error', err);
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
