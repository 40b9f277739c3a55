// ──────────────────────────────────────────
// Server entry point — env, first refresh, listen
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { createApp } from './app';

async function main() {
  const config = loadConfig();
  const { app, runtime } = createApp(config);

  await runtime.runOnce();
  runtime.start();

  const server = app.listen(config.PORT, () => {
    console.log(`[App] Listening on port ${config.PORT} (data: ${config.DATA_DIRS.join(', ')})`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('[App] Shutting down...');
    runtime.stop();
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err);
  process.exit(1);
});
