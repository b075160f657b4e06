/**
 * Application Entry Point
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Validate settings and backend ids (fails fast on missing or malformed configuration)
 * 3. Load the label and vocabulary tables
 * 4. Start Express server on configured port
 *
 * Shutdown (SIGTERM/SIGINT): stop accepting connections, then exit.
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { createApp } from './server/server.js';
import { appConfig, validateAppConfig } from './config.js';
import { createCrmGateway, validateConfig } from './crm/index.js';
import { loadNormalizerTables } from './parsing/index.js';

function main(): void {
  console.log('[startup] Sales notes intake starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');
  console.log('[startup] Steps:', appConfig.submission.steps);

  validateAppConfig();
  validateConfig();
  const tables = loadNormalizerTables();
  console.log(`[startup] Loaded ${tables.labels.size} labels, ${tables.paymentMethods.length} payment methods`);

  const app = createApp({ tables, gateway: createCrmGateway() });
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[shutdown] Received ${signal} — shutting down gracefully...`);
    server.close(() => {
      console.log('[shutdown] HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (err) {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
}
