/**
 * clipkeep daemon entry point.
 *
 * Starts the service container (which starts the monitor loop when enabled)
 * and shuts it down on SIGINT/SIGTERM. The data directory comes from
 * CLIPKEEP_DATA_DIR, defaulting to ~/.clipkeep.
 */

import { ServiceContainer } from './services/service-container';
import { createLogger } from './services/logger';

const log = createLogger('Main');

// ─── Global error handlers ───
process.on('unhandledRejection', (reason) => {
  log.error('Unhandled promise rejection:', reason);
});

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception:', error);
});

const container = new ServiceContainer();
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`Received ${signal}, shutting down`);
  await container.shutdown();
  process.exitCode = 0;
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error('Shutdown failed:', err);
      process.exitCode = 1;
    });
  });
}

async function main(): Promise<void> {
  try {
    await container.init();
  } catch (err) {
    await container.shutdown();
    throw err;
  }
  const status = container.get('clipboard').getStatus();
  log.info(`clipkeep running: ${status.total} items (${status.pinned} pinned)`);
}

main().catch((err: unknown) => {
  log.error('Startup failed:', err);
  process.exitCode = 1;
});
