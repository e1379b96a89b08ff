/**
 * Server entry point
 *
 * Flow:
 * 1. Load and validate configuration from the environment
 * 2. Start the cache store, scheduler and stream server
 * 3. SIGINT/SIGTERM: drain sessions, stop the scheduler, close the store
 * 4. SIGUSR1: rescan the source directory now
 *
 * Configuration and storage failures at startup exit with status 1, and so
 * does a storage failure while running, once everything is stopped.
 */

import { loadConfig } from '@config/app-config';
import { getErrorMessage, isFatalError } from '@utils/errors';
import { logger } from '@utils/logger';
import { startApp } from './app';

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  if (config.logLevel) {
    logger.setLevel(config.logLevel);
  }

  const app = await startApp(config, {
    onFatal: () => process.exit(1),
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info('app', 'Shutting down', { signal });
    app.stop().catch((error: unknown) => {
      logger.error('app', 'Shutdown failed', { error: getErrorMessage(error) });
      process.exitCode = 1;
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  process.on('SIGUSR1', () => {
    logger.info('app', 'Rescan requested');
    app.scheduler.triggerScan();
  });
}

main().catch((error: unknown) => {
  logger.error('app', isFatalError(error) ? 'Fatal error during startup' : 'Startup failed', {
    error: getErrorMessage(error),
  });
  process.exit(1);
});
