/**
 * Stock bot - entry point
 *
 * Loads configuration, starts the gateway and shuts it down on SIGINT/SIGTERM.
 */

import { ZodError } from 'zod';
import { createGateway } from './gateway/index';
import { loadConfig, loadEnvFiles } from './utils/config';
import { logger, setLogLevel } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 15_000;

function readConfig() {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ZodError) {
      for (const issue of err.issues) {
        logger.error(`Invalid configuration: ${issue.path.join('.') || 'env'}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  process.on('unhandledRejection', (reason) => logger.error({ reason }, 'Unhandled rejection'));
  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught exception');
    process.exit(1);
  });

  loadEnvFiles();
  const config = readConfig();
  setLogLevel(config.logLevel);

  logger.info({ products: config.products, timeZone: config.timeZone }, 'Starting stock bot...');
  const gateway = await createGateway(config);
  await gateway.start();
  logger.info('Stock bot is live');

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    try {
      await Promise.race([
        gateway.stop(),
        new Promise<void>((resolve) =>
          setTimeout(() => {
            logger.warn('Shutdown timeout');
            resolve();
          }, SHUTDOWN_TIMEOUT_MS).unref(),
        ),
      ]);
    } catch (e) {
      logger.error({ err: e }, 'Shutdown error');
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
  logger.error({ err }, 'Fatal error');
  process.exit(1);
});
