/**
 * optiprice - price optimization service
 *
 * Entry point - starts the HTTP gateway and the optimization worker
 */

import { createGateway } from './gateway/index';
import { loadConfig } from './utils/config';
import { logger } from './utils/logger';

async function main() {
  process.on('unhandledRejection', (reason) => logger.error({ reason }, 'Unhandled rejection'));
  process.on('uncaughtException', (error) => { logger.error({ error }, 'Uncaught exception'); process.exit(1); });

  logger.info('Starting optiprice...');
  const config = loadConfig();
  const gateway = createGateway(config);
  const port = await gateway.start();
  logger.info({ health: `http://localhost:${port}/health` }, 'optiprice is live');

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    try { await Promise.race([gateway.stop(), new Promise<void>(r => setTimeout(r, 15000))]); }
    catch (e) { logger.error({ err: e }, 'Shutdown error'); }
    process.exit(0);
  };
  process.on('SIGINT', () => { void shutdown(); });
  process.on('SIGTERM', () => { void shutdown(); });
}

main().catch((err) => { logger.error({ err }, 'Fatal error'); process.exit(1); });
