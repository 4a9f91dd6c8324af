#!/usr/bin/env node
/**
 * optiprice CLI
 *
 * Commands:
 * - optiprice optimize <file>   Optimize the price for a local sample file
 * - optiprice serve              Start the HTTP API
 */

import { Command, InvalidArgumentError } from 'commander';
import { createGateway } from '../gateway/index';
import { runOptimization } from '../optimization/optimizer';
import { loadSampleFile } from '../samples/file-provider';
import { loadConfig, loadOptimizerTolerance } from '../utils/config';
import { logger, setLogLevel } from '../utils/logger';
import { formatResult } from './format';

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parsePort(value: string): string {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Not a valid port.');
  }
  return String(port);
}

program
  .name('optiprice')
  .description('Profit-maximizing price estimation from market samples')
  .version('0.1.0');

// ============================================================================
// optimize: run the optimizer on a sample file
// ============================================================================
program
  .command('optimize')
  .description('Estimate demand from a CSV or JSON sample file and find the optimum price')
  .argument('<file>', 'sample file with price and rating columns')
  .option('-c, --cost <n>', 'unit cost (default: 70% of the lowest price)', parseNumberOption)
  .option('-d, --demand <n>', 'maximum theoretical demand', parseNumberOption)
  .option('-t, --tolerance <n>', 'golden-section tolerance', parseNumberOption)
  .option('--json', 'print the result as JSON')
  .action(async (file: string, options: { cost?: number; demand?: number; tolerance?: number; json?: boolean }) => {
    // Keep pino off stdout while printing results, unless asked otherwise
    if (!process.env.LOG_LEVEL) {
      setLogLevel(options.json ? 'silent' : 'warn');
    }

    const samples = await loadSampleFile(file);
    const tolerance = options.tolerance ?? loadOptimizerTolerance();
    const result = runOptimization(samples.prices, samples.ratings, options.cost, options.demand, { tolerance });

    if (!result) {
      console.error('\x1b[31mOptimization failed: no result for these samples.\x1b[0m');
      process.exitCode = 1;
      return;
    }

    if (options.json) {
      console.log(JSON.stringify({ result, sampleStats: samples.stats }, null, 2));
    } else {
      console.log(formatResult(result, samples.stats));
    }
  });

// ============================================================================
// serve: start the HTTP API
// ============================================================================
program
  .command('serve')
  .description('Start the optiprice HTTP API')
  .option('-p, --port <port>', 'override PORT', parsePort)
  .action(async (options: { port?: string }) => {
    if (options.port) process.env.PORT = options.port;

    const config = loadConfig();
    const gateway = createGateway(config);
    const port = await gateway.start();
    logger.info({ port }, 'optiprice is running');

    let shuttingDown = false;
    const shutdown = async () => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info('Shutting down...');
      try {
        await Promise.race([
          gateway.stop(),
          new Promise<void>((resolve) => setTimeout(() => { logger.warn('Shutdown timeout'); resolve(); }, 15000)),
        ]);
      } catch (e) { logger.error({ err: e }, 'Shutdown error'); }
      process.exit(0);
    };
    process.on('SIGINT', () => { void shutdown(); });
    process.on('SIGTERM', () => { void shutdown(); });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`\x1b[31m${err instanceof Error ? err.message : String(err)}\x1b[0m`);
  process.exit(1);
});
