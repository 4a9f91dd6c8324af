/**
 * Gateway - wires the task registry, sample provider, worker and HTTP server
 */

import { createLogger } from '../utils/logger';
import { parseCorsOrigins, type AppConfig } from '../utils/config';
import { createTaskRegistry, type TaskRegistry } from '../queue/task-registry';
import { createOptimizationWorker, type OptimizationWorker } from '../queue/worker';
import { createFileSampleProvider } from '../samples/file-provider';
import type { SampleProvider } from '../samples/types';
import { createServer } from './server';

const logger = createLogger('gateway');

const PRUNE_INTERVAL_MS = 60_000;

export interface Gateway {
  registry: TaskRegistry;
  worker: OptimizationWorker;
  /** Resolves with the bound port. */
  start(): Promise<number>;
  stop(): Promise<void>;
}

export interface GatewayOptions {
  /** Replaces the file provider rooted at `config.samplesDir`. */
  provider?: SampleProvider;
  host?: string;
}

export function createGateway(config: AppConfig, options: GatewayOptions = {}): Gateway {
  const registry = createTaskRegistry();
  const provider = options.provider ?? createFileSampleProvider(config.samplesDir);
  const worker = createOptimizationWorker(
    { registry, provider },
    {
      concurrency: config.workerConcurrency,
      maxRetries: config.workerMaxRetries,
      retryDelayMs: config.workerRetryDelayMs,
      tolerance: config.optimizerTolerance,
    },
  );
  const server = createServer(
    {
      port: config.port,
      host: options.host,
      corsOrigins: parseCorsOrigins(config.corsOrigins),
      nodeEnv: config.nodeEnv,
    },
    { registry, worker },
  );

  let pruneInterval: ReturnType<typeof setInterval> | null = null;

  return {
    registry,
    worker,

    async start() {
      const port = await server.start();
      if (config.taskTtlMs > 0) {
        pruneInterval = setInterval(() => registry.prune(config.taskTtlMs), PRUNE_INTERVAL_MS);
        pruneInterval.unref();
      }
      logger.info({ port, provider: provider.name, samplesDir: config.samplesDir }, 'Gateway started');
      return port;
    },

    async stop() {
      if (pruneInterval) {
        clearInterval(pruneInterval);
        pruneInterval = null;
      }
      worker.stop();
      await worker.idle();
      await server.stop();
      logger.info('Gateway stopped');
    },
  };
}
