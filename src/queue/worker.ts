/**
 * Optimization Worker - runs optimization requests in the background
 *
 * Each submitted request becomes a task in the registry and waits for a free
 * slot in a fixed-size pool. A task fetches samples for its product, runs the
 * optimizer and records either the result or the reason it failed.
 *
 * Features:
 * - Bounded concurrency (default 2)
 * - Sample fetch retry with linear backoff (missing products are not retried)
 * - Failure kinds preserved on the task record
 */

import { createLogger } from '../utils/logger';
import { tryRunOptimization } from '../optimization/optimizer';
import { SampleNotFoundError } from '../samples/errors';
import type { SampleProvider, SampleSet } from '../samples/types';
import type { Task, TaskRegistry } from './task-registry';

const logger = createLogger('optimization-worker');

// =============================================================================
// TYPES
// =============================================================================

export interface WorkerConfig {
  /** Max tasks running at once. Default: 2 */
  concurrency: number;
  /** Attempts per sample fetch. Default: 2 */
  maxRetries: number;
  /** Base delay between fetch attempts in ms. Default: 500 */
  retryDelayMs: number;
  /** Golden-section tolerance passed to the optimizer. */
  tolerance?: number;
}

export interface WorkerDeps {
  registry: TaskRegistry;
  provider: SampleProvider;
}

export interface OptimizationRequest {
  productName: string;
  cost?: number;
  maxDemand?: number;
}

export interface WorkerStats {
  running: number;
  queued: number;
  concurrency: number;
}

export interface OptimizationWorker {
  /** Register a task for the request and schedule it. */
  submit(request: OptimizationRequest): Task;

  /** Resolves once nothing is running or queued. */
  idle(): Promise<void>;

  /** Stop accepting work; queued tasks are failed, running ones finish. */
  stop(): void;

  stats(): WorkerStats;
}

const DEFAULT_CONFIG: WorkerConfig = {
  concurrency: 2,
  maxRetries: 2,
  retryDelayMs: 500,
};

// =============================================================================
// HELPERS
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function fetchWithRetry(
  provider: SampleProvider,
  productName: string,
  maxRetries: number,
  retryDelayMs: number,
): Promise<SampleSet> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await provider.fetchSamples(productName);
    } catch (err) {
      if (err instanceof SampleNotFoundError || attempt >= maxRetries) {
        throw err;
      }
      logger.debug({ productName, attempt, error: errorMessage(err) }, 'Sample fetch failed, retrying');
      await sleep(retryDelayMs * attempt);
    }
  }
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createOptimizationWorker(
  deps: WorkerDeps,
  overrides: Partial<WorkerConfig> = {},
): OptimizationWorker {
  const config: WorkerConfig = { ...DEFAULT_CONFIG, ...overrides };
  const { registry, provider } = deps;

  const queue: string[] = [];
  let running = 0;
  let stopped = false;
  let idleWaiters: Array<() => void> = [];

  async function runTask(taskId: string): Promise<void> {
    const task = registry.update(taskId, { status: 'searching' });
    if (!task) return;

    let samples: SampleSet;
    try {
      samples = await fetchWithRetry(provider, task.productName, config.maxRetries, config.retryDelayMs);
    } catch (err) {
      if (err instanceof SampleNotFoundError) {
        registry.markFailed(taskId, 'No product data found', 'NoProductData');
      } else {
        logger.warn({ taskId, error: errorMessage(err) }, 'Sample fetch failed');
        registry.markFailed(taskId, errorMessage(err), 'SampleFetchFailed');
      }
      return;
    }

    if (samples.prices.length === 0 || samples.ratings.length === 0) {
      registry.markFailed(taskId, 'No product data found', 'NoProductData');
      return;
    }

    registry.update(taskId, {
      status: 'optimizing',
      productCount: samples.prices.length,
      sampleStats: samples.stats,
    });

    const outcome = tryRunOptimization(
      {
        prices: samples.prices,
        ratings: samples.ratings,
        cost: task.cost,
        maxTheoreticalDemand: task.maxDemand,
      },
      { tolerance: config.tolerance },
    );

    if (!outcome.ok) {
      registry.markFailed(taskId, `Optimization failed: ${outcome.error.message}`, outcome.error.kind);
      return;
    }

    registry.update(taskId, { status: 'completed', result: outcome.value });
  }

  function settleIdle(): void {
    if (running > 0 || queue.length > 0) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  function pump(): void {
    while (!stopped && running < config.concurrency && queue.length > 0) {
      const taskId = queue.shift();
      if (taskId === undefined) break;
      running++;

      runTask(taskId)
        .catch((err: unknown) => {
          logger.error({ err, taskId }, 'Task processing failed');
          registry.markFailed(taskId, errorMessage(err), 'Internal');
        })
        .finally(() => {
          running--;
          pump();
          settleIdle();
        });
    }
  }

  return {
    submit(request: OptimizationRequest): Task {
      if (stopped) {
        throw new Error('Worker is stopped');
      }
      const task = registry.create(request);
      queue.push(task.id);
      logger.info({ taskId: task.id, queued: queue.length, running }, 'Task queued');

      // Let the caller respond before work starts
      setImmediate(pump);
      return task;
    },

    idle(): Promise<void> {
      if (running === 0 && queue.length === 0) return Promise.resolve();
      return new Promise((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    stop(): void {
      if (stopped) return;
      stopped = true;
      for (const taskId of queue.splice(0)) {
        registry.markFailed(taskId, 'Worker stopped before the task started', 'Internal');
      }
      logger.info({ running }, 'Worker stopped');
      settleIdle();
    },

    stats(): WorkerStats {
      return { running, queued: queue.length, concurrency: config.concurrency };
    },
  };
}
