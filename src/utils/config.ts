/**
 * Configuration loading for optiprice
 *
 * Reads .env from the working directory, then validates process.env
 * through a zod schema. Invalid values fail fast at startup.
 */

import { homedir } from 'os';
import { resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

const toleranceSchema = z.coerce.number().positive().default(0.001);

const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(5000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.string().default('info'),
  samplesDir: z.string().min(1).default('./data/samples').transform(resolveUserPath),
  workerConcurrency: z.coerce.number().int().min(1).max(32).default(2),
  workerMaxRetries: z.coerce.number().int().min(1).max(10).default(2),
  workerRetryDelayMs: z.coerce.number().int().min(0).default(500),
  optimizerTolerance: toleranceSchema,
  /** Finished tasks older than this are pruned. 0 keeps them forever. */
  taskTtlMs: z.coerce.number().int().min(0).default(3_600_000),
  corsOrigins: z.string().default(''),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    samplesDir: env.SAMPLES_DIR,
    workerConcurrency: env.WORKER_CONCURRENCY,
    workerMaxRetries: env.WORKER_MAX_RETRIES,
    workerRetryDelayMs: env.WORKER_RETRY_DELAY_MS,
    optimizerTolerance: env.OPTIMIZER_TOLERANCE,
    taskTtlMs: env.TASK_TTL_MS,
    corsOrigins: env.CORS_ORIGINS,
  });
}

/** Split the comma-separated CORS_ORIGINS value; empty means wildcard. */
export function parseCorsOrigins(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

/**
 * Read only OPTIMIZER_TOLERANCE, for offline commands that have no use for
 * the server settings.
 */
export function loadOptimizerTolerance(env: NodeJS.ProcessEnv = process.env): number {
  return toleranceSchema.parse(env.OPTIMIZER_TOLERANCE);
}
