/**
 * Task Registry - in-memory status store for optimization requests
 *
 * Features:
 * - One record per task, keyed by a generated task ID
 * - Every update swaps in a new frozen record, so readers never observe a
 *   half-applied change
 * - Status transitions: pending -> searching -> optimizing -> completed | failed
 * - Age-based pruning of finished tasks
 */

import { createLogger } from '../utils/logger';
import { generateId } from '../utils/id';
import type { OptimizationFailureKind, OptimizationResult } from '../optimization/types';
import type { SampleStats } from '../samples/types';

const logger = createLogger('task-registry');

// =============================================================================
// TYPES
// =============================================================================

export type TaskStatus = 'pending' | 'searching' | 'optimizing' | 'completed' | 'failed';

export type TaskFailureKind = OptimizationFailureKind | 'NoProductData' | 'SampleFetchFailed' | 'Internal';

export interface Task {
  id: string;
  productName: string;
  status: TaskStatus;
  cost?: number;
  maxDemand?: number;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  productCount?: number;
  sampleStats?: SampleStats;
  result?: OptimizationResult;
  error?: string;
  failureKind?: TaskFailureKind;
}

export interface TaskCreateInput {
  productName: string;
  cost?: number;
  maxDemand?: number;
}

export type TaskPatch = Partial<Omit<Task, 'id' | 'productName' | 'createdAt'>>;

export interface TaskRegistry {
  /** Register a pending task. Returns the stored record. */
  create(input: TaskCreateInput): Task;

  get(taskId: string): Task | undefined;

  /** Tasks newest first, optionally filtered by status. */
  list(status?: TaskStatus): Task[];

  /** Apply a patch. Returns the new record, or undefined for an unknown ID. */
  update(taskId: string, patch: TaskPatch): Task | undefined;

  markFailed(taskId: string, error: string, failureKind?: TaskFailureKind): Task | undefined;

  /** Drop finished tasks older than maxAgeMs. Returns how many were removed. */
  prune(maxAgeMs: number): number;

  counts(): Record<TaskStatus, number>;
}

const FINISHED: ReadonlySet<TaskStatus> = new Set<TaskStatus>(['completed', 'failed']);

export function isFinished(status: TaskStatus): boolean {
  return FINISHED.has(status);
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createTaskRegistry(now: () => number = Date.now): TaskRegistry {
  const tasks = new Map<string, Task>();

  function store(task: Task): Task {
    const frozen = Object.freeze(task);
    tasks.set(task.id, frozen);
    return frozen;
  }

  const registry: TaskRegistry = {
    create(input: TaskCreateInput): Task {
      const task = store({
        id: generateId('task'),
        productName: input.productName,
        status: 'pending',
        cost: input.cost,
        maxDemand: input.maxDemand,
        createdAt: now(),
      });
      logger.info({ taskId: task.id, productName: task.productName }, 'Task created');
      return task;
    },

    get(taskId: string): Task | undefined {
      return tasks.get(taskId);
    },

    list(status?: TaskStatus): Task[] {
      return Array.from(tasks.values())
        .filter((t) => !status || t.status === status)
        .sort((a, b) => b.createdAt - a.createdAt);
    },

    update(taskId: string, patch: TaskPatch): Task | undefined {
      const current = tasks.get(taskId);
      if (!current) {
        logger.warn({ taskId }, 'Update for unknown task');
        return undefined;
      }
      if (isFinished(current.status)) {
        logger.warn({ taskId, status: current.status }, 'Ignoring update to finished task');
        return current;
      }

      const next: Task = { ...current, ...patch };
      if (patch.status === 'searching' && current.startedAt === undefined) {
        next.startedAt = now();
      }
      if (patch.status && isFinished(patch.status)) {
        next.completedAt = now();
      }

      if (patch.status && patch.status !== current.status) {
        logger.info({ taskId, from: current.status, to: patch.status }, 'Task status changed');
      }
      return store(next);
    },

    markFailed(taskId: string, error: string, failureKind?: TaskFailureKind): Task | undefined {
      return registry.update(taskId, { status: 'failed', error, failureKind });
    },

    prune(maxAgeMs: number): number {
      const cutoff = now() - maxAgeMs;
      let removed = 0;
      for (const task of tasks.values()) {
        if (isFinished(task.status) && (task.completedAt ?? task.createdAt) < cutoff) {
          tasks.delete(task.id);
          removed++;
        }
      }
      if (removed > 0) {
        logger.info({ removed }, 'Pruned finished tasks');
      }
      return removed;
    },

    counts(): Record<TaskStatus, number> {
      const counts: Record<TaskStatus, number> = {
        pending: 0,
        searching: 0,
        optimizing: 0,
        completed: 0,
        failed: 0,
      };
      for (const task of tasks.values()) {
        counts[task.status]++;
      }
      return counts;
    },
  };

  return registry;
}
