/**
 * Optimization routes: submit a request, poll its status, fetch its result
 */
import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { Task, TaskRegistry, TaskStatus } from '../queue/task-registry';
import type { OptimizationWorker } from '../queue/worker';

const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'searching', 'optimizing', 'completed', 'failed'];

/** Form posts send '' for untouched fields. */
const optionalNumber = z.preprocess(
  (value) => (value === '' || value === null ? undefined : value),
  z.coerce.number().finite().nonnegative().optional(),
);

const optimizeSchema = z.object({
  name: z.string().trim().min(1, 'Please enter a product name').max(200),
  cost: optionalNumber,
  demand: optionalNumber,
});

export type OptimizeRequestBody = z.infer<typeof optimizeSchema>;

function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUSES.some((status) => status === value);
}

/** The subset of a task that is safe to serialize on every poll. */
export function toTaskStatus(task: Task) {
  return {
    taskId: task.id,
    status: task.status,
    productName: task.productName,
    createdAt: task.createdAt,
    startedAt: task.startedAt ?? null,
    completedAt: task.completedAt ?? null,
    productCount: task.productCount ?? null,
    error: task.error ?? null,
    failureKind: task.failureKind ?? null,
  };
}

export function createOptimizeRoutes(registry: TaskRegistry, worker: OptimizationWorker): Router {
  const router = Router();

  // POST /optimize: queue an optimization for a product
  router.post('/optimize', (req: Request, res: Response) => {
    const parsed = optimizeSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
      res.status(400).json({ error: message });
      return;
    }

    const { name, cost, demand } = parsed.data;
    const task = worker.submit({
      productName: name,
      cost,
      maxDemand: demand !== undefined && demand > 0 ? demand : undefined,
    });

    res.status(202).json({
      taskId: task.id,
      status: task.status,
      statusUrl: `/api/status/${task.id}`,
      resultsUrl: `/results/${task.id}`,
    });
  });

  // GET /api/tasks: recent tasks, optionally filtered by ?status=
  router.get('/api/tasks', (req: Request, res: Response) => {
    const status = req.query.status;
    if (status !== undefined && !isTaskStatus(status)) {
      res.status(400).json({ error: `Invalid status. Must be one of: ${TASK_STATUSES.join(', ')}` });
      return;
    }
    res.json({ tasks: registry.list(status).map(toTaskStatus) });
  });

  // GET /api/status/:taskId: poll a task
  router.get('/api/status/:taskId', (req: Request, res: Response) => {
    const task = registry.get(req.params.taskId);
    if (!task) {
      res.status(404).json({ error: 'Task not found' });
      return;
    }
    res.json(toTaskStatus(task));
  });

  // GET /results/:taskId: result of a completed task
  router.get('/results/:taskId', (req: Request, res: Response) => {
    const task = registry.get(req.params.taskId);
    if (!task) {
      res.status(404).json({ error: 'Task not found' });
      return;
    }
    if (task.status !== 'completed' || !task.result) {
      res.status(409).json({
        error: 'Results not available',
        status: task.status,
        reason: task.error ?? null,
      });
      return;
    }
    res.json({
      task: toTaskStatus(task),
      result: task.result,
      sampleStats: task.sampleStats ?? null,
    });
  });

  return router;
}
