/**
 * HTTP server for optiprice
 *
 * Middleware, in order:
 * - CORS (allowlist, or wildcard when none is configured)
 * - Security headers (nosniff, DENY)
 * - Request timeout (30s default)
 * - JSON and form body parsing
 * - Request logging (method, path, status, duration)
 * - Error-handling middleware
 */

import express, { Request, Response, NextFunction } from 'express';
import http from 'http';
import { createLogger } from '../utils/logger';
import { createOptimizeRoutes } from './optimize.routes';
import type { TaskRegistry } from '../queue/task-registry';
import type { OptimizationWorker } from '../queue/worker';

const logger = createLogger('server');

// =============================================================================
// CONFIG TYPES
// =============================================================================

export interface ServerConfig {
  port: number;
  /** Interface to bind. Defaults to 0.0.0.0 */
  host?: string;
  /** Allowed origins. Empty means wildcard without credentials. */
  corsOrigins?: string[];
  /** Request timeout in milliseconds. Defaults to 30000 (30s). */
  requestTimeoutMs?: number;
  /** Hide error messages from clients in production. */
  nodeEnv?: 'development' | 'production' | 'test';
}

export interface ServerDeps {
  registry: TaskRegistry;
  worker: OptimizationWorker;
}

export interface OptipriceServer {
  app: express.Express;
  server: http.Server;
  /** Resolves with the bound port. */
  start(): Promise<number>;
  stop(): Promise<void>;
}

// =============================================================================
// SERVER FACTORY
// =============================================================================

export function createServer(config: ServerConfig, deps: ServerDeps): OptipriceServer {
  const { registry, worker } = deps;
  const app = express();

  // ---------------------------------------------------------------------------
  // 1. CORS
  // ---------------------------------------------------------------------------
  const allowedOrigins = config.corsOrigins ?? [];

  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && allowedOrigins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Credentials', 'true');
    } else if (allowedOrigins.length === 0) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  });

  // ---------------------------------------------------------------------------
  // 2. Security headers
  // ---------------------------------------------------------------------------
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    next();
  });

  // ---------------------------------------------------------------------------
  // 3. Request timeout
  // ---------------------------------------------------------------------------
  const timeoutMs = config.requestTimeoutMs ?? 30_000;

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setTimeout(timeoutMs, () => {
      if (!res.headersSent) {
        res.status(408).json({ error: 'Request timeout' });
      }
    });
    next();
  });

  // ---------------------------------------------------------------------------
  // Body parsers (JSON API clients and plain HTML forms)
  // ---------------------------------------------------------------------------
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  // ---------------------------------------------------------------------------
  // 4. Request logging
  // ---------------------------------------------------------------------------
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      logger[level](
        { method: req.method, path: req.path, status: res.statusCode, duration },
        '%s %s %d %dms',
        req.method, req.path, res.statusCode, duration,
      );
    });
    next();
  });

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'optiprice',
      timestamp: Date.now(),
      tasks: registry.counts(),
      worker: worker.stats(),
    });
  });

  app.use(createOptimizeRoutes(registry, worker));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ---------------------------------------------------------------------------
  // 5. Error-handling middleware (must be last)
  // ---------------------------------------------------------------------------
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    // body-parser and http-errors attach the response status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;

    if (status >= 500) {
      logger.error({ err: err.message, stack: err.stack, method: req.method, path: req.path }, 'Unhandled error in request handler');
    } else {
      logger.warn({ err: err.message, method: req.method, path: req.path }, 'Rejected request');
    }

    if (res.headersSent) return;
    res.status(status).json({
      error: config.nodeEnv === 'production' && status >= 500 ? 'Internal server error' : err.message,
    });
  });

  // ---------------------------------------------------------------------------
  // Create HTTP server
  // ---------------------------------------------------------------------------
  const server = http.createServer(app);

  return {
    app,
    server,
    start(): Promise<number> {
      return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.port, config.host ?? '0.0.0.0', () => {
          const address = server.address();
          const port = typeof address === 'object' && address !== null ? address.port : config.port;
          logger.info({ port }, 'optiprice server started');
          resolve(port);
        });
      });
    },
    stop(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          logger.info('optiprice server stopped');
          resolve();
        });
      });
    },
  };
}
