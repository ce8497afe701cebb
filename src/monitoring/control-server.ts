import express, { Application, NextFunction, Request, Response } from 'express';
import { createServer, Server as HttpServer } from 'http';
import type { CollectionStats, Market, QualityReport, RatioBatchResult } from '../types';
import type { SchedulerRegistry } from '../scheduler/registry';
import type { Scheduler } from '../scheduler/scheduler';
import {
  logger,
  healthChecker,
  HealthChecker,
  apiKeyAuth,
  hashApiKey,
  isCollectionError,
  parseRequest,
  scopeParamSchema,
  startSchedulerSchema,
  recalculateRatiosSchema,
  qualityQuerySchema,
} from '../utils';

export interface ControlServerDeps {
  schedulers: SchedulerRegistry;
  /** Cron used by `start` when the request names none. */
  defaultCron: Record<string, string>;
  ratios: { calculateBatch(scope: { market?: Market; limit?: number }): Promise<RatioBatchResult> };
  quality: { report(query: { market?: Market; lookbackDays?: number }): Promise<QualityReport> };
  stats: { collectionStats(): Promise<CollectionStats> };
  health?: HealthChecker;
}

export interface ControlServerOptions {
  /** Without a key the /api routes answer 503. */
  apiKey: string | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/** HTTP surface for health, scheduler control, ratios, quality reports and collection stats. */
export class ControlServer {
  readonly app: Application;
  private httpServer: HttpServer | null = null;
  private readonly health: HealthChecker;

  constructor(private readonly deps: ControlServerDeps, options: ControlServerOptions) {
    this.app = express();
    this.health = deps.health ?? healthChecker;

    this.setupMiddleware();
    this.setupHealthRoutes();
    if (options.apiKey) {
      this.app.use('/api', apiKeyAuth(hashApiKey(options.apiKey)));
      this.setupApiRoutes();
    } else {
      logger.warn('Control', 'CONTROL_API_KEY not set; control API disabled');
      this.app.use('/api', (_req: Request, res: Response) => {
        res.status(503).json({ error: 'Control API disabled', code: 'CONTROL_API_DISABLED' });
      });
    }
    this.setupErrorHandler();
  }

  private setupMiddleware(): void {
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      res.on('finish', () => {
        logger.api(req.method, req.path, res.statusCode, Date.now() - start, { ip: req.ip });
      });
      next();
    });
    this.app.use(express.json());
  }

  private setupHealthRoutes(): void {
    this.app.get('/health', async (_req: Request, res: Response) => {
      try {
        const health = await this.health.checkAll();
        res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
      } catch (error) {
        res.status(503).json({
          status: 'unhealthy',
          error: errorMessage(error),
          timestamp: new Date().toISOString(),
        });
      }
    });

    this.app.get('/health/live', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });
  }

  private findScheduler(req: Request, res: Response): Scheduler | null {
    const params = parseRequest(scopeParamSchema, 'params', req, res);
    if (!params) return null;

    const scheduler = this.deps.schedulers.get(params.scope);
    if (!scheduler) {
      res.status(404).json({ error: `Unknown scope: ${params.scope}`, code: 'UNKNOWN_SCOPE' });
      return null;
    }
    return scheduler;
  }

  private setupApiRoutes(): void {
    this.app.get('/api/scheduler/status', (_req: Request, res: Response) => {
      res.json({ schedulers: this.deps.schedulers.status() });
    });

    this.app.post('/api/scheduler/:scope/start', (req: Request, res: Response) => {
      const scheduler = this.findScheduler(req, res);
      if (!scheduler) return;
      const body = parseRequest(startSchedulerSchema, 'body', req, res);
      if (!body) return;

      const expression = body.cron ?? this.deps.defaultCron[scheduler.scope];
      if (!expression) {
        res.status(400).json({ error: 'No cron expression given or configured', code: 'VALIDATION_ERROR' });
        return;
      }

      const status = scheduler.start(expression);
      logger.audit('scheduler.start', req.ip ?? 'unknown', { scope: scheduler.scope, cronExpression: expression });
      res.json(status);
    });

    this.app.post('/api/scheduler/:scope/stop', (req: Request, res: Response) => {
      const scheduler = this.findScheduler(req, res);
      if (!scheduler) return;

      const status = scheduler.stop();
      logger.audit('scheduler.stop', req.ip ?? 'unknown', { scope: scheduler.scope });
      res.json(status);
    });

    this.app.post('/api/scheduler/:scope/run', (req: Request, res: Response) => {
      const scheduler = this.findScheduler(req, res);
      if (!scheduler) return;

      const result = scheduler.runNow();
      logger.audit('scheduler.run', req.ip ?? 'unknown', { scope: scheduler.scope, result: result.status });
      if (result.status === 'already_running') {
        res.status(409).json(result);
        return;
      }
      res.status(202).json({ status: result.status, scope: result.scope, startedAt: result.startedAt });
    });

    this.app.post('/api/ratios/recalculate', async (req: Request, res: Response) => {
      const body = parseRequest(recalculateRatiosSchema, 'body', req, res);
      if (!body) return;

      try {
        const result = await this.deps.ratios.calculateBatch(body);
        res.json(result);
      } catch (error) {
        logger.error('Control', 'Ratio recalculation failed', { error: errorMessage(error) });
        res.status(500).json({ error: 'Ratio recalculation failed', code: 'INTERNAL_ERROR' });
      }
    });

    this.app.get('/api/quality/report', async (req: Request, res: Response) => {
      const query = parseRequest(qualityQuerySchema, 'query', req, res);
      if (!query) return;

      try {
        const report = await this.deps.quality.report(query);
        res.json(report);
      } catch (error) {
        logger.error('Control', 'Quality report failed', { error: errorMessage(error) });
        res.status(500).json({ error: 'Quality report failed', code: 'INTERNAL_ERROR' });
      }
    });

    this.app.get('/api/stats', async (_req: Request, res: Response) => {
      try {
        const stats = await this.deps.stats.collectionStats();
        res.json({ ...stats, generatedAt: new Date().toISOString() });
      } catch (error) {
        logger.error('Control', 'Collection stats failed', { error: errorMessage(error) });
        res.status(500).json({ error: 'Collection stats failed', code: 'INTERNAL_ERROR' });
      }
    });
  }

  private setupErrorHandler(): void {
    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      if (isCollectionError(err) && err.kind === 'config') {
        res.status(400).json({ error: err.message, code: err.reason.toUpperCase() });
        return;
      }
      logger.error('Control', 'Unhandled error', {
        error: err.message,
        path: req.path,
        method: req.method,
      });
      res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
    });
  }

  /** Resolves with the bound port once listening. */
  start(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = createServer(this.app);
      server.once('error', reject);
      server.listen(port, () => {
        const address = server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        logger.info('Control', `Server running on port ${boundPort}`);
        resolve(boundPort);
      });
      this.httpServer = server;
    });
  }

  stop(): Promise<void> {
    const server = this.httpServer;
    this.httpServer = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('Control', 'Server stopped');
        resolve();
      });
    });
  }
}
