import 'dotenv/config';
import { loadConfig } from './config';
import { Database, runMigrations } from './data';
import { createProviderRegistry, ProviderRegistry } from './providers';
import { CollectionOrchestrator, DEFAULT_ENTITIES } from './collection';
import { Scheduler, SchedulerRegistry, KOREA_SCOPES, usScope, createScopeJob } from './scheduler';
import { RatioCalculator, QualityChecker } from './analytics';
import { ControlServer } from './monitoring/control-server';
import type { CollectionScope, Config, Entity, Market } from './types';
import { logger } from './utils';

export class CollectorService {
  private readonly db: Database;
  private readonly registry: ProviderRegistry;
  private readonly orchestrator: CollectionOrchestrator;
  private readonly ratios: RatioCalculator;
  private readonly quality: QualityChecker;
  private readonly schedulers = new SchedulerRegistry();
  private readonly controlServer: ControlServer;
  private readonly cronByScope: Record<string, string>;

  constructor(private readonly config: Config) {
    this.db = new Database(config.database.url);
    this.registry = createProviderRegistry(config.providers);
    this.orchestrator = new CollectionOrchestrator(this.db, this.registry, {
      concurrency: config.collection.workerPoolSize,
      defaultWindowDays: config.collection.defaultWindowDays,
      statementStartYear: config.collection.statementStartYear,
    });
    this.ratios = new RatioCalculator(this.db);
    this.quality = new QualityChecker(this.db, {
      statementStartYear: config.collection.statementStartYear,
      timezone: config.scheduler.timezone,
    });

    this.cronByScope = {
      korea: config.scheduler.koreaCron,
      us: config.scheduler.usCron,
    };
    this.registerScope('korea', KOREA_SCOPES);
    this.registerScope('us', [usScope(config.collection.usTickers)]);

    this.controlServer = new ControlServer(
      {
        schedulers: this.schedulers,
        defaultCron: this.cronByScope,
        ratios: this.ratios,
        quality: this.quality,
        stats: this.db,
      },
      { apiKey: config.app.controlApiKey }
    );
  }

  private entitiesFor(scopes: CollectionScope[]): Entity[] {
    const markets = scopes.flatMap((s) => s.markets);
    const statements = markets.some((m) => this.registry.find('fetchStatement', m) !== null);
    return statements ? [...DEFAULT_ENTITIES, 'statements'] : [...DEFAULT_ENTITIES];
  }

  private registerScope(name: string, scopes: CollectionScope[]): void {
    const markets: Market[] = scopes.flatMap((s) => s.markets);
    const job = createScopeJob(this.orchestrator, scopes, {
      runOptions: {
        incremental: true,
        entities: this.entitiesFor(scopes),
        deadlineMs: this.config.collection.runDeadlineMs,
      },
      afterRun: this.config.scheduler.recalculateRatios
        ? async () => {
            for (const market of markets) {
              await this.ratios.calculateBatch({ market });
            }
          }
        : undefined,
    });

    this.schedulers.register(new Scheduler(name, job, { timezone: this.config.scheduler.timezone }));
  }

  async initialize(): Promise<void> {
    logger.info('System', 'Initializing collector...');
    await this.db.connect();
    const applied = await runMigrations(this.db.getPool());
    logger.info('System', 'Initialization complete', { migrationsApplied: applied.length });
  }

  async start(): Promise<void> {
    await this.controlServer.start(this.config.app.port);

    if (this.config.scheduler.enabled) {
      this.schedulers.startAll(this.cronByScope);
    } else {
      logger.info('System', 'Scheduler disabled (ENABLE_SCHEDULER=false)');
    }
    logger.info('System', 'Collector started', { scopes: this.schedulers.scopes() });
  }

  async stop(): Promise<void> {
    logger.info('System', 'Stopping collector...');
    this.schedulers.stopAll();
    await this.schedulers.drain();
    await this.controlServer.stop();
    await this.db.disconnect();
    logger.info('System', 'Collector stopped');
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.app.logLevel);
  const service = new CollectorService(config);

  const shutdown = (signal: string): void => {
    logger.info('System', `Received ${signal}, shutting down...`);
    service
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('System', 'Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await service.initialize();
  await service.start();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('System', 'Fatal error', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
