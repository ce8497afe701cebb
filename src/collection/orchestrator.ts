import { randomUUID } from 'crypto';
import type {
  CollectionScope,
  Country,
  DateRange,
  Entity,
  IsoDate,
  Market,
  ReportType,
  RunSummary,
  Ticker,
  TickerFailure,
  TickerOutcome,
  TimeSeriesEntity,
} from '../types';
import { MARKET_COUNTRY } from '../types';
import type { CollectionStore } from '../data/store';
import type { DataProvider } from '../providers/types';
import type { ProviderRegistry } from '../providers/registry';
import {
  CollectionError,
  DatabaseError,
  ErrorCode,
  ProviderUnavailableError,
  handleError,
  isSystemic,
  logger,
  todayIn,
} from '../utils';
import { DEFAULT_WINDOW_DAYS, resolveFiscalYears, resolveFullWindow, resolveRange } from './range-resolver';
import { RunRecorder } from './run-summary';
import { listUniverse } from './universe';
import { runWorkerPool } from './worker-pool';

export const MARKET_TIMEZONES: Record<Country, string> = {
  KR: 'Asia/Seoul',
  US: 'America/New_York',
};

export const DEFAULT_ENTITIES: readonly Entity[] = ['prices', 'snapshots'];
export const DEFAULT_REPORT_TYPES: readonly ReportType[] = ['annual'];

export interface OrchestratorOptions {
  concurrency?: number;
  defaultWindowDays?: number;
  statementStartYear?: number;
  /** Source of "now" for calendar dates; run timing always uses the wall clock. */
  clock?: () => Date;
}

export interface RunOptions {
  incremental: boolean;
  maxTickers?: number;
  entities?: readonly Entity[];
  /** Statement periods to collect; each is tracked incrementally on its own. */
  reportTypes?: readonly ReportType[];
  deadlineMs?: number | null;
  /** Refresh the scope's listings before enumerating the universe. */
  refreshSymbols?: boolean;
}

type EntityResult = { status: 'written'; count: number } | { status: 'current' };

interface RunContext {
  runId: string;
  scope: CollectionScope;
  options: RunOptions;
  recorder: RunRecorder;
  /** Providers short-circuited for the rest of the run, with the error that tripped them. */
  tripped: Map<string, CollectionError>;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function inRange(date: IsoDate, range: DateRange): boolean {
  return date >= range.from && date <= range.to;
}

/**
 * Drives one batch over a scope: optional listing refresh, universe
 * enumeration, then per-ticker units on a bounded worker pool. Each entity
 * of a ticker is resolved, fetched and written on its own, so one failure
 * never takes its siblings down.
 */
export class CollectionOrchestrator {
  private readonly concurrency: number;
  private readonly windowDays: number;
  private readonly statementStartYear: number;
  private readonly clock: () => Date;

  constructor(
    private readonly store: CollectionStore,
    private readonly registry: ProviderRegistry,
    options: OrchestratorOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 4;
    this.windowDays = options.defaultWindowDays ?? DEFAULT_WINDOW_DAYS;
    this.statementStartYear = options.statementStartYear ?? 2015;
    this.clock = options.clock ?? (() => new Date());
  }

  async runBatch(scope: CollectionScope, options: RunOptions): Promise<RunSummary> {
    const runId = `${scope.name}-${randomUUID().slice(0, 8)}`;
    const startedAt = new Date();
    const deadline = options.deadlineMs ? startedAt.getTime() + options.deadlineMs : null;
    const ctx: RunContext = {
      runId,
      scope,
      options,
      recorder: new RunRecorder(runId, scope.name, options.incremental, startedAt),
      tripped: new Map(),
    };

    logger.run('Batch started', {
      runId,
      scope: scope.name,
      markets: scope.markets,
      incremental: options.incremental,
      maxTickers: options.maxTickers,
      entities: options.entities ?? DEFAULT_ENTITIES,
      reportTypes: options.reportTypes ?? DEFAULT_REPORT_TYPES,
    });

    if (options.refreshSymbols ?? true) {
      await this.refreshSymbols(ctx);
    }

    const universe = await listUniverse(this.store, scope, options.maxTickers);
    logger.info('Orchestrator', `Universe resolved: ${universe.length} tickers`, { runId, scope: scope.name });

    const pool = await runWorkerPool(universe, (ticker) => this.collectTicker(ticker, ctx), {
      concurrency: this.concurrency,
      deadline,
    });

    for (const result of pool.results) {
      if (result.status === 'fulfilled') {
        ctx.recorder.recordOutcome(result.value);
      } else {
        const error = handleError(result.error);
        ctx.recorder.recordOutcome({
          symbol: result.item.symbol,
          status: 'failed',
          pricesWritten: 0,
          snapshotsWritten: 0,
          statementsWritten: 0,
          failures: [
            { symbol: result.item.symbol, entity: 'prices', reason: error.reason, kind: error.kind, message: error.message },
          ],
        });
      }
    }
    ctx.recorder.recordNotAttempted(pool.notStarted.length);
    if (pool.timedOut) {
      logger.warn('Orchestrator', 'Run deadline reached; remaining tickers not attempted', {
        runId,
        notAttempted: pool.notStarted.length,
      });
    }

    const summary = ctx.recorder.finish(new Date());
    logger.run('Batch finished', {
      runId,
      scope: scope.name,
      totalTickers: summary.totalTickers,
      succeeded: summary.succeeded,
      skipped: summary.skipped,
      failed: summary.failed,
      notAttempted: summary.notAttempted,
      pricesWritten: summary.pricesWritten,
      snapshotsWritten: summary.snapshotsWritten,
      statementsWritten: summary.statementsWritten,
      durationMs: summary.durationMs,
    });
    return summary;
  }

  // ===== SYMBOL REFRESH =====

  private async refreshSymbols(ctx: RunContext): Promise<void> {
    const filter = ctx.scope.symbols ? new Set(ctx.scope.symbols) : null;

    for (const market of ctx.scope.markets) {
      const lister = this.registry.find('listSymbols', market);
      if (!lister) {
        logger.debug('Orchestrator', `No listing source for ${market}; using stored universe`, { runId: ctx.runId });
        continue;
      }
      if (ctx.tripped.has(lister.name)) continue;

      try {
        const listed = await lister.listSymbols(market);
        const kept = filter ? listed.filter((t) => filter.has(t.symbol)) : listed;
        const written = await this.store.upsertTickers(kept);
        ctx.recorder.recordSymbolsRefreshed(written);

        // An empty listing is treated as a source problem, not a mass delisting
        if (!filter && listed.length > 0) {
          const inactive = await this.store.markInactive(
            market,
            listed.map((t) => t.symbol)
          );
          if (inactive > 0) {
            logger.info('Orchestrator', `Marked ${inactive} ${market} tickers inactive`, { runId: ctx.runId });
          }
        }
      } catch (error) {
        const failure = handleError(error);
        this.recordProviderFailure(ctx, lister, 'listSymbols', failure);
        if (isSystemic(failure)) {
          ctx.tripped.set(lister.name, failure);
        }
        logger.warn('Orchestrator', `Symbol refresh failed for ${market}; continuing with stored universe`, {
          runId: ctx.runId,
          provider: lister.name,
          reason: failure.reason,
        });
      }
    }
  }

  // ===== PER-TICKER UNIT =====

  private async collectTicker(ticker: Ticker, ctx: RunContext): Promise<TickerOutcome> {
    const entities = ctx.options.entities ?? DEFAULT_ENTITIES;
    const outcome: TickerOutcome = {
      symbol: ticker.symbol,
      status: 'succeeded',
      pricesWritten: 0,
      snapshotsWritten: 0,
      statementsWritten: 0,
      failures: [],
    };
    let current = 0;

    for (const entity of entities) {
      try {
        const result = await this.collectEntity(ticker, entity, ctx);
        if (result.status === 'current') {
          current++;
          continue;
        }
        if (entity === 'prices') outcome.pricesWritten += result.count;
        else if (entity === 'snapshots') outcome.snapshotsWritten += result.count;
        else outcome.statementsWritten += result.count;
      } catch (error) {
        outcome.failures.push(this.toFailure(ticker, entity, error));
      }
    }

    if (outcome.failures.length > 0) {
      outcome.status = 'failed';
      logger.warn('Orchestrator', `${ticker.symbol} failed`, {
        runId: ctx.runId,
        reason: outcome.failures[0].reason,
        message: outcome.failures[0].message,
      });
    } else if (current === entities.length) {
      outcome.status = 'skipped';
    }
    return outcome;
  }

  private toFailure(ticker: Ticker, entity: Entity, error: unknown): TickerFailure {
    const failure = handleError(error);
    const provider = failure.details?.provider;
    return {
      symbol: ticker.symbol,
      entity,
      reason: failure.reason,
      kind: failure.kind,
      message: failure.message,
      ...(typeof provider === 'string' ? { provider } : {}),
    };
  }

  private collectEntity(ticker: Ticker, entity: Entity, ctx: RunContext): Promise<EntityResult> {
    switch (entity) {
      case 'prices':
      case 'snapshots':
        return this.collectSeries(ticker, entity, ctx);
      case 'statements':
        return this.collectStatements(ticker, ctx);
    }
  }

  private today(market: Market): IsoDate {
    return todayIn(MARKET_TIMEZONES[MARKET_COUNTRY[market]], this.clock());
  }

  private async resolveSeriesRange(
    ticker: Ticker,
    entity: TimeSeriesEntity,
    earliest: IsoDate | null,
    ctx: RunContext
  ): Promise<DateRange | null> {
    const today = this.today(ticker.market);
    if (!ctx.options.incremental) {
      return resolveFullWindow(earliest, today, this.windowDays);
    }

    const lastDate = await this.persist(() => this.store.queryLastDate(ticker.symbol, entity), ticker, entity);
    const resolution = resolveRange(lastDate, earliest, today, this.windowDays);
    return resolution.kind === 'range' ? resolution.range : null;
  }

  private async collectSeries(ticker: Ticker, entity: TimeSeriesEntity, ctx: RunContext): Promise<EntityResult> {
    if (entity === 'prices') {
      const provider = this.registry.select('fetchOhlcv', ticker.market);
      const range = await this.resolveSeriesRange(ticker, entity, provider.earliestDate, ctx);
      if (!range) return { status: 'current' };

      const points = await this.callProvider(ctx, provider, 'fetchOhlcv', () => provider.fetchOhlcv(ticker, range));
      const rows = points.filter((p) => p.symbol === ticker.symbol && inRange(p.tradeDate, range));
      const count = await this.persist(() => this.store.upsertPricePoints(rows), ticker, entity);
      return { status: 'written', count };
    }

    const provider = this.registry.select('fetchSnapshot', ticker.market);
    const range = await this.resolveSeriesRange(ticker, entity, provider.earliestDate, ctx);
    if (!range) return { status: 'current' };

    const snapshots = await this.callProvider(ctx, provider, 'fetchSnapshot', () =>
      provider.fetchSnapshot(ticker, range)
    );
    const rows = snapshots.filter((s) => s.symbol === ticker.symbol && inRange(s.tradeDate, range));
    const count = await this.persist(() => this.store.upsertSnapshots(rows), ticker, entity);
    return { status: 'written', count };
  }

  private async collectStatements(ticker: Ticker, ctx: RunContext): Promise<EntityResult> {
    const provider = this.registry.select('fetchStatement', ticker.market);
    const currentYear = Number(this.today(ticker.market).slice(0, 4));
    let written = 0;
    let current = 0;
    const reportTypes = ctx.options.reportTypes ?? DEFAULT_REPORT_TYPES;

    for (const reportType of reportTypes) {
      // Annual reports are filed after year end; quarterlies during the year
      const endYear = reportType === 'annual' ? currentYear - 1 : currentYear;
      const lastYear = ctx.options.incremental
        ? await this.persist(() => this.store.queryLastFiscalYear(ticker.symbol, reportType), ticker, 'statements')
        : null;

      const resolution = resolveFiscalYears(lastYear, this.statementStartYear, endYear);
      if (resolution.kind === 'already_current' || resolution.years.length === 0) {
        current++;
        continue;
      }

      for (const fiscalYear of resolution.years) {
        try {
          const statement = await this.callProvider(ctx, provider, 'fetchStatement', () =>
            provider.fetchStatement(ticker, { fiscalYear, reportType })
          );
          await this.persist(() => this.store.upsertStatement(statement), ticker, 'statements');
          written++;
        } catch (error) {
          // Periods the filer never reported are gaps, not failures
          if (error instanceof CollectionError && error.code === ErrorCode.NO_DATA) {
            logger.debug('Orchestrator', `No ${fiscalYear} ${reportType} statement for ${ticker.symbol}`, {
              runId: ctx.runId,
            });
            continue;
          }
          throw error;
        }
      }
    }

    return current === reportTypes.length ? { status: 'current' } : { status: 'written', count: written };
  }

  // ===== PROVIDER AND STORE CALLS =====

  private async callProvider<R>(
    ctx: RunContext,
    provider: DataProvider,
    capability: string,
    call: () => Promise<R>
  ): Promise<R> {
    const trippedBy = ctx.tripped.get(provider.name);
    if (trippedBy) {
      throw new ProviderUnavailableError(provider.name, trippedBy);
    }

    try {
      return await call();
    } catch (error) {
      const failure = handleError(error);
      if (isSystemic(failure) && !ctx.tripped.has(provider.name)) {
        ctx.tripped.set(provider.name, failure);
        this.recordProviderFailure(ctx, provider, capability, failure);
        logger.provider(provider.name, 'Provider tripped for the rest of the run', {
          runId: ctx.runId,
          reason: failure.reason,
          message: failure.message,
        });
      }
      throw new CollectionError(failure.code, failure.message, { ...failure.details, provider: provider.name }, failure.isRetryable);
    }
  }

  private async persist<R>(write: () => Promise<R>, ticker: Ticker, entity: Entity): Promise<R> {
    try {
      return await write();
    } catch (error) {
      if (error instanceof CollectionError) throw error;
      throw new DatabaseError(`Failed to persist ${entity} for ${ticker.symbol}: ${describe(error)}`, {
        symbol: ticker.symbol,
        entity,
      }, ErrorCode.DB_QUERY_ERROR);
    }
  }

  private recordProviderFailure(ctx: RunContext, provider: DataProvider, capability: string, error: CollectionError): void {
    ctx.recorder.recordProviderFailure({
      provider: provider.name,
      capability,
      reason: error.reason,
      message: error.message,
      at: new Date().toISOString(),
    });
  }
}
