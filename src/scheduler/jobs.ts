import type { CollectionScope, RunSummary } from '../types';
import type { RunOptions } from '../collection/orchestrator';
import { logger } from '../utils';
import type { ScheduledJob } from './scheduler';

export const KOREA_SCOPES: CollectionScope[] = [
  { name: 'kospi', markets: ['KOSPI'] },
  { name: 'kosdaq', markets: ['KOSDAQ'] },
];

export function usScope(tickers: string[]): CollectionScope {
  return { name: 'us', markets: ['NASDAQ', 'NYSE'], symbols: tickers };
}

export interface BatchRunner {
  runBatch(scope: CollectionScope, options: RunOptions): Promise<RunSummary>;
}

export interface ScopeJobOptions {
  runOptions: RunOptions;
  /** Runs after the batches, e.g. ratio recalculation; its failure is logged, not propagated. */
  afterRun?: (summaries: RunSummary[]) => Promise<void>;
}

/** Runs each scope's batch in order and collects the summaries. */
export function createScopeJob(runner: BatchRunner, scopes: CollectionScope[], options: ScopeJobOptions): ScheduledJob {
  return async (trigger) => {
    const summaries: RunSummary[] = [];
    for (const scope of scopes) {
      summaries.push(await runner.runBatch(scope, options.runOptions));
    }

    if (options.afterRun) {
      try {
        await options.afterRun(summaries);
      } catch (error) {
        logger.error('Scheduler', 'Post-run step failed', {
          trigger,
          scopes: scopes.map((s) => s.name),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return summaries;
  };
}
