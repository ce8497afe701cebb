import type { ProviderFailure, RunSummary, TickerFailure, TickerOutcome } from '../types';

/** Accumulates ticker outcomes for one run and renders the RunSummary. */
export class RunRecorder {
  private succeeded = 0;
  private skipped = 0;
  private failed = 0;
  private notAttempted = 0;
  private pricesWritten = 0;
  private snapshotsWritten = 0;
  private statementsWritten = 0;
  private symbolsRefreshed = 0;
  private truncatedByDeadline = false;
  private readonly failures: TickerFailure[] = [];
  private readonly providerFailures: ProviderFailure[] = [];

  constructor(
    readonly runId: string,
    readonly scope: string,
    readonly incremental: boolean,
    readonly startedAt: Date
  ) {}

  recordOutcome(outcome: TickerOutcome): void {
    switch (outcome.status) {
      case 'succeeded':
        this.succeeded++;
        break;
      case 'skipped':
        this.skipped++;
        break;
      case 'failed':
        this.failed++;
        break;
      case 'not_attempted':
        this.notAttempted++;
        break;
    }
    this.pricesWritten += outcome.pricesWritten;
    this.snapshotsWritten += outcome.snapshotsWritten;
    this.statementsWritten += outcome.statementsWritten;
    this.failures.push(...outcome.failures);
  }

  recordNotAttempted(count: number): void {
    this.notAttempted += count;
    if (count > 0) {
      this.truncatedByDeadline = true;
    }
  }

  recordProviderFailure(failure: ProviderFailure): void {
    this.providerFailures.push(failure);
  }

  recordSymbolsRefreshed(count: number): void {
    this.symbolsRefreshed += count;
  }

  get totalTickers(): number {
    return this.succeeded + this.skipped + this.failed + this.notAttempted;
  }

  finish(finishedAt: Date): RunSummary {
    return {
      runId: this.runId,
      scope: this.scope,
      incremental: this.incremental,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - this.startedAt.getTime(),
      totalTickers: this.totalTickers,
      succeeded: this.succeeded,
      skipped: this.skipped,
      failed: this.failed,
      notAttempted: this.notAttempted,
      pricesWritten: this.pricesWritten,
      snapshotsWritten: this.snapshotsWritten,
      statementsWritten: this.statementsWritten,
      symbolsRefreshed: this.symbolsRefreshed,
      failures: [...this.failures],
      providerFailures: [...this.providerFailures],
      truncatedByDeadline: this.truncatedByDeadline,
    };
  }
}
