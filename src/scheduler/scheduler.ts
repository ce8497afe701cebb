import type { RunNowResult, RunSummary, ScheduledRunRecord, SchedulerState, SchedulerStatus } from '../types';
import { ErrorCode, ValidationError, cronExpressionSchema, logger } from '../utils';
import { cronTriggerFactory } from './triggers';
import type { TriggerFactory, TriggerHandle } from './triggers';

export type RunTrigger = ScheduledRunRecord['trigger'];

/** One scheduled unit of work; may run several batches in sequence. */
export type ScheduledJob = (trigger: RunTrigger) => Promise<RunSummary[]>;

export interface SchedulerOptions {
  timezone?: string;
  triggerFactory?: TriggerFactory;
}

interface ActiveRun {
  trigger: RunTrigger;
  startedAt: string;
  completion: Promise<ScheduledRunRecord>;
}

/**
 * Stopped/Running state machine for one scope. At most one run is active at
 * a time: a second request while one is in flight gets `already_running`
 * back synchronously. Stopping removes the trigger but never cancels the
 * run in flight.
 */
export class Scheduler {
  private state: SchedulerState = 'stopped';
  private cronExpression: string | null = null;
  private trigger: TriggerHandle | null = null;
  private active: ActiveRun | null = null;
  private lastRun: ScheduledRunRecord | null = null;

  private readonly timezone: string;
  private readonly triggerFactory: TriggerFactory;

  constructor(
    readonly scope: string,
    private readonly job: ScheduledJob,
    options: SchedulerOptions = {}
  ) {
    this.timezone = options.timezone ?? 'Asia/Seoul';
    this.triggerFactory = options.triggerFactory ?? cronTriggerFactory;
  }

  start(cronExpression: string): SchedulerStatus {
    if (this.state === 'running') {
      logger.info('Scheduler', `${this.scope} already running; start ignored`, {
        cronExpression: this.cronExpression,
        requested: cronExpression,
      });
      return this.status();
    }

    const parsed = cronExpressionSchema.safeParse(cronExpression);
    if (!parsed.success) {
      throw new ValidationError(`Invalid cron expression: ${cronExpression}`, 'cron', { scope: this.scope }, ErrorCode.INVALID_CRON);
    }

    this.trigger = this.triggerFactory(parsed.data, () => this.onTrigger(), this.timezone);
    this.cronExpression = parsed.data;
    this.state = 'running';
    logger.info('Scheduler', `${this.scope} scheduled`, { cronExpression: parsed.data, timezone: this.timezone });
    return this.status();
  }

  stop(): SchedulerStatus {
    if (this.trigger) {
      this.trigger.stop();
      this.trigger = null;
    }
    if (this.state === 'running') {
      logger.info('Scheduler', `${this.scope} stopped`, { activeRun: this.active !== null });
    }
    this.state = 'stopped';
    this.cronExpression = null;
    return this.status();
  }

  runNow(): RunNowResult {
    return this.launch('manual');
  }

  status(): SchedulerStatus {
    return {
      scope: this.scope,
      state: this.state,
      cronExpression: this.cronExpression,
      activeRun: this.active !== null,
      activeRunStartedAt: this.active?.startedAt ?? null,
      lastRun: this.lastRun,
    };
  }

  /** Resolves once no run is in flight. */
  async waitForIdle(): Promise<void> {
    while (this.active) {
      await this.active.completion;
    }
  }

  private onTrigger(): void {
    const result = this.launch('cron');
    if (result.status === 'already_running') {
      logger.warn('Scheduler', `${this.scope} trigger skipped: previous run still active`, {
        activeRunStartedAt: result.activeRunStartedAt,
      });
    }
  }

  private launch(trigger: RunTrigger): RunNowResult {
    // Check-and-set happens before the first await, so no two callers can both pass
    if (this.active) {
      return { status: 'already_running', scope: this.scope, activeRunStartedAt: this.active.startedAt };
    }

    const startedAt = new Date().toISOString();
    const completion = this.execute(trigger, startedAt);
    this.active = { trigger, startedAt, completion };
    return { status: 'started', scope: this.scope, startedAt, completion };
  }

  private async execute(trigger: RunTrigger, startedAt: string): Promise<ScheduledRunRecord> {
    logger.run('Scheduled run started', { scope: this.scope, trigger });
    let record: ScheduledRunRecord;

    try {
      // Deferred so a job that throws synchronously still settles after `active` is set
      const summaries = await Promise.resolve().then(() => this.job(trigger));
      record = { trigger, startedAt, finishedAt: new Date().toISOString(), summaries };
      logger.run('Scheduled run finished', {
        scope: this.scope,
        trigger,
        runs: summaries.map((s) => s.runId),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      record = { trigger, startedAt, finishedAt: new Date().toISOString(), summaries: [], error: message };
      logger.error('Scheduler', `${this.scope} run failed`, { trigger, error: message });
    }

    this.active = null;
    this.lastRun = record;
    return record;
  }
}
