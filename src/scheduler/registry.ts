import type { SchedulerStatus } from '../types';
import { logger } from '../utils';
import type { Scheduler } from './scheduler';

/** Process-wide set of per-scope schedulers. */
export class SchedulerRegistry {
  private schedulers = new Map<string, Scheduler>();

  register(scheduler: Scheduler): void {
    if (this.schedulers.has(scheduler.scope)) {
      throw new Error(`Scheduler already registered for scope ${scheduler.scope}`);
    }
    this.schedulers.set(scheduler.scope, scheduler);
  }

  get(scope: string): Scheduler | undefined {
    return this.schedulers.get(scope);
  }

  scopes(): string[] {
    return [...this.schedulers.keys()];
  }

  startAll(cronByScope: Record<string, string>): SchedulerStatus[] {
    const started: SchedulerStatus[] = [];
    for (const [scope, expression] of Object.entries(cronByScope)) {
      const scheduler = this.schedulers.get(scope);
      if (!scheduler) {
        logger.warn('Scheduler', `No scheduler registered for scope ${scope}`);
        continue;
      }
      started.push(scheduler.start(expression));
    }
    return started;
  }

  stopAll(): SchedulerStatus[] {
    return [...this.schedulers.values()].map((s) => s.stop());
  }

  status(): SchedulerStatus[] {
    return [...this.schedulers.values()].map((s) => s.status());
  }

  /** Waits for every in-flight run; used on shutdown after `stopAll`. */
  async drain(): Promise<void> {
    await Promise.all([...this.schedulers.values()].map((s) => s.waitForIdle()));
  }
}
