import cron from 'node-cron';

export interface TriggerHandle {
  stop(): void;
}

/** Registers `onFire` against a cron expression in the given timezone. */
export type TriggerFactory = (expression: string, onFire: () => void, timezone: string) => TriggerHandle;

export const cronTriggerFactory: TriggerFactory = (expression, onFire, timezone) => {
  const task = cron.schedule(expression, () => onFire(), {
    timezone,
    // Missed fires are picked up by the next run's incremental range
    recoverMissedExecutions: false,
  });
  return {
    stop: () => {
      task.stop();
    },
  };
};
