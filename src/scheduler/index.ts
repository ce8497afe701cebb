export { Scheduler } from './scheduler';
export type { ScheduledJob, SchedulerOptions, RunTrigger } from './scheduler';
export { SchedulerRegistry } from './registry';
export { cronTriggerFactory } from './triggers';
export type { TriggerFactory, TriggerHandle } from './triggers';
export { KOREA_SCOPES, usScope, createScopeJob } from './jobs';
export type { BatchRunner, ScopeJobOptions } from './jobs';
