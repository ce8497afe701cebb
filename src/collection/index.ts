export { CollectionOrchestrator, DEFAULT_ENTITIES, DEFAULT_REPORT_TYPES, MARKET_TIMEZONES } from './orchestrator';
export type { OrchestratorOptions, RunOptions } from './orchestrator';
export { resolveRange, resolveFullWindow, resolveFiscalYears, DEFAULT_WINDOW_DAYS } from './range-resolver';
export { RunRecorder } from './run-summary';
export { listUniverse } from './universe';
export { runWorkerPool } from './worker-pool';
export type { WorkerPoolOptions, WorkerPoolResult, WorkerResult } from './worker-pool';
