export { Database } from './database';
export { runMigrations, DEFAULT_MIGRATIONS_DIR } from './migrations';
export type { CollectionStore, AnalyticsStore, TickerFilter } from './store';
export { REPORT_TYPE_ORDER, uniqueBySymbol, mergeTicker } from './store';
