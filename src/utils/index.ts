export { logger, Logger, isLogLevel } from './logger';
export type { LogLevel, LogEntry, LoggerOptions } from './logger';
export {
  CollectionError,
  NetworkError,
  RateLimitError,
  UpstreamError,
  AuthenticationError,
  QuotaExhaustedError,
  SymbolNotFoundError,
  NoDataError,
  MalformedResponseError,
  ProviderUnavailableError,
  CapabilityUnsupportedError,
  ValidationError,
  ConfigError,
  DatabaseError,
  AlreadyRunningError,
  ErrorCode,
  handleError,
  isCollectionError,
  isSystemic,
} from './errors';
export { RateLimiter } from './rate-limiter';
export type { RateLimitConfig } from './rate-limiter';
export {
  withRetry,
  retry,
  isRetryable,
  calculateDelay,
  DEFAULT_RETRY_CONFIG,
} from './retry';
export type { RetryConfig, RetryResult } from './retry';
export {
  healthChecker,
  HealthChecker,
  createDatabaseHealthCheck,
  createProviderHealthCheck,
} from './health-checker';
export type { ComponentHealth, SystemHealth, HealthCheckFn, HealthStatus, ProviderLoad } from './health-checker';
export { hashApiKey, validateApiKey, apiKeyAuth, extractApiKey } from './auth';
export {
  parseRequest,
  describeIssues,
  marketSchema,
  entitySchema,
  reportTypeSchema,
  cronExpressionSchema,
  scopeParamSchema,
  startSchedulerSchema,
  recalculateRatiosSchema,
  qualityQuerySchema,
  runBatchOptionsSchema,
} from './validation';
export type {
  FieldIssue,
  StartSchedulerBody,
  RecalculateRatiosBody,
  QualityQuery,
  RunBatchOptionsInput,
} from './validation';
export * from './dates';
