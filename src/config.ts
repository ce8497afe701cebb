import { z } from 'zod';
import type { Config, ProviderQuota } from './types';
import { ConfigError, cronExpressionSchema, describeIssues } from './utils';

type Env = Record<string, string | undefined>;

const MINUTE_MS = 60000;

export const DEFAULT_US_TICKERS = ['AAPL', 'MSFT', 'GOOGL', 'AMZN', 'NVDA', 'META', 'TSLA', 'JPM', 'V', 'JNJ'];

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key];
  if (value !== undefined && value !== '') {
    return value;
  }
  if (defaultValue === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`, { key });
  }
  return defaultValue;
}

function optionalEnvVar(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

const numericSettings = z.object({
  PORT: z.coerce.number().int().min(1).max(65535),
  DEFAULT_WINDOW_DAYS: z.coerce.number().int().min(1).max(3650),
  WORKER_POOL_SIZE: z.coerce.number().int().min(1).max(32),
  RUN_DEADLINE_MINUTES: z.coerce.number().min(0),
  STATEMENT_START_YEAR: z.coerce.number().int().min(1990).max(2100),
  KRX_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1),
  FINNHUB_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1),
  TWELVEDATA_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1),
  DART_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1),
});

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

function parseWith<T, In>(schema: z.ZodType<T, z.ZodTypeDef, In>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid ${what}`, { issues: describeIssues(result.error) });
  }
  return result.data;
}

function perMinute(maxRequests: number, minDelayMs?: number): ProviderQuota {
  return { maxRequests, windowMs: MINUTE_MS, minDelayMs };
}

function parseTickerList(raw: string): string[] {
  const symbols = raw
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
  return [...new Set(symbols)];
}

export function loadConfig(env: Env = process.env): Config {
  const numbers = parseWith(
    numericSettings,
    {
      PORT: getEnvVar(env, 'PORT', '3000'),
      DEFAULT_WINDOW_DAYS: getEnvVar(env, 'DEFAULT_WINDOW_DAYS', '365'),
      WORKER_POOL_SIZE: getEnvVar(env, 'WORKER_POOL_SIZE', '4'),
      RUN_DEADLINE_MINUTES: getEnvVar(env, 'RUN_DEADLINE_MINUTES', '0'),
      STATEMENT_START_YEAR: getEnvVar(env, 'STATEMENT_START_YEAR', '2015'),
      KRX_RATE_LIMIT_PER_MINUTE: getEnvVar(env, 'KRX_RATE_LIMIT_PER_MINUTE', '30'),
      FINNHUB_RATE_LIMIT_PER_MINUTE: getEnvVar(env, 'FINNHUB_RATE_LIMIT_PER_MINUTE', '60'),
      TWELVEDATA_RATE_LIMIT_PER_MINUTE: getEnvVar(env, 'TWELVEDATA_RATE_LIMIT_PER_MINUTE', '8'),
      DART_RATE_LIMIT_PER_MINUTE: getEnvVar(env, 'DART_RATE_LIMIT_PER_MINUTE', '600'),
    },
    'numeric settings'
  );

  const usTickers = parseTickerList(getEnvVar(env, 'US_TICKERS', DEFAULT_US_TICKERS.join(',')));

  return {
    database: {
      url: getEnvVar(env, 'DATABASE_URL'),
    },
    app: {
      port: numbers.PORT,
      nodeEnv: getEnvVar(env, 'NODE_ENV', 'development'),
      logLevel: parseWith(logLevelSchema, getEnvVar(env, 'LOG_LEVEL', 'info').toLowerCase(), 'LOG_LEVEL'),
      controlApiKey: optionalEnvVar(env, 'CONTROL_API_KEY'),
    },
    collection: {
      defaultWindowDays: numbers.DEFAULT_WINDOW_DAYS,
      workerPoolSize: numbers.WORKER_POOL_SIZE,
      runDeadlineMs: numbers.RUN_DEADLINE_MINUTES > 0 ? numbers.RUN_DEADLINE_MINUTES * MINUTE_MS : null,
      usTickers: usTickers.length > 0 ? usTickers : DEFAULT_US_TICKERS,
      statementStartYear: numbers.STATEMENT_START_YEAR,
    },
    scheduler: {
      enabled: getEnvVar(env, 'ENABLE_SCHEDULER', 'true').toLowerCase() === 'true',
      timezone: getEnvVar(env, 'SCHEDULER_TIMEZONE', 'Asia/Seoul'),
      koreaCron: parseWith(cronExpressionSchema, getEnvVar(env, 'KOREA_SCHEDULE', '0 18 * * 1-5'), 'KOREA_SCHEDULE'),
      usCron: parseWith(cronExpressionSchema, getEnvVar(env, 'US_SCHEDULE', '0 10 * * 1-5'), 'US_SCHEDULE'),
      recalculateRatios: getEnvVar(env, 'RECALCULATE_RATIOS_AFTER_RUN', 'true').toLowerCase() === 'true',
    },
    providers: {
      krx: { quota: perMinute(numbers.KRX_RATE_LIMIT_PER_MINUTE, 500) },
      finnhub: {
        apiKey: optionalEnvVar(env, 'FINNHUB_API_KEY'),
        quota: perMinute(numbers.FINNHUB_RATE_LIMIT_PER_MINUTE),
      },
      twelveData: {
        apiKey: optionalEnvVar(env, 'TWELVEDATA_API_KEY'),
        quota: perMinute(numbers.TWELVEDATA_RATE_LIMIT_PER_MINUTE),
      },
      dart: {
        apiKey: optionalEnvVar(env, 'DART_API_KEY'),
        corpCodesPath: getEnvVar(env, 'DART_CORP_CODES_PATH', 'data/dart-corp-codes.json'),
        quota: perMinute(numbers.DART_RATE_LIMIT_PER_MINUTE),
      },
    },
  };
}
