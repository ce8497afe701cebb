import type { ErrorKind } from '../types';

export enum ErrorCode {
  // Network errors (1xxx)
  NETWORK_ERROR = 1001,
  API_TIMEOUT = 1002,
  RATE_LIMITED = 1003,
  CONNECTION_FAILED = 1004,
  UPSTREAM_ERROR = 1005,

  // Authentication and quota errors (2xxx)
  AUTH_REQUIRED = 2001,
  INVALID_API_KEY = 2002,
  QUOTA_EXHAUSTED = 2003,

  // Validation errors (3xxx)
  VALIDATION_ERROR = 3001,
  INVALID_SYMBOL = 3002,
  INVALID_CRON = 3003,

  // Provider data errors (4xxx)
  SYMBOL_NOT_FOUND = 4001,
  NO_DATA = 4002,
  PROVIDER_UNAVAILABLE = 4003,
  CAPABILITY_UNSUPPORTED = 4004,
  MALFORMED_RESPONSE = 4005,

  // Database errors (5xxx)
  DB_CONNECTION_ERROR = 5001,
  DB_QUERY_ERROR = 5002,
  DB_TRANSACTION_ERROR = 5003,

  // System errors (6xxx)
  SYSTEM_ERROR = 6001,
  CONFIG_ERROR = 6002,
  INITIALIZATION_ERROR = 6003,
  RUN_ALREADY_ACTIVE = 6004,
}

const KIND_BY_CODE: Record<ErrorCode, ErrorKind> = {
  [ErrorCode.NETWORK_ERROR]: 'transient',
  [ErrorCode.API_TIMEOUT]: 'transient',
  [ErrorCode.RATE_LIMITED]: 'transient',
  [ErrorCode.CONNECTION_FAILED]: 'transient',
  [ErrorCode.UPSTREAM_ERROR]: 'transient',
  [ErrorCode.AUTH_REQUIRED]: 'systemic',
  [ErrorCode.INVALID_API_KEY]: 'systemic',
  [ErrorCode.QUOTA_EXHAUSTED]: 'systemic',
  [ErrorCode.VALIDATION_ERROR]: 'config',
  [ErrorCode.INVALID_SYMBOL]: 'permanent',
  [ErrorCode.INVALID_CRON]: 'config',
  [ErrorCode.SYMBOL_NOT_FOUND]: 'permanent',
  [ErrorCode.NO_DATA]: 'permanent',
  [ErrorCode.PROVIDER_UNAVAILABLE]: 'systemic',
  [ErrorCode.CAPABILITY_UNSUPPORTED]: 'permanent',
  [ErrorCode.MALFORMED_RESPONSE]: 'permanent',
  [ErrorCode.DB_CONNECTION_ERROR]: 'persistence',
  [ErrorCode.DB_QUERY_ERROR]: 'persistence',
  [ErrorCode.DB_TRANSACTION_ERROR]: 'persistence',
  [ErrorCode.SYSTEM_ERROR]: 'internal',
  [ErrorCode.CONFIG_ERROR]: 'config',
  [ErrorCode.INITIALIZATION_ERROR]: 'internal',
  [ErrorCode.RUN_ALREADY_ACTIVE]: 'scheduler',
};

export class CollectionError extends Error {
  public readonly code: ErrorCode;
  public readonly kind: ErrorKind;
  public readonly details?: Record<string, unknown>;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'CollectionError';
    this.code = code;
    this.kind = KIND_BY_CODE[code];
    this.details = details;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CollectionError);
    }
  }

  /** Snake-case reason recorded against failed tickers, e.g. `symbol_not_found`. */
  get reason(): string {
    return ErrorCode[this.code].toLowerCase();
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      reason: this.reason,
      message: this.message,
      details: this.details,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export class NetworkError extends CollectionError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCode.NETWORK_ERROR) {
    super(code, message, details, true);
    this.name = 'NetworkError';
  }
}

export class RateLimitError extends CollectionError {
  public readonly retryAfter: number;

  constructor(retryAfter: number, details?: Record<string, unknown>) {
    super(ErrorCode.RATE_LIMITED, `Rate limited. Retry after ${retryAfter}ms`, details, true);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class UpstreamError extends CollectionError {
  public readonly status: number;

  constructor(status: number, message: string, details?: Record<string, unknown>) {
    super(ErrorCode.UPSTREAM_ERROR, message, { ...details, status }, true);
    this.name = 'UpstreamError';
    this.status = status;
  }
}

export class AuthenticationError extends CollectionError {
  constructor(message: string = 'Authentication required', details?: Record<string, unknown>) {
    super(ErrorCode.AUTH_REQUIRED, message, details, false);
    this.name = 'AuthenticationError';
  }
}

export class QuotaExhaustedError extends CollectionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.QUOTA_EXHAUSTED, message, details, false);
    this.name = 'QuotaExhaustedError';
  }
}

export class SymbolNotFoundError extends CollectionError {
  constructor(symbol: string, details?: Record<string, unknown>) {
    super(ErrorCode.SYMBOL_NOT_FOUND, `Unknown or delisted symbol: ${symbol}`, { ...details, symbol }, false);
    this.name = 'SymbolNotFoundError';
  }
}

export class NoDataError extends CollectionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.NO_DATA, message, details, false);
    this.name = 'NoDataError';
  }
}

export class MalformedResponseError extends CollectionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.MALFORMED_RESPONSE, message, details, false);
    this.name = 'MalformedResponseError';
  }
}

export class ProviderUnavailableError extends CollectionError {
  public readonly provider: string;

  constructor(provider: string, cause: CollectionError) {
    super(
      ErrorCode.PROVIDER_UNAVAILABLE,
      `Provider ${provider} is unavailable for the rest of this run: ${cause.message}`,
      { provider, cause: cause.reason },
      false
    );
    this.name = 'ProviderUnavailableError';
    this.provider = provider;
  }
}

export class CapabilityUnsupportedError extends CollectionError {
  constructor(capability: string, market: string) {
    super(
      ErrorCode.CAPABILITY_UNSUPPORTED,
      `No provider offers ${capability} for ${market}`,
      { capability, market },
      false
    );
    this.name = 'CapabilityUnsupportedError';
  }
}

export class ValidationError extends CollectionError {
  public readonly field?: string;

  constructor(message: string, field?: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCode.VALIDATION_ERROR) {
    super(code, message, { ...details, field }, false);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class ConfigError extends CollectionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIG_ERROR, message, details, false);
    this.name = 'ConfigError';
  }
}

export class DatabaseError extends CollectionError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCode.DB_CONNECTION_ERROR) {
    super(code, message, details, code === ErrorCode.DB_CONNECTION_ERROR);
    this.name = 'DatabaseError';
  }
}

export class AlreadyRunningError extends CollectionError {
  constructor(scope: string) {
    super(ErrorCode.RUN_ALREADY_ACTIVE, `A run for scope ${scope} is already active`, { scope }, false);
    this.name = 'AlreadyRunningError';
  }
}

const NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EHOSTUNREACH', 'EAI_AGAIN'];

function errnoCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// Error handler helper
export function handleError(error: unknown): CollectionError {
  if (error instanceof CollectionError) {
    return error;
  }

  if (error instanceof Error) {
    const code = errnoCode(error);
    if (code && NETWORK_CODES.includes(code)) {
      return new NetworkError(error.message, { errno: code }, code === 'ETIMEDOUT' ? ErrorCode.API_TIMEOUT : ErrorCode.CONNECTION_FAILED);
    }

    // Check for common error patterns
    if (NETWORK_CODES.some((c) => error.message.includes(c)) || error.message.includes('socket hang up')) {
      return new NetworkError(error.message);
    }
    if (error.message.toLowerCase().includes('rate limit') || error.message.includes('429')) {
      return new RateLimitError(60000);
    }

    return new CollectionError(ErrorCode.SYSTEM_ERROR, error.message, { originalError: error.name });
  }

  return new CollectionError(ErrorCode.SYSTEM_ERROR, 'Unknown error occurred', { error: String(error) });
}

// Type guard
export function isCollectionError(error: unknown): error is CollectionError {
  return error instanceof CollectionError;
}

export function isSystemic(error: unknown): error is CollectionError {
  return isCollectionError(error) && error.kind === 'systemic';
}
