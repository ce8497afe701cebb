import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosRequestConfig } from 'axios';
import type { IsoDate, Market } from '../types';
import type { Capability, DataProvider } from './types';
import {
  logger,
  RateLimiter,
  RateLimitConfig,
  RetryConfig,
  retry,
  handleError,
  healthChecker,
  createProviderHealthCheck,
  AuthenticationError,
  CollectionError,
  ErrorCode,
  NetworkError,
  NoDataError,
  RateLimitError,
  UpstreamError,
} from '../utils';

declare module 'axios' {
  interface InternalAxiosRequestConfig {
    metadata?: { startTime: number };
  }
}

export interface ProviderOptions {
  quota: RateLimitConfig;
  retry?: Partial<RetryConfig>;
  timeoutMs?: number;
  priority?: number;
  /** Replaces the HTTP transport; used to run adapters without a network. */
  httpAdapter?: AxiosAdapter;
}

const DEFAULT_RETRY_AFTER_MS = 60000;

function retryAfterMs(header: unknown): number {
  if (typeof header === 'string' || typeof header === 'number') {
    const seconds = Number(header);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return seconds * 1000;
    }
  }
  return DEFAULT_RETRY_AFTER_MS;
}

/** Maps transport failures onto the collection error taxonomy. */
export function mapAxiosError(provider: string, error: AxiosError): CollectionError {
  const status = error.response?.status;
  const details = { provider, url: error.config?.url, status };

  if (status === 429) {
    return new RateLimitError(retryAfterMs(error.response?.headers['retry-after']), details);
  }
  if (status === 401 || status === 403) {
    return new AuthenticationError(`${provider} rejected credentials (HTTP ${status})`, details);
  }
  if (status === 404) {
    return new NoDataError(`${provider} returned 404 for ${error.config?.url ?? 'request'}`, details);
  }
  if (status !== undefined && status >= 500) {
    return new UpstreamError(status, `${provider} upstream error (HTTP ${status})`, details);
  }
  if (status !== undefined) {
    return new CollectionError(ErrorCode.INVALID_SYMBOL, `${provider} rejected request (HTTP ${status})`, details);
  }
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new NetworkError(`Request timeout: ${error.message}`, details, ErrorCode.API_TIMEOUT);
  }
  return new NetworkError(`Network error: ${error.message}`, { ...details, code: error.code });
}

/**
 * Shared plumbing for HTTP adapters: one axios instance, one rate limiter
 * and one retry policy per provider. Every attempt, retries included, takes
 * its own permit from the limiter before going on the wire.
 */
export abstract class BaseProvider implements DataProvider {
  abstract readonly markets: readonly Market[];
  abstract readonly capabilities: readonly Capability[];
  readonly earliestDate: IsoDate | null = null;
  readonly priority: number;

  protected readonly client: AxiosInstance;
  protected readonly limiter: RateLimiter;
  private readonly retryConfig: Partial<RetryConfig>;
  private retries = 0;

  constructor(
    readonly name: string,
    baseURL: string,
    options: ProviderOptions,
    headers: Record<string, string> = {}
  ) {
    this.priority = options.priority ?? 0;
    this.limiter = new RateLimiter(options.quota, name);
    this.retryConfig = {
      maxAttempts: 3,
      initialDelayMs: 1000,
      ...options.retry,
      onRetry: () => {
        this.retries++;
      },
    };

    this.client = axios.create({
      baseURL,
      timeout: options.timeoutMs ?? 30000,
      headers,
      ...(options.httpAdapter ? { adapter: options.httpAdapter } : {}),
    });

    this.client.interceptors.request.use((config) => {
      config.metadata = { startTime: Date.now() };
      return config;
    });

    this.client.interceptors.response.use(
      (response) => {
        const startTime = response.config.metadata?.startTime;
        logger.debug(this.name, 'API request completed', {
          url: response.config.url,
          status: response.status,
          latencyMs: startTime ? Date.now() - startTime : undefined,
        });
        return response;
      },
      (error: unknown) => {
        if (!axios.isAxiosError(error)) {
          throw handleError(error);
        }
        const startTime = error.config?.metadata?.startTime;
        logger.debug(this.name, 'API request failed', {
          url: error.config?.url,
          status: error.response?.status,
          latencyMs: startTime ? Date.now() - startTime : undefined,
          error: error.message,
        });
        throw mapAxiosError(this.name, error);
      }
    );

    healthChecker.registerCheck(`provider:${name}`, createProviderHealthCheck(`provider:${name}`, () => this.getStats()));
  }

  getStats(): { pending: number; requestsInWindow: number; maxRequests: number; granted: number; retries: number } {
    const { pending, requestsInWindow, maxRequests, granted } = this.limiter.getStats();
    return { pending, requestsInWindow, maxRequests, granted, retries: this.retries };
  }

  /**
   * Rate-limited request with retry. `endpoint` labels the call in logs and
   * limiter stats.
   */
  protected async request<T>(endpoint: string, config: AxiosRequestConfig): Promise<T> {
    return retry(
      async () => {
        await this.limiter.acquire(endpoint);
        const response = await this.client.request<T>(config);
        this.inspectBody(response.data, endpoint);
        return response.data;
      },
      `${this.name}.${endpoint}`,
      this.retryConfig
    );
  }

  /**
   * Hook for sources that report errors inside a 200 body. Throw a
   * CollectionError to classify the failure.
   */
  protected inspectBody(_body: unknown, _endpoint: string): void {
    // most providers signal errors through HTTP status alone
  }
}
