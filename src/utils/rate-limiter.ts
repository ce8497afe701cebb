import { logger } from './logger';

export interface RateLimitConfig {
  maxRequests: number;      // Maximum requests allowed per window
  windowMs: number;         // Sliding window length in milliseconds
  minDelayMs?: number;      // Minimum delay between requests
  /** Slack added to the window for grant-to-wire latency. */
  marginMs?: number;
}

// Up to a tenth of the window, capped at 250ms
function defaultMargin(windowMs: number): number {
  return Math.min(250, Math.ceil(windowMs / 10));
}

interface RequestRecord {
  timestamp: number;
  endpoint: string;
}

interface PendingPermit {
  resolve: () => void;
  endpoint: string;
  enqueuedAt: number;
}

/**
 * Sliding-window limiter. Permits are granted strictly in arrival order by a
 * single drain loop. A grant stays counted for `windowMs + marginMs`, so
 * calls that reach the wire slightly after their grant still keep every
 * `windowMs` window within `maxRequests`. Callers without a permit wait;
 * nothing is dropped.
 */
export class RateLimiter {
  private requests: RequestRecord[] = [];
  private config: Required<RateLimitConfig>;
  private queue: PendingPermit[] = [];
  private processing = false;
  private granted = 0;
  private totalWaitMs = 0;

  constructor(config: RateLimitConfig, private readonly name: string = 'default') {
    if (config.maxRequests < 1 || config.windowMs <= 0 || (config.marginMs ?? 0) < 0) {
      throw new RangeError(`Invalid rate limit for ${name}: ${config.maxRequests}/${config.windowMs}ms`);
    }
    this.config = {
      maxRequests: config.maxRequests,
      windowMs: config.windowMs,
      minDelayMs: config.minDelayMs ?? 0,
      marginMs: config.marginMs ?? defaultMargin(config.windowMs),
    };
  }

  private get spanMs(): number {
    return this.config.windowMs + this.config.marginMs;
  }

  private cleanOldRequests(now: number): void {
    const windowStart = now - this.spanMs;
    while (this.requests.length > 0 && this.requests[0].timestamp < windowStart) {
      this.requests.shift();
    }
  }

  private getWaitTime(now: number): number {
    this.cleanOldRequests(now);

    if (this.requests.length === 0) {
      return 0;
    }

    if (this.requests.length >= this.config.maxRequests) {
      const oldestRequest = this.requests[0];
      return Math.max(1, oldestRequest.timestamp + this.spanMs - now + 1);
    }

    const lastRequest = this.requests[this.requests.length - 1];
    const timeSinceLastRequest = now - lastRequest.timestamp;
    if (timeSinceLastRequest < this.config.minDelayMs) {
      return this.config.minDelayMs - timeSinceLastRequest;
    }

    return 0;
  }

  acquire(endpoint: string = 'default'): Promise<void> {
    return new Promise((resolve) => {
      this.queue.push({ resolve, endpoint, enqueuedAt: Date.now() });
      this.processQueue().catch((error: unknown) => {
        logger.error('RateLimiter', `${this.name} drain loop failed`, {
          error: error instanceof Error ? error.message : String(error),
        });
        this.processing = false;
      });
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing || this.queue.length === 0) {
      return;
    }

    this.processing = true;

    while (this.queue.length > 0) {
      const waitTime = this.getWaitTime(Date.now());

      if (waitTime > 0) {
        logger.debug('RateLimiter', `${this.name}: waiting ${waitTime}ms before next request`, {
          pending: this.queue.length,
        });
        await this.sleep(waitTime);
        continue;
      }

      const item = this.queue.shift();
      if (item) {
        const now = Date.now();
        this.requests.push({ timestamp: now, endpoint: item.endpoint });
        this.granted++;
        this.totalWaitMs += now - item.enqueuedAt;
        item.resolve();
      }
    }

    this.processing = false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  getStats(): {
    name: string;
    pending: number;
    requestsInWindow: number;
    maxRequests: number;
    windowMs: number;
    granted: number;
    averageWaitMs: number;
  } {
    this.cleanOldRequests(Date.now());
    return {
      name: this.name,
      pending: this.queue.length,
      requestsInWindow: this.requests.length,
      maxRequests: this.config.maxRequests,
      windowMs: this.config.windowMs,
      granted: this.granted,
      averageWaitMs: this.granted === 0 ? 0 : Math.round(this.totalWaitMs / this.granted),
    };
  }
}
