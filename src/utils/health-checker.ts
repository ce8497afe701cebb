import type { Pool } from 'pg';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  name: string;
  status: HealthStatus;
  latencyMs?: number;
  message?: string;
  lastCheck: Date;
}

export interface SystemHealth {
  status: HealthStatus;
  components: ComponentHealth[];
  timestamp: Date;
  uptime: number;
}

export type HealthCheckFn = () => Promise<ComponentHealth>;

const DEFAULT_CHECK_TIMEOUT_MS = 5000;

function unhealthy(name: string, message: string, latencyMs?: number): ComponentHealth {
  return { name, status: 'unhealthy', message, latencyMs, lastCheck: new Date() };
}

/**
 * Named component checks, run together on demand. A check that throws or
 * outlives the timeout reports the component unhealthy.
 */
export class HealthChecker {
  private checks: Map<string, HealthCheckFn> = new Map();
  private readonly startTime = Date.now();

  constructor(private readonly timeoutMs: number = DEFAULT_CHECK_TIMEOUT_MS) {}

  registerCheck(name: string, check: HealthCheckFn): void {
    this.checks.set(name, check);
  }

  async checkComponent(name: string): Promise<ComponentHealth> {
    const check = this.checks.get(name);
    if (!check) {
      return unhealthy(name, 'Check not registered');
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ComponentHealth>((resolve) => {
      timer = setTimeout(() => resolve(unhealthy(name, `Check timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    });

    try {
      return await Promise.race([check(), timeout]);
    } catch (error) {
      return unhealthy(name, error instanceof Error ? error.message : 'Unknown error');
    } finally {
      clearTimeout(timer);
    }
  }

  async checkAll(): Promise<SystemHealth> {
    const components = await Promise.all([...this.checks.keys()].map((name) => this.checkComponent(name)));

    let status: HealthStatus = 'healthy';
    if (components.some((c) => c.status === 'unhealthy')) {
      status = 'unhealthy';
    } else if (components.some((c) => c.status === 'degraded')) {
      status = 'degraded';
    }

    return {
      status,
      components,
      timestamp: new Date(),
      uptime: Date.now() - this.startTime,
    };
  }
}

export const healthChecker = new HealthChecker();

// Database reachability; slow round trips degrade
export function createDatabaseHealthCheck(pool: Pool, degradedAfterMs: number = 1000): HealthCheckFn {
  return async (): Promise<ComponentHealth> => {
    const start = Date.now();
    try {
      await pool.query('SELECT 1');
      const latencyMs = Date.now() - start;
      return {
        name: 'database',
        status: latencyMs > degradedAfterMs ? 'degraded' : 'healthy',
        latencyMs,
        message: `pool ${pool.totalCount} open, ${pool.idleCount} idle, ${pool.waitingCount} waiting`,
        lastCheck: new Date(),
      };
    } catch (error) {
      return unhealthy('database', error instanceof Error ? error.message : 'Connection failed', Date.now() - start);
    }
  };
}

export interface ProviderLoad {
  pending: number;
  requestsInWindow: number;
  maxRequests: number;
  retries: number;
}

// Provider backlog: degraded when callers queue behind the rate limiter
export function createProviderHealthCheck(
  name: string,
  stats: () => ProviderLoad,
  backlogThreshold: number = 50
): HealthCheckFn {
  return async (): Promise<ComponentHealth> => {
    const { pending, requestsInWindow, maxRequests, retries } = stats();
    return {
      name,
      status: pending > backlogThreshold ? 'degraded' : 'healthy',
      message: `${requestsInWindow}/${maxRequests} permits in window, ${pending} waiting, ${retries} retries`,
      lastCheck: new Date(),
    };
  };
}
