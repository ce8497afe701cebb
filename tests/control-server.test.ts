import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { ControlServer } from '../src/monitoring/control-server';
import type { ControlServerDeps } from '../src/monitoring/control-server';
import { Scheduler } from '../src/scheduler/scheduler';
import { SchedulerRegistry } from '../src/scheduler/registry';
import type { TriggerFactory } from '../src/scheduler/triggers';
import type { QualityReport, RatioBatchResult, RunSummary } from '../src/types';
import { HealthChecker } from '../src/utils';
import { MemoryStore } from './helpers/memory-store';
import { makeStatement, makeTicker, weekdayBars, weekdaySnapshots } from './helpers/fake-providers';

const API_KEY = 'test-secret';

const noopTriggers: TriggerFactory = () => ({ stop: () => undefined });

const RATIO_RESULT: RatioBatchResult = { tickers: 3, ratiosWritten: 5, skipped: 1, failed: [] };

const QUALITY_REPORT: QualityReport = {
  generatedAt: '2024-06-14T09:00:00.000Z',
  market: 'KOSPI',
  activeTickers: 0,
  completeness: [],
  priceOutliers: [],
  ratioAnomalies: [],
  missing: { noStatements: [], noMarketCap: [] },
  qualityScore: 50,
  grade: 'F',
};

interface Harness {
  server: ControlServer;
  http: AxiosInstance;
  anon: AxiosInstance;
  deps: ControlServerDeps;
  store: MemoryStore;
  release: () => void;
}

async function startHarness(apiKey: string | null, health = new HealthChecker()): Promise<Harness> {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const job = async (): Promise<RunSummary[]> => {
    await gate;
    return [];
  };

  const schedulers = new SchedulerRegistry();
  schedulers.register(new Scheduler('korea', job, { triggerFactory: noopTriggers }));
  schedulers.register(new Scheduler('us', job, { triggerFactory: noopTriggers }));

  const store = new MemoryStore();
  const deps: ControlServerDeps = {
    schedulers,
    defaultCron: { korea: '0 18 * * 1-5' },
    ratios: { calculateBatch: vi.fn(async () => RATIO_RESULT) },
    quality: { report: vi.fn(async () => QUALITY_REPORT) },
    stats: store,
    health,
  };
  const server = new ControlServer(deps, { apiKey });
  const port = await server.start(0);
  const baseURL = `http://127.0.0.1:${port}`;
  const http = axios.create({ baseURL, headers: { 'x-api-key': API_KEY }, validateStatus: () => true });
  const anon = axios.create({ baseURL, validateStatus: () => true });
  return { server, http, anon, deps, store, release: () => release() };
}

describe('ControlServer', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await startHarness(API_KEY);
  });

  afterEach(async () => {
    harness.release();
    await harness.deps.schedulers.drain();
    await harness.server.stop();
  });

  it('should answer liveness without a key', async () => {
    const res = await harness.anon.get('/health/live');

    expect(res.status).toBe(200);
    expect(res.data.status).toBe('ok');
  });

  it('should require an API key on /api routes', async () => {
    const missing = await harness.anon.get('/api/scheduler/status');
    const wrong = await harness.anon.get('/api/scheduler/status', { headers: { 'x-api-key': 'wrong-secret' } });

    expect(missing.status).toBe(401);
    expect(missing.data).toEqual({ error: 'Authentication required', code: 'AUTH_REQUIRED' });
    expect(wrong.status).toBe(403);
    expect(wrong.data.code).toBe('INVALID_API_KEY');
  });

  it('should accept a bearer token', async () => {
    const res = await harness.anon.get('/api/scheduler/status', {
      headers: { authorization: `Bearer ${API_KEY}` },
    });

    expect(res.status).toBe(200);
  });

  it('should report every scheduler', async () => {
    const res = await harness.http.get('/api/scheduler/status');

    expect(res.status).toBe(200);
    expect(res.data.schedulers.map((s: { scope: string; state: string }) => `${s.scope}:${s.state}`)).toEqual([
      'korea:stopped',
      'us:stopped',
    ]);
  });

  it('should start with the configured cron and stop again', async () => {
    const started = await harness.http.post('/api/scheduler/korea/start');

    expect(started.status).toBe(200);
    expect(started.data).toEqual({
      scope: 'korea',
      state: 'running',
      cronExpression: '0 18 * * 1-5',
      activeRun: false,
      activeRunStartedAt: null,
      lastRun: null,
    });

    const stopped = await harness.http.post('/api/scheduler/korea/stop');
    expect(stopped.data.state).toBe('stopped');
    expect(stopped.data.cronExpression).toBeNull();
  });

  it('should start with a cron from the body', async () => {
    const res = await harness.http.post('/api/scheduler/us/start', { cron: '30 16 * * 1-5' });

    expect(res.status).toBe(200);
    expect(res.data.cronExpression).toBe('30 16 * * 1-5');
  });

  it('should reject a start without any cron expression', async () => {
    const res = await harness.http.post('/api/scheduler/us/start');

    expect(res.status).toBe(400);
    expect(res.data.code).toBe('VALIDATION_ERROR');
  });

  it('should reject an invalid cron expression', async () => {
    const res = await harness.http.post('/api/scheduler/korea/start', { cron: 'every evening' });

    expect(res.status).toBe(400);
    expect(res.data.code).toBe('VALIDATION_ERROR');
    expect(harness.deps.schedulers.get('korea')?.status().state).toBe('stopped');
  });

  it('should return 404 for an unknown scope', async () => {
    const res = await harness.http.post('/api/scheduler/mars/run');

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: 'Unknown scope: mars', code: 'UNKNOWN_SCOPE' });
  });

  it('should accept one manual run and refuse an overlapping one', async () => {
    const first = await harness.http.post('/api/scheduler/korea/run');
    const second = await harness.http.post('/api/scheduler/korea/run');

    expect(first.status).toBe(202);
    expect(first.data.status).toBe('started');
    expect(first.data.scope).toBe('korea');
    expect(second.status).toBe(409);
    expect(second.data).toEqual({
      status: 'already_running',
      scope: 'korea',
      activeRunStartedAt: first.data.startedAt,
    });
  });

  it('should recalculate ratios with the parsed scope', async () => {
    const res = await harness.http.post('/api/ratios/recalculate', { market: 'NYSE', limit: '5' });

    expect(res.status).toBe(200);
    expect(res.data).toEqual(RATIO_RESULT);
    expect(harness.deps.ratios.calculateBatch).toHaveBeenCalledWith({ market: 'NYSE', limit: 5 });
  });

  it('should return 500 when recalculation fails', async () => {
    vi.mocked(harness.deps.ratios.calculateBatch).mockRejectedValueOnce(new Error('connection lost'));

    const res = await harness.http.post('/api/ratios/recalculate', {});

    expect(res.status).toBe(500);
    expect(res.data).toEqual({ error: 'Ratio recalculation failed', code: 'INTERNAL_ERROR' });
  });

  it('should produce a quality report from query parameters', async () => {
    const res = await harness.http.get('/api/quality/report', { params: { market: 'KOSPI', lookbackDays: 30 } });

    expect(res.status).toBe(200);
    expect(res.data).toEqual(QUALITY_REPORT);
    expect(harness.deps.quality.report).toHaveBeenCalledWith({ market: 'KOSPI', lookbackDays: 30 });
  });

  it('should apply the default lookback and reject a too-short one', async () => {
    await harness.http.get('/api/quality/report');
    const tooShort = await harness.http.get('/api/quality/report', { params: { lookbackDays: 2 } });

    expect(harness.deps.quality.report).toHaveBeenCalledWith({ lookbackDays: 90 });
    expect(tooShort.status).toBe(400);
  });

  it('should report what has been collected so far', async () => {
    const { store } = harness;
    store.addTickers(
      makeTicker('AAA', 'KOSPI'),
      makeTicker('BBB', 'KOSPI', { status: 'inactive' }),
      makeTicker('AAPL', 'NASDAQ')
    );
    await store.upsertPricePoints(weekdayBars('AAA', { from: '2024-06-10', to: '2024-06-14' }));
    await store.upsertSnapshots(weekdaySnapshots('AAA', { from: '2024-06-13', to: '2024-06-14' }));
    await store.upsertStatement(makeStatement('AAA', { fiscalYear: 2023, reportType: 'annual' }));
    await store.upsertStatement(makeStatement('AAA', { fiscalYear: 2024, reportType: 'Q1' }));
    await store.upsertStatement(makeStatement('AAPL', { fiscalYear: 2023, reportType: 'annual' }));

    const res = await harness.http.get('/api/stats');

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      tickers: [
        { market: 'KOSPI', active: 1, inactive: 1 },
        { market: 'NASDAQ', active: 1, inactive: 0 },
      ],
      prices: { rows: 5, symbols: 1, latestDate: '2024-06-14' },
      snapshots: { rows: 2, symbols: 1, latestDate: '2024-06-14' },
      statements: [
        { reportType: 'annual', rows: 2, symbols: 2, latestFiscalYear: 2023 },
        { reportType: 'Q1', rows: 1, symbols: 1, latestFiscalYear: 2024 },
      ],
      ratios: { rows: 0, symbols: 0 },
      generatedAt: expect.any(String),
    });
  });

  it('should answer 500 when the stats query fails', async () => {
    vi.spyOn(harness.store, 'collectionStats').mockRejectedValue(new Error('pool exhausted'));

    const res = await harness.http.get('/api/stats');

    expect(res.status).toBe(500);
    expect(res.data).toEqual({ error: 'Collection stats failed', code: 'INTERNAL_ERROR' });
  });
});

describe('ControlServer without a control key', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await startHarness(null);
  });

  afterEach(async () => {
    await harness.server.stop();
  });

  it('should disable the control API', async () => {
    const res = await harness.http.get('/api/scheduler/status');

    expect(res.status).toBe(503);
    expect(res.data).toEqual({ error: 'Control API disabled', code: 'CONTROL_API_DISABLED' });
  });
});

describe('ControlServer health', () => {
  it('should return 503 when a component is unhealthy', async () => {
    const health = new HealthChecker();
    health.registerCheck('database', async () => ({
      name: 'database',
      status: 'unhealthy',
      message: 'connection refused',
      lastCheck: new Date(),
    }));
    const harness = await startHarness(API_KEY, health);

    try {
      const res = await harness.http.get('/health');

      expect(res.status).toBe(503);
      expect(res.data.status).toBe('unhealthy');
      expect(res.data.components.map((c: { name: string }) => c.name)).toEqual(['database']);
    } finally {
      await harness.server.stop();
    }
  });
});
