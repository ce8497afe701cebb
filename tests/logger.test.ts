import { describe, it, expect } from 'vitest';
import { Logger } from '../src/utils/logger';
import type { LogEntry } from '../src/utils/logger';

function jsonLogger(level: 'debug' | 'info' | 'warn' | 'error' = 'info') {
  const lines: string[] = [];
  const log = new Logger({ level, json: true, write: (line) => lines.push(line) });
  const entries = (): LogEntry[] => lines.map((line) => JSON.parse(line));
  return { log, lines, entries };
}

describe('Logger', () => {
  it('should write structured entries at or above the level', () => {
    const { log, entries } = jsonLogger('info');

    log.debug('Orchestrator', 'hidden');
    log.info('Orchestrator', 'Batch started', { scope: 'kospi' });

    expect(entries()).toHaveLength(1);
    expect(entries()[0]).toMatchObject({
      level: 'info',
      component: 'Orchestrator',
      message: 'Batch started',
      data: { scope: 'kospi' },
    });
  });

  it('should lift the run id out of the data', () => {
    const { log, entries } = jsonLogger();

    log.run('Batch finished', { runId: 'kospi-0a1b2c3d', succeeded: 3 });

    const [entry] = entries();
    expect(entry.runId).toBe('kospi-0a1b2c3d');
    expect(entry.data).toEqual({ succeeded: 3, type: 'RUN_EVENT' });
  });

  it('should omit empty data', () => {
    const { log, entries } = jsonLogger();

    log.warn('Scheduler', 'No scheduler registered for scope mars');

    expect(entries()[0].data).toBeUndefined();
  });

  it('should tag lines with the correlation id until cleared', () => {
    const { log, entries } = jsonLogger();

    log.setCorrelationId('cli-kospi');
    log.info('CLI', 'first');
    log.clearCorrelationId();
    log.info('CLI', 'second');

    expect(entries().map((e) => e.correlationId)).toEqual(['cli-kospi', undefined]);
  });

  it('should change level at runtime', () => {
    const { log, lines } = jsonLogger('error');

    log.warn('Retry', 'suppressed');
    log.setLevel('debug');
    log.debug('Retry', 'shown');

    expect(lines).toHaveLength(1);
  });

  it('should render a readable line outside JSON mode', () => {
    const lines: string[] = [];
    const log = new Logger({ write: (line) => lines.push(line) });

    log.info('Providers', 'Registered krx', { runId: 'us-00000001' });

    expect(lines[0]).toContain('[INFO] [Providers] (us-00000001) Registered krx');
  });
});
