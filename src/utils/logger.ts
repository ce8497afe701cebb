import { createWriteStream, WriteStream } from 'fs';
import { join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  runId?: string;
  correlationId?: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** JSON lines instead of coloured text. */
  json?: boolean;
  /** Directory for an appended `collector.log`; JSON lines regardless of `json`. */
  logDir?: string;
  write?: (line: string) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m',  // green
  warn: '\x1b[33m',  // yellow
  error: '\x1b[31m', // red
};
const RESET = '\x1b[0m';

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

export class Logger {
  private minLevel: LogLevel;
  private readonly json: boolean;
  private readonly write: (line: string) => void;
  private fileStream: WriteStream | null = null;
  private correlationId: string | null = null;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.level ?? 'info';
    this.json = options.json ?? false;
    this.write = options.write ?? ((line) => console.log(line));

    if (options.logDir) {
      this.fileStream = createWriteStream(join(options.logDir, 'collector.log'), { flags: 'a' });
      this.fileStream.on('error', (err) => {
        console.error(`[Logger] File sink disabled: ${err.message}`);
        this.fileStream = null;
      });
    }
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  setCorrelationId(id: string): void {
    this.correlationId = id;
  }

  clearCorrelationId(): void {
    this.correlationId = null;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private log(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    // Runs of different scopes interleave in one process; the run id travels on each line
    const { runId, ...rest } = data ?? {};
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...(typeof runId === 'string' ? { runId } : {}),
      ...(this.correlationId ? { correlationId: this.correlationId } : {}),
      ...(Object.keys(rest).length > 0 ? { data: rest } : {}),
    };

    const formatted = JSON.stringify(entry);

    if (this.json) {
      this.write(formatted);
    } else {
      const tag = entry.runId ?? entry.correlationId;
      const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
      this.write(
        `${COLORS[level]}[${entry.timestamp}] [${level.toUpperCase()}] [${component}]${tag ? ` (${tag})` : ''} ${message}${dataStr}${RESET}`
      );
    }

    if (this.fileStream) {
      this.fileStream.write(formatted + '\n');
    }
  }

  debug(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', component, message, data);
  }

  info(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', component, message, data);
  }

  warn(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', component, message, data);
  }

  error(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', component, message, data);
  }

  // Specialized logging methods
  run(event: string, data: Record<string, unknown>): void {
    this.info('Run', event, { ...data, type: 'RUN_EVENT' });
  }

  api(method: string, endpoint: string, status: number, latencyMs: number, data?: Record<string, unknown>): void {
    this.info('API', `${method} ${endpoint}`, { status, latencyMs, ...data, type: 'API_CALL' });
  }

  provider(name: string, event: string, data: Record<string, unknown>): void {
    this.warn('Provider', `${name}: ${event}`, { ...data, type: 'PROVIDER_EVENT' });
  }

  audit(action: string, user: string, data?: Record<string, unknown>): void {
    this.info('Audit', action, { user, ...data, type: 'AUDIT' });
  }
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  json: process.env.NODE_ENV === 'production',
  logDir: process.env.LOG_DIR,
});
