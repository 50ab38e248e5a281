import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Chalk, type ChalkInstance } from 'chalk';
import { LOG_LEVELS } from '../config/schema.js';

export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
  Debug: 0,
  Info: 1,
  Warning: 2,
  Error: 3,
};

const LABELS: Record<LogLevel, string> = {
  Debug: 'DEBUG',
  Info: 'INFO',
  Warning: 'WARN',
  Error: 'ERROR',
};

/**
 * Parses a level name case-insensitively ("warn" is accepted for Warning).
 * Returns null for anything unrecognised.
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const lower = value.trim().toLowerCase();
  if (lower === 'warn') return 'Warning';
  return LOG_LEVELS.find((level) => level.toLowerCase() === lower) ?? null;
}

/** Unknown levels are treated as Info. */
export function normalizeLevel(level: string | undefined): LogLevel {
  return parseLogLevel(level) ?? 'Info';
}

export function isEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[threshold];
}

export interface LogRecord {
  timestamp: Date;
  level: LogLevel;
  component: string;
  message: string;
}

export function formatRecord(record: LogRecord): string {
  return `[${record.timestamp.toISOString()}] [${LABELS[record.level]}] [${record.component}] ${record.message}`;
}

export type LogSink = (record: LogRecord) => void;

export function consoleSink(color = true): LogSink {
  const paint: ChalkInstance = new Chalk({ level: color ? 1 : 0 });
  const styles: Record<LogLevel, (s: string) => string> = {
    Debug: paint.gray,
    Info: (s) => s,
    Warning: paint.yellow,
    Error: paint.red,
  };
  return (record) => {
    const line = styles[record.level](formatRecord(record));
    if (record.level === 'Error' || record.level === 'Warning') {
      console.error(line);
    } else {
      console.log(line);
    }
  };
}

export function fileSink(path: string): LogSink {
  mkdirSync(dirname(path), { recursive: true });
  return (record) => {
    appendFileSync(path, `${formatRecord(record)}\n`, 'utf-8');
  };
}

export interface LoggerOptions {
  threshold?: LogLevel;
  sinks?: LogSink[];
  clock?: () => Date;
}

/**
 * Leveled, component-tagged logger. The threshold is fixed at construction;
 * a failing sink never makes `log` throw.
 */
export class Logger {
  readonly threshold: LogLevel;
  private readonly sinks: LogSink[];
  private readonly clock: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.threshold = options.threshold ?? 'Info';
    this.sinks = options.sinks ?? [consoleSink()];
    this.clock = options.clock ?? (() => new Date());
  }

  log(message: string | undefined, level: string | undefined, component: string): void {
    const normalized = normalizeLevel(level);
    if (!isEnabled(normalized, this.threshold)) return;

    const record: LogRecord = {
      timestamp: this.clock(),
      level: normalized,
      component: component || 'General',
      message: message ? message : ' ',
    };

    for (const sink of this.sinks) {
      try {
        sink(record);
      } catch {
        // Sink failures are ignored
      }
    }
  }

  child(component: string): ComponentLogger {
    return new ComponentLogger(this, component);
  }
}

export class ComponentLogger {
  constructor(
    private readonly logger: Logger,
    readonly component: string,
  ) {}

  debug(message: string): void {
    this.logger.log(message, 'Debug', this.component);
  }

  info(message: string): void {
    this.logger.log(message, 'Info', this.component);
  }

  warn(message: string): void {
    this.logger.log(message, 'Warning', this.component);
  }

  error(message: string): void {
    this.logger.log(message, 'Error', this.component);
  }
}

/** Logger that records nothing; used where no output is wanted. */
export function silentLogger(): Logger {
  return new Logger({ sinks: [] });
}
