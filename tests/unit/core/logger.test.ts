import { describe, it, expect, vi, afterEach } from 'vitest';
import { readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import {
  Logger,
  consoleSink,
  fileSink,
  formatRecord,
  parseLogLevel,
  type LogRecord,
} from '../../../src/core/logger.js';
import { makeTempDir } from '../../helpers/fakes.js';

const FIXED = new Date('2026-01-02T03:04:05.000Z');

function collect(threshold: LogRecord['level']) {
  const records: LogRecord[] = [];
  const logger = new Logger({
    threshold,
    sinks: [(record) => records.push(record)],
    clock: () => FIXED,
  });
  return { logger, records };
}

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseLogLevel', () => {
    it('accepts level names case-insensitively', () => {
      expect(parseLogLevel('debug')).toBe('Debug');
      expect(parseLogLevel('ERROR')).toBe('Error');
      expect(parseLogLevel('warn')).toBe('Warning');
      expect(parseLogLevel('Warning')).toBe('Warning');
    });

    it('returns null for unknown or empty input', () => {
      expect(parseLogLevel('verbose')).toBeNull();
      expect(parseLogLevel('')).toBeNull();
      expect(parseLogLevel(undefined)).toBeNull();
    });
  });

  describe('threshold filtering', () => {
    it('emits only records at or above the threshold', () => {
      const { logger, records } = collect('Warning');
      logger.log('debug line', 'Debug', 'Test');
      logger.log('info line', 'Info', 'Test');
      logger.log('warning line', 'Warning', 'Test');
      logger.log('error line', 'Error', 'Test');
      expect(records.map((r) => r.message)).toEqual(['warning line', 'error line']);
    });

    it('treats an unrecognised level as Info', () => {
      const info = collect('Info');
      info.logger.log('odd', 'Verbose', 'Test');
      expect(info.records).toHaveLength(1);
      expect(info.records[0].level).toBe('Info');

      const warning = collect('Warning');
      warning.logger.log('odd', 'Verbose', 'Test');
      expect(warning.records).toHaveLength(0);
    });

    it('defaults the threshold to Info', () => {
      expect(new Logger({ sinks: [] }).threshold).toBe('Info');
    });
  });

  describe('records', () => {
    it('renders an empty message as a single space', () => {
      const { logger, records } = collect('Debug');
      logger.log('', 'Info', 'Test');
      logger.log(undefined, 'Info', 'Test');
      expect(records.map((r) => r.message)).toEqual([' ', ' ']);
    });

    it('formats timestamp, level, component and message', () => {
      const line = formatRecord({
        timestamp: FIXED,
        level: 'Warning',
        component: 'Engine',
        message: 'disk low',
      });
      expect(line).toBe('[2026-01-02T03:04:05.000Z] [WARN] [Engine] disk low');
    });

    it('tags child logger output with its component', () => {
      const { logger, records } = collect('Debug');
      logger.child('Detector').warn('missing');
      expect(records[0]).toEqual({
        timestamp: FIXED,
        level: 'Warning',
        component: 'Detector',
        message: 'missing',
      });
    });
  });

  describe('sinks', () => {
    it('keeps going when a sink throws', () => {
      const received: string[] = [];
      const logger = new Logger({
        sinks: [
          () => {
            throw new Error('sink down');
          },
          (record) => received.push(record.message),
        ],
      });
      expect(() => logger.log('still here', 'Error', 'Test')).not.toThrow();
      expect(received).toEqual(['still here']);
    });

    it('writes uncoloured lines to the console when colour is off', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = new Logger({ sinks: [consoleSink(false)], clock: () => FIXED });
      logger.log('hello', 'Info', 'CLI');
      expect(spy).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] [INFO] [CLI] hello');
    });

    it('sends warnings and errors to stderr', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = new Logger({ sinks: [consoleSink(false)], clock: () => FIXED });
      logger.log('bad', 'Error', 'CLI');
      expect(spy).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] [ERROR] [CLI] bad');
    });

    it('appends lines to a log file', () => {
      const dir = makeTempDir();
      try {
        const path = join(dir, 'logs', 'run.log');
        const logger = new Logger({ sinks: [fileSink(path)], clock: () => FIXED });
        logger.log('first', 'Info', 'A');
        logger.log('second', 'Error', 'B');
        expect(readFileSync(path, 'utf-8')).toBe(
          '[2026-01-02T03:04:05.000Z] [INFO] [A] first\n' +
            '[2026-01-02T03:04:05.000Z] [ERROR] [B] second\n',
        );
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
