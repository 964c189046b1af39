/**
 * Tests for the structured logging API.
 */

import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createLogger,
  getRootLogger,
  type LogFields,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  setRootLogger,
} from '../../../src/logging/index.js';

interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

describe('Logging API', () => {
  let lines: LogLine[];

  beforeEach(() => {
    lines = [];
    setRootLogger(
      pino(
        { level: 'trace', base: null, timestamp: false },
        {
          write(message: string) {
            lines.push(JSON.parse(message));
          },
        }
      )
    );
  });

  afterEach(() => {
    setRootLogger(pino({ level: 'silent' }));
  });

  it('returns the logger that was set', () => {
    const logger = pino({ level: 'silent' });
    setRootLogger(logger);
    expect(getRootLogger()).toBe(logger);
  });

  describe('level functions', () => {
    it('write at their own level', () => {
      logError('error message');
      logWarn('warn message');
      logInfo('info message');
      logDebug('debug message');
      logTrace('trace message');

      expect(lines.map((line) => [line.level, line.msg])).toEqual([
        [50, 'error message'],
        [40, 'warn message'],
        [30, 'info message'],
        [20, 'debug message'],
        [10, 'trace message'],
      ]);
    });

    it('write structured fields', () => {
      const fields: LogFields = { component: 'test', count: 42, enabled: true, optional: null };
      logInfo('with fields', fields);

      expect(lines).toEqual([
        { level: 30, msg: 'with fields', component: 'test', count: 42, enabled: true, optional: null },
      ]);
    });

    it('drop undefined fields', () => {
      logInfo('sparse', { component: 'test', optional: undefined });
      expect(lines[0]).toEqual({ level: 30, msg: 'sparse', component: 'test' });
    });
  });

  describe('createLogger', () => {
    it('adds the default fields to every line', () => {
      const logger = createLogger({ component: 'resolver' });
      logger.debug('Segment not matched', { segment: 'abc' });

      expect(lines).toEqual([
        { level: 20, msg: 'Segment not matched', component: 'resolver', segment: 'abc' },
      ]);
    });

    it('lets call-time fields override default fields', () => {
      const logger = createLogger({ component: 'default_component' });
      logger.warn('overridden', { component: 'override_component' });
      expect(lines[0]?.component).toBe('override_component');
    });

    it('works with empty default fields', () => {
      createLogger({}).error('bare');
      expect(lines).toEqual([{ level: 50, msg: 'bare' }]);
    });
  });
});
