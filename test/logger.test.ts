/**
 * Tests for the console logger
 */

import chalk from 'chalk';
import { createLogger, parseLogLevel } from '../src/logger';

beforeAll(() => {
  chalk.level = 0;
});

describe('Logger', () => {
  test('writes level, timestamp and message', () => {
    const lines: string[] = [];
    createLogger({ level: 'info', write: (line) => lines.push(line) }).info('hello');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[INFO\] \d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - hello$/);
  });

  test('drops messages below the configured level', () => {
    const lines: string[] = [];
    const log = createLogger({ level: 'warn', write: (line) => lines.push(line) });

    log.debug('a');
    log.info('b');
    log.warn('c');
    log.error('d');

    expect(lines.map((l) => l.split(' - ')[1])).toEqual(['c', 'd']);
  });

  test('writes nothing when silent', () => {
    const lines: string[] = [];
    createLogger({ level: 'silent', write: (line) => lines.push(line) }).error('boom');
    expect(lines).toEqual([]);
  });

  test('parses LOG_LEVEL values', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('silent')).toBe('silent');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
