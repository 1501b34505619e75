/*
 * Console logger with LOG_LEVEL support.
 * Writes to stderr so stdout only carries the report.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type ActiveLevel = Exclude<LogLevel, 'silent'>;

const LEVELS: Record<ActiveLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const COLOR: Record<ActiveLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

export function parseLogLevel(input: string | undefined): LogLevel {
  const lvl = String(input || 'info').toLowerCase();
  switch (lvl) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return lvl;
    default:
      return 'info';
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  const log = (lvl: ActiveLevel, message: string) => {
    if (level === 'silent' || LEVELS[lvl] < LEVELS[level]) return;
    const tag = COLOR[lvl](`[${lvl.toUpperCase()}]`);
    write(`${tag} ${new Date().toISOString()} - ${message}`);
  };

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  };
}

export const logger = createLogger();
