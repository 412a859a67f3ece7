/**
 * Leveled console logger with chalk colors.
 */

import chalk from 'chalk';
import type { LogLevel } from '@duetrack/core';

type Level = Exclude<LogLevel, 'silent'>;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LABEL: Record<Level, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

/** Where lines go. Matches the console methods used. */
export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

function describeError(err: unknown): string {
  if (err instanceof Error) return err.stack ?? `${err.name}: ${err.message}`;
  return String(err);
}

export function createLogger(level: LogLevel, sink: LogSink = console): Logger {
  const threshold = RANK[level];

  function write(at: Level, message: string): void {
    if (RANK[at] < threshold) return;
    const line = `${chalk.dim(new Date().toISOString())} ${LABEL[at]} ${message}`;
    if (at === 'error' || at === 'warn') sink.error(line);
    else sink.log(line);
  }

  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: (message, err) => write('error', err === undefined ? message : `${message}\n${describeError(err)}`),
  };
}
