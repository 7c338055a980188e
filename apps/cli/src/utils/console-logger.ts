import type { LogLevel, LoggerMethods } from '@dossier/logger';

import { Logger } from '@dossier/logger';
import { format } from 'node:util';

/** Where log lines go; `console` in production */
export type ConsoleSink = Pick<Console, 'log' | 'error'>;

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
};

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatLogLine(
  level: LogLevel,
  args: readonly unknown[],
  date: Date,
): string {
  return `${formatTimestamp(date)} - ${LEVEL_LABELS[level]} - ${format(...args)}`;
}

/**
 * Logger writing timestamped lines; warnings and errors go to stderr.
 */
export function createConsoleLogger(
  minLevel: LogLevel,
  sink: ConsoleSink = console,
  now: () => Date = () => new Date(),
): Logger {
  const write =
    (level: LogLevel, target: 'log' | 'error') =>
    (...args: unknown[]) => {
      sink[target](formatLogLine(level, args, now()));
    };

  const methods: LoggerMethods = {
    debug: write('debug', 'log'),
    info: write('info', 'log'),
    warn: write('warn', 'error'),
    error: write('error', 'error'),
  };
  return Logger.withMinLevel(methods, minLevel);
}
