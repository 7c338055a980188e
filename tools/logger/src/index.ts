type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/** Severity order, lowest first */
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }

  /**
   * Build a logger that drops every call below `minLevel`.
   */
  static withMinLevel(methods: LoggerMethods, minLevel: LogLevel): Logger {
    const threshold = LOG_LEVELS.indexOf(minLevel);
    const pick = (level: LogLevel): LogFn =>
      LOG_LEVELS.indexOf(level) >= threshold ? methods[level] : noop;

    return new Logger({
      debug: pick('debug'),
      info: pick('info'),
      warn: pick('warn'),
      error: pick('error'),
    });
  }
}

export { Logger };
export type { LogFn, LogLevel, LoggerMethods };
