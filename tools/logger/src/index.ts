type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

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
   * Returns a logger that drops every call below `level`.
   */
  withMinimumLevel(level: LogLevel): Logger {
    const threshold = LEVEL_ORDER[level];
    const pick = (name: Exclude<LogLevel, 'silent'>): LogFn =>
      LEVEL_ORDER[name] >= threshold ? this[name] : noop;

    return new Logger({
      debug: pick('debug'),
      info: pick('info'),
      warn: pick('warn'),
      error: pick('error'),
    });
  }
}

/**
 * Logger writing to the process console (stdout for debug/info, stderr for warn/error).
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('warn');
 * logger.info('[BatchProcessor] ignored');
 * logger.warn('[BatchProcessor] printed');
 * ```
 */
function createConsoleLogger(level: LogLevel = 'info'): Logger {
  return new Logger({
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  }).withMinimumLevel(level);
}

const silentLogger: LoggerMethods = new Logger({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});

export { Logger, createConsoleLogger, silentLogger };
export type { LoggerMethods, LogFn, LogLevel };
