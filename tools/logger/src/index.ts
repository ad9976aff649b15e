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

/**
 * Logger handed to every engine component.
 *
 * Components only depend on `LoggerMethods`, so any object with the four
 * methods (pino, winston, a test double) can be passed instead.
 */
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
   * Console-backed logger that drops messages below `level`.
   */
  static console(level: LogLevel = 'info'): Logger {
    const threshold = LEVEL_ORDER[level];
    const enabled = (methodLevel: Exclude<LogLevel, 'silent'>): boolean =>
      LEVEL_ORDER[methodLevel] >= threshold;

    return new Logger({
      debug: enabled('debug') ? (...args) => console.debug(...args) : noop,
      info: enabled('info') ? (...args) => console.info(...args) : noop,
      warn: enabled('warn') ? (...args) => console.warn(...args) : noop,
      error: enabled('error') ? (...args) => console.error(...args) : noop,
    });
  }

  /**
   * Logger that discards everything.
   */
  static silent(): Logger {
    return new Logger({ debug: noop, info: noop, warn: noop, error: noop });
  }
}

export { Logger };
export type { LoggerMethods, LogFn, LogLevel };
