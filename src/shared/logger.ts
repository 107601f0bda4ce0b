export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = '[paneldeck]';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => threshold >= LOG_LEVELS.indexOf(l);

  return {
    debug(message) {
      if (enabled('debug')) console.log(`${PREFIX} ${message}`);
    },
    info(message) {
      if (enabled('info')) console.log(`${PREFIX} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${PREFIX} ${message}`);
    },
    error(message) {
      if (enabled('error')) console.error(`${PREFIX} ${message}`);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
