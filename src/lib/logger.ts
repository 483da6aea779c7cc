/**
 * Tagged console logging.
 *
 * Usage:
 *   const log = createLogger('market-data');
 *   log.info('Cache miss', { key });
 *   // → [market-data] Cache miss { key: '...' }
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = (raw || 'info').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

export function createLogger(tag: string, level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  const prefix = `[${tag}]`;
  const enabled = (candidate: LogLevel) => LEVEL_WEIGHT[candidate] >= LEVEL_WEIGHT[level];

  // console methods are resolved on every call
  const write = (candidate: LogLevel, method: 'debug' | 'log' | 'warn' | 'error') =>
    (msg: string, data?: unknown) => {
      if (!enabled(candidate)) return;
      if (data === undefined) {
        console[method](`${prefix} ${msg}`);
      } else {
        console[method](`${prefix} ${msg}`, data);
      }
    };

  return {
    debug: write('debug', 'debug'),
    info: write('info', 'log'),
    warn: write('warn', 'warn'),
    error: write('error', 'error'),
  };
}

/** Logger that drops everything; handy for tests and library callers. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
