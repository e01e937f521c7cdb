export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  child(scope: string): Logger;
}

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];
  const prefix = `[${scope}]`;
  return {
    debug: (m, ...meta) => { if (enabled('debug')) console.debug(prefix, m, ...meta); },
    info: (m, ...meta) => { if (enabled('info')) console.log(prefix, m, ...meta); },
    warn: (m, ...meta) => { if (enabled('warn')) console.warn(prefix, m, ...meta); },
    error: (m, ...meta) => { if (enabled('error')) console.error(prefix, m, ...meta); },
    child: (sub) => createLogger(`${scope}:${sub}`, level),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
