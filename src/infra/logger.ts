export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const rank: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export function createLogger(context: string, level: LogLevel = 'info'): Logger {
  const enabled = (l: LogLevel) => rank[l] >= rank[level];
  const fmt = (message: string) => `[${context}] ${message}`;
  return {
    debug: m => { if (enabled('debug')) console.debug(fmt(m)); },
    info: m => { if (enabled('info')) console.log(fmt(m)); },
    warn: m => { if (enabled('warn')) console.warn(fmt(m)); },
    error: m => { if (enabled('error')) console.error(fmt(m)); },
  };
}
