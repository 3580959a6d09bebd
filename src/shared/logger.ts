// Scoped console logging. Everything goes to stderr so CLI stdout stays JSON.

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

let currentLevel: LogLevel = 'info';

export const setLogLevel = (level: LogLevel): void => {
  currentLevel = level;
};

export interface Logger {
  error(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  debug(message: string, ...rest: unknown[]): void;
}

export const createLogger = (scope: string): Logger => {
  const emit = (level: LogLevel, message: string, rest: unknown[]): void => {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[currentLevel]) return;
    const line = `[${scope}] ${message}`;
    if (level === 'error') {
      console.error(line, ...rest);
    } else if (level === 'warn') {
      console.warn(line, ...rest);
    } else {
      // console.info/debug write to stdout; keep it clean for JSON output
      console.error(line, ...rest);
    }
  };

  return {
    error: (message, ...rest) => emit('error', message, rest),
    warn: (message, ...rest) => emit('warn', message, rest),
    info: (message, ...rest) => emit('info', message, rest),
    debug: (message, ...rest) => emit('debug', message, rest)
  };
};
