type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

const parseLogLevel = (value?: string): LogLevel | null => {
  if (!value) return null;
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
};

const defaultLevel: LogLevel = 'warn';
let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? defaultLevel;

const shouldLog = (level: LogLevel) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];

const logWithLevel =
  <T extends 'error' | 'warn' | 'info' | 'debug'>(level: LogLevel, method: T) =>
  (...args: Parameters<Console[T]>) => {
    if (shouldLog(level)) {
      console[method](...args);
    }
  };

export const setLogLevel = (level: LogLevel): void => {
  currentLevel = level;
};

export const getLogLevel = (): LogLevel => currentLevel;

export const logger = {
  error: logWithLevel('error', 'error'),
  warn: logWithLevel('warn', 'warn'),
  info: logWithLevel('info', 'info'),
  debug: logWithLevel('debug', 'debug')
};

export type { LogLevel };
