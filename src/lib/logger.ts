type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

const threshold = (): number => {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
};

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold();

const formatMessage = (level: LogLevel, message: string): string => {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
};

export const logger = {
  debug: (message: string): void => {
    if (enabled('debug')) {
      console.debug(formatMessage('debug', message));
    }
  },
  info: (message: string): void => {
    if (enabled('info')) {
      console.info(formatMessage('info', message));
    }
  },
  warn: (message: string): void => {
    if (enabled('warn')) {
      console.warn(formatMessage('warn', message));
    }
  },
  error: (message: string, error?: unknown): void => {
    console.error(formatMessage('error', message));
    if (error instanceof Error) {
      console.error(error.stack || error.message);
    } else if (error !== undefined) {
      console.error(String(error));
    }
  },
};

export default logger;
