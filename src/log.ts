const isProd = process.env.NODE_ENV === 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, error: 40, info: 20, warn: 30 };

interface LogEntry {
  level: LogLevel;
  message: string;
  source: string;
  timestamp: string;
  [key: string]: unknown;
}

export type Logger = ReturnType<typeof createLogger>;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const envLevel = process.env.LOG_LEVEL;
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function createLogger(source: string) {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      source,
      timestamp: new Date().toISOString(),
      ...data,
    };

    const consoleMethod = level === 'debug' ? 'log' : level;

    if (isProd) {
      console[consoleMethod](JSON.stringify(entry));
    } else {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      console[consoleMethod](`${entry.timestamp} ${level} [${source}] ${message}${dataStr}`);
    }
  };

  return {
    debug: (message: string, data?: Record<string, unknown>) => log('debug', message, data),
    error: (message: string, data?: Record<string, unknown>) => log('error', message, data),
    info: (message: string, data?: Record<string, unknown>) => log('info', message, data),
    warn: (message: string, data?: Record<string, unknown>) => log('warn', message, data),
  };
}
