import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

const SERVICE_NAME = 'banking-transactions-etl';
const LOG_TIMEZONE = process.env.LOG_TIMEZONE || 'Asia/Jakarta';

//unknown LOG_LEVEL values fall back to info instead of crashing pino at startup
function resolveLevel(value: string | undefined): LevelWithSilent {
  switch (value) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

//bank local time, e.g. "2024-01-01 08:30:00"
const timestamp = () => {
  const localTime = new Date().toLocaleString('sv-SE', {
    timeZone: LOG_TIMEZONE,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false
  });

  return `,"time":"${localTime}"`;
};

//one root logger per process, modules take children of it
const rootLogger = pino({
  timestamp,
  level: resolveLevel(process.env.LOG_LEVEL),
  base: {
    service: SERVICE_NAME,
    pid: process.pid,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  transport: process.env.NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,service',
      colorize: true,
    }
  } : undefined,
});

/**
 * Child logger tagged with the calling component, e.g. `createLogger('TransactionLoader')`.
 */
export function createLogger(context?: string): Logger {
  return context ? rootLogger.child({ context }) : rootLogger;
}
