import pino, { Logger } from 'pino';
import { peekConfig } from '@venuepilot/config';

const PID = process.pid;

export type ScopedLogger = Logger;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
}

const LEVELS: ReadonlySet<string> = new Set<LogLevel>(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LEVELS.has(value);
}

const destination = pino.destination({
  sync: false
});

function resolveLevel(defaultLevel: LoggerOptions['level']): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return peekConfig()?.logging.level ?? defaultLevel ?? 'info';
}

export function createLogger(scope: string, options?: LoggerOptions): ScopedLogger {
  const level = resolveLevel(options?.level);
  return pino(
    {
      level,
      base: { pid: PID, scope },
      formatters: {
        level: (label) => ({ level: label })
      },
      redact: {
        paths: ['token', 'password', 'pass', 'credentials', '*.token', '*.password', '*.pass', 'headers.Authorization'],
        censor: '[redacted]'
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    destination
  );
}

export const rootLogger = createLogger('root');
