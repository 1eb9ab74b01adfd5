import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';

export type { Logger } from 'winston';

const LEVELS = ['error', 'warn', 'info', 'debug', 'silent'] as const;
export type LogLevel = (typeof LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  const resolved: LogLevel = isLogLevel(level) ? level : 'info';
  return createWinstonLogger({
    level: resolved === 'silent' ? 'error' : resolved,
    silent: resolved === 'silent',
    format: format.combine(
      format.timestamp(),
      format.printf(({ timestamp, level, message, scope }) =>
        `${timestamp} [${level.toUpperCase()}] [${typeof scope === 'string' ? scope : 'watch'}] ${message}`
      )
    ),
    transports: [new transports.Console()],
  });
}

let rootLogger: Logger | undefined;

export function getLogger(scope?: string): Logger {
  rootLogger ??= createLogger();
  return scope ? rootLogger.child({ scope }) : rootLogger;
}

/** Applies `level` to the root logger and every child scope made from it. */
export function setLogLevel(level: LogLevel): void {
  const logger = getLogger();
  logger.level = level === 'silent' ? 'error' : level;
  logger.silent = level === 'silent';
}
