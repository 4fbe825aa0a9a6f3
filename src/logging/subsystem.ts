/**
 * Subsystem Logging
 *
 * Named, structured loggers for each probe subsystem, backed by tslog.
 * Every subsystem logger is a child of one root logger so the level and
 * output format are decided in a single place.
 */

import { Logger, type ILogObj } from 'tslog';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogMeta = Record<string, unknown>;

export interface SubsystemLogger {
  readonly subsystem: string;
  trace(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
  child(name: string): SubsystemLogger;
}

// tslog numbers its levels 0 (silly) through 6 (fatal)
const LEVEL_IDS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
      return normalized;
    default:
      return 'info';
  }
}

let rootLogger: Logger<ILogObj> | undefined;

function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    const underTest = process.env.VITEST !== undefined;
    rootLogger = new Logger<ILogObj>({
      name: 'powerprobe',
      type: underTest ? 'hidden' : process.env.POWERPROBE_LOG_FORMAT === 'json' ? 'json' : 'pretty',
      minLevel: LEVEL_IDS[parseLogLevel(process.env.POWERPROBE_LOG_LEVEL)],
    });
  }
  return rootLogger;
}

function wrap(subsystem: string, logger: Logger<ILogObj>): SubsystemLogger {
  const emit = (level: LogLevel, message: string, meta?: LogMeta): void => {
    const args: unknown[] = meta ? [message, meta] : [message];
    switch (level) {
      case 'trace':
        logger.trace(...args);
        break;
      case 'debug':
        logger.debug(...args);
        break;
      case 'info':
        logger.info(...args);
        break;
      case 'warn':
        logger.warn(...args);
        break;
      case 'error':
        logger.error(...args);
        break;
      case 'fatal':
        logger.fatal(...args);
        break;
    }
  };

  return {
    subsystem,
    trace: (message, meta) => emit('trace', message, meta),
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    fatal: (message, meta) => emit('fatal', message, meta),
    child: (name) => {
      const childName = `${subsystem}/${name}`;
      return wrap(childName, logger.getSubLogger({ name: childName }));
    },
  };
}

/**
 * Creates a logger whose records carry the subsystem name, e.g. `probe/battery`.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(subsystem, getRootLogger().getSubLogger({ name: subsystem }));
}
