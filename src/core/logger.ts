/**
 * Structured logging built on pino.
 *
 * Every component receives a {@link Logger} explicitly; nothing here keeps
 * process-wide logging state. The root logger is tagged with a `service`,
 * and components derive child loggers tagged with their `component`.
 * A child of a child is tagged with both names joined by `/`.
 *
 * @example
 * ```typescript
 * const logger = createLogger('experiment', { level: 'debug', pretty: true });
 * const resolverLog = logger.child('token-resolver');
 * resolverLog.info('Token comparison', { outcome: 'match', queryToken: '42' });
 * ```
 *
 * @module core/logger
 */

import { pino, type DestinationStream, type Logger as PinoLogger } from 'pino';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFormat = 'json' | 'pretty';

/** Primitive values that can be logged. Tokens are logged as strings. */
type LogPrimitive = string | number | boolean | null | undefined;

type LogValue =
  | LogPrimitive
  | readonly LogPrimitive[]
  | Readonly<Record<string, LogPrimitive>>
  | readonly Readonly<Record<string, LogPrimitive>>[];

/** Structured fields attached to a log entry. */
export type LogData = Readonly<Record<string, LogValue>>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;

  /**
   * Returns a logger whose entries are tagged with the given component,
   * appended to this logger's own component.
   */
  child(component: string): Logger;
}

export interface LoggerOptions {
  /** @default 'info' */
  readonly level?: LogLevel;

  /**
   * Renders entries through pino-pretty instead of JSON lines.
   * Ignored when a destination is given.
   * @default false
   */
  readonly pretty?: boolean;

  /** Where JSON lines are written. Defaults to stdout. */
  readonly destination?: DestinationStream;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Binds `component` once on the root pino logger; nested children join
 * their names with `/` (`ownership/token-resolver`).
 */
function wrap(root: PinoLogger, component?: string): Logger {
  const logger = component === undefined ? root : root.child({ component });
  return {
    debug: (message, data) => {
      if (data) {
        logger.debug(data, message);
      } else {
        logger.debug(message);
      }
    },
    info: (message, data) => {
      if (data) {
        logger.info(data, message);
      } else {
        logger.info(message);
      }
    },
    warn: (message, data) => {
      if (data) {
        logger.warn(data, message);
      } else {
        logger.warn(message);
      }
    },
    error: (message, data) => {
      if (data) {
        logger.error(data, message);
      } else {
        logger.error(message);
      }
    },
    child: (name) => wrap(root, component === undefined ? name : `${component}/${name}`),
  };
}

/**
 * Creates the root logger for a program or test.
 */
export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const base = {
    level: options.level ?? 'info',
    base: { service },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  };

  if (options.destination) {
    return wrap(pino(base, options.destination));
  }

  if (options.pretty) {
    return wrap(
      pino({
        ...base,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      }),
    );
  }

  return wrap(pino(base));
}

/**
 * A logger that drops everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
