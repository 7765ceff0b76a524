import pino from 'pino';
import type { Logger, Level, LoggerOptions } from 'pino';

export type { Logger, Level };

export type LogLevel = Level | 'silent';

export type Environment = 'development' | 'production' | 'test';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

export const DEFAULT_LOG_LEVELS: Record<Environment, LogLevel> = {
  development: 'debug',
  production: 'info',
  test: 'silent',
};

export interface LoggerConfig {
  /** Service name, bound to every line */
  service: string;
  /** Explicit level; otherwise resolved from the environment */
  level?: LogLevel;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
}

export function isValidLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function currentEnvironment(): Environment {
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Resolve the level for a service: LOG_LEVEL_<SERVICE>, then LOG_LEVEL, then the
 * environment default
 */
export function getLogLevel(service?: string): LogLevel {
  if (service) {
    const serviceLevel = process.env[`LOG_LEVEL_${service.toUpperCase()}`];
    if (isValidLogLevel(serviceLevel)) return serviceLevel;
  }
  const globalLevel = process.env.LOG_LEVEL;
  if (isValidLogLevel(globalLevel)) return globalLevel;
  return DEFAULT_LOG_LEVELS[currentEnvironment()];
}

/**
 * Create a pino logger bound to a service name
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'engine' });
 * logger.info({ instrument: 'abc:123' }, 'Run started');
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level ?? getLogLevel(config.service),
    base: { service: config.service },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

/**
 * Derive a logger that adds fixed fields (run id, instrument) to every line
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
