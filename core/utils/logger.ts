import winston from 'winston';
import { loggingConfig, type LoggerServiceName } from '@core/config/logging';

/**
 * Leveled logger the execution core writes to. The winston loggers below
 * satisfy it; tests can pass any object with these methods.
 */
export interface ILogger {
  error(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

winston.addColors(loggingConfig.colors);

const isDebugMode = (): boolean => process.env.PIPEWRIGHT_DEBUG === 'true';

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // Operator-facing output is the bare message
    if (!isDebugMode()) {
      return String(message);
    }

    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

// Determine the log level based on environment variables
const getLogLevel = (fallback: string): string => {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (isDebugMode()) {
    return 'debug';
  }

  return fallback;
};

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory {
  /**
   * Create a service-specific logger
   * @param serviceName The name of the service to create a logger for
   */
  createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
    const serviceConfig = loggingConfig.services[serviceName];

    return winston.createLogger({
      levels: loggingConfig.levels,
      level: getLogLevel(serviceConfig.level),
      defaultMeta: { service: serviceName },
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          // Keep test output clean unless asked for
          silent: process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL
        })
      ]
    });
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const executionLogger = createServiceLogger('execution');
export const remoteLogger = createServiceLogger('remote');
export const pipelineLogger = createServiceLogger('pipeline');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');

/**
 * Apply a level to every service logger, e.g. from `--debug` or the config file.
 */
export function setLogLevel(level: string): void {
  for (const logger of [executionLogger, remoteLogger, pipelineLogger, configLogger, cliLogger]) {
    logger.level = level;
  }
}
