import winston from 'winston';
import { loggingConfig, type LoggingService } from '@core/config/logging';

/**
 * Interface for the LoggerFactory
 */
export interface ILoggerFactory {
  createServiceLogger(serviceName: LoggingService): winston.Logger;
}

// Add colors to Winston
winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

/**
 * Resolve the level for a service from the environment
 */
export function resolveLogLevel(serviceName: LoggingService): string {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  // During tests, respect TEST_LOG_LEVEL or default to error for minimal output
  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.PIPESHELL_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[serviceName].level;
}

type ServiceTransport =
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance;

function createTransports(): ServiceTransport[] {
  const transports: ServiceTransport[] = [
    // Console output goes to stderr so stdout stays free for pipeline output
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: Object.keys(loggingConfig.levels),
      silent: process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL
    })
  ];

  if (process.env.PIPESHELL_LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: process.env.PIPESHELL_LOG_FILE,
        format: fileFormat
      })
    );
  }

  return transports;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  private readonly loggers = new Map<LoggingService, winston.Logger>();

  createServiceLogger(serviceName: LoggingService): winston.Logger {
    const existing = this.loggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const logger = winston.createLogger({
      level: resolveLogLevel(serviceName),
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      transports: createTransports()
    });

    this.loggers.set(serviceName, logger);
    return logger;
  }

  /**
   * Apply one level to every logger created so far
   */
  setLevel(level: string): void {
    for (const logger of this.loggers.values()) {
      logger.level = level;
    }
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggingService): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const pipelineLogger = createServiceLogger('pipeline');
export const executorLogger = createServiceLogger('executor');
export const resourceLogger = createServiceLogger('resources');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');

export default pipelineLogger;
