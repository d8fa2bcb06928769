import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // Format configuration
  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    pipeline: {
      level: 'warn'
    },
    executor: {
      level: 'warn'
    },
    resources: {
      level: 'warn'
    },
    config: {
      level: 'warn'
    },
    cli: {
      level: 'warn'
    }
  }
} as const;

export type LoggingService = keyof typeof loggingConfig.services;
