import { config } from 'winston';

export const loggingConfig = {
  // Syslog levels give us notice and warning next to debug/info/error
  levels: config.syslog.levels,

  colors: config.syslog.colors,

  defaultLevel: 'info',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    execution: {
      level: 'info'
    },
    remote: {
      level: 'info'
    },
    pipeline: {
      level: 'info'
    },
    config: {
      level: 'warning'
    },
    cli: {
      level: 'info'
    }
  }
};

export type LoggerServiceName = keyof typeof loggingConfig.services;
