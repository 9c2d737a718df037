import pino from 'pino';
import { appConfig } from '../config/app.config.js';

// stdout carries the stdio JSON-RPC stream, so every log line goes to stderr.
const STDERR = 2;

const loggerConfig: pino.LoggerOptions = {
  level: appConfig.logLevel,
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(appConfig.isDevelopment ? {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        destination: STDERR,
      }
    }
  } : {})
};

const baseLogger = appConfig.isDevelopment
  ? pino(loggerConfig)
  : pino(loggerConfig, pino.destination(STDERR));

export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}

export type Logger = pino.Logger;

export { baseLogger as logger };
