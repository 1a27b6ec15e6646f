import { pino, type LoggerOptions } from 'pino';
import { config } from './config';

export const loggerOptions: LoggerOptions = {
  level: config.logLevel,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'clip-render',
  },
};

export const logger = pino(loggerOptions);

export type Logger = typeof logger;

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
