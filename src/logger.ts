import { pino } from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Connection strings carry credentials
  redact: {
    paths: ['databaseUrl', 'connectionString', 'password'],
    censor: '[REDACTED]',
  },
});

// Child logger for one processing run
export function createRunLogger(runId: string) {
  return logger.child({ runId });
}

export type Logger = typeof logger;
