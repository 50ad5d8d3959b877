/**
 * Logging with Pino - provider keys are redacted
 */

import pino from 'pino';
import { parseLogLevel } from '@/core/env';

const redactPaths = [
  'apiKey',
  'api_key',
  'fredApiKey',
  'tavilyApiKey',
  'openaiApiKey',
  'anthropicApiKey',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
];

const prettyPrint = (process.env.NODE_ENV ?? 'development') === 'development';

export const logger = pino({
  name: 'instrument-analyzer',
  level: parseLogLevel(process.env.LOG_LEVEL),
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: prettyPrint
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname,name',
          translateTime: 'SYS:HH:MM:ss',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
