import {
  pino as createPino,
  destination,
  type DestinationStream,
  type Logger as PinoLogger,
  type LoggerOptions,
  type LevelWithSilent
} from 'pino';

import { logLevelSchema } from './env.js';

export type CreateLoggerOptions = LoggerOptions & {
  service?: string;
};

export type Logger = PinoLogger;

export type { DestinationStream, LevelWithSilent, LoggerOptions };

// An unknown LOG_LEVEL fails with a ZodError, the same as loadEnv().
function resolveLevel(level: string | undefined): string {
  if (level) {
    return level;
  }

  return logLevelSchema.parse(process.env.LOG_LEVEL?.trim().toLowerCase() || 'info');
}

export function createLogger(options: CreateLoggerOptions = {}, destination?: DestinationStream): Logger {
  const { service, level, ...rest } = options;

  const loggerOptions: LoggerOptions = {
    level: resolveLevel(level),
    ...rest
  };

  if (service && !loggerOptions.name) {
    loggerOptions.name = service;
  }

  return destination ? createPino(loggerOptions, destination) : createPino(loggerOptions);
}

export function stdoutDestination(): DestinationStream {
  return destination({ dest: 1, sync: true });
}
