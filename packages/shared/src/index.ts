export { z, ZodError } from './z.js';
export { LOG_LEVELS, logLevelSchema, baseEnvSchema, loadEnv, type BaseEnv } from './env.js';
export {
  createLogger,
  stdoutDestination,
  type CreateLoggerOptions,
  type DestinationStream,
  type LevelWithSilent,
  type LoggerOptions,
  type Logger
} from './logger.js';
