import { config } from 'dotenv';

import { z } from './z.js';

config();

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const logLevelSchema = z.enum(LOG_LEVELS);

export const baseEnvSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  CAPTURE_ECHO_LEVEL: logLevelSchema.default('silent')
});

export type BaseEnv = z.infer<typeof baseEnvSchema>;

type EnvSource = Record<string, string | undefined>;

export function loadEnv(source: EnvSource = process.env): BaseEnv {
  return baseEnvSchema.parse({
    LOG_LEVEL: emptyToUndefined(source.LOG_LEVEL),
    CAPTURE_ECHO_LEVEL: emptyToUndefined(source.CAPTURE_ECHO_LEVEL)
  });
}

function emptyToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed.toLowerCase() : undefined;
}
