import { randomUUID } from 'node:crypto';

import { z } from '@correlator/shared/z';

export const correlationTokenSchema = z.string().uuid().brand<'CorrelationToken'>();

export type CorrelationToken = z.infer<typeof correlationTokenSchema>;

export function createCorrelationToken(): CorrelationToken {
  return correlationTokenSchema.parse(randomUUID());
}

/**
 * Parses a token received as text, e.g. from a response header. Surrounding whitespace and
 * letter case are ignored; anything that is not a UUID throws a `ZodError`.
 */
export function parseCorrelationToken(value: string): CorrelationToken {
  return correlationTokenSchema.parse(value.trim().toLowerCase());
}

export function isCorrelationToken(value: unknown): value is CorrelationToken {
  return correlationTokenSchema.safeParse(value).success;
}
