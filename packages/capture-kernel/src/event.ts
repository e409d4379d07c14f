import { z } from '@correlator/shared/z';

import type { CorrelationToken } from './token.js';

export const CAPTURE_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type CaptureLevel = (typeof CAPTURE_LEVELS)[number];

// Numeric values pino assigns to its standard levels.
export const LEVEL_VALUES: Readonly<Record<CaptureLevel, number>> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60
};

export function levelFromValue(value: number): CaptureLevel {
  let resolved: CaptureLevel = 'trace';

  for (const level of CAPTURE_LEVELS) {
    if (value >= LEVEL_VALUES[level]) {
      resolved = level;
    }
  }

  return resolved;
}

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

type Scalar = z.infer<typeof scalarSchema>;

export type PropertyValue = Scalar | PropertyValue[] | { [key: string]: PropertyValue };

export const propertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([scalarSchema, z.array(propertyValueSchema), z.record(propertyValueSchema)])
);

export type EventProperties = Readonly<Record<string, PropertyValue>>;

export type CaptureInput = {
  level: CaptureLevel | number;
  message?: string;
  properties?: EventProperties;
  timestamp?: Date | string | number;
};

export type CapturedEvent = {
  readonly sequence: number;
  readonly timestamp: string;
  readonly level: CaptureLevel;
  readonly levelValue: number;
  readonly message: string;
  readonly properties: EventProperties;
  readonly token: CorrelationToken | null;
  readonly lineage: readonly CorrelationToken[];
};

/**
 * Keys the capture logger writes its own fields under. Payload data keeps `level`, `time`
 * and `msg` for itself.
 */
export const CAPTURE_FIELDS = {
  level: '@level',
  time: '@time',
  message: '@msg'
} as const;

type LineFields = {
  level: string;
  time: string;
  message: string;
};

// pino's own layout, as written by loggers that were not built with the capture options.
const PINO_FIELDS: LineFields = { level: 'level', time: 'time', message: 'msg' };

const logRecordSchema = z.record(propertyValueSchema);

/**
 * Turns one line written by pino into a capture input. Returns `null` only when the line is
 * not a JSON object.
 *
 * A field that does not have the expected type stays in the properties under its own key: a
 * missing or non-numeric level becomes `info`, a missing message becomes `''`.
 */
export function parseLogLine(line: string): CaptureInput | null {
  let raw: unknown;

  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }

  const parsed = logRecordSchema.safeParse(raw);

  if (!parsed.success) {
    return null;
  }

  const properties: Record<string, PropertyValue> = { ...parsed.data };
  const fields: LineFields = Object.hasOwn(properties, CAPTURE_FIELDS.level) ? CAPTURE_FIELDS : PINO_FIELDS;

  const level = properties[fields.level];
  const time = properties[fields.time];
  const message = properties[fields.message];

  const input: CaptureInput = { level: LEVEL_VALUES.info, properties };

  if (typeof level === 'number') {
    input.level = level;
    delete properties[fields.level];
  }

  if (typeof time === 'number' || typeof time === 'string') {
    input.timestamp = time;
    delete properties[fields.time];
  }

  if (typeof message === 'string') {
    input.message = message;
    delete properties[fields.message];
  }

  return input;
}

export function toIsoTimestamp(value: Date | string | number | undefined, now: () => Date): string {
  if (value === undefined) {
    return now().toISOString();
  }

  const date = value instanceof Date ? value : new Date(value);

  return Number.isNaN(date.getTime()) ? now().toISOString() : date.toISOString();
}

export function freezeProperties(properties: EventProperties | undefined): EventProperties {
  const copy: Record<string, PropertyValue> = {};

  for (const [key, value] of Object.entries(properties ?? {})) {
    copy[key] = freezeValue(value);
  }

  return Object.freeze(copy);
}

function freezeValue(value: PropertyValue): PropertyValue {
  if (Array.isArray(value)) {
    const items = value.map(freezeValue);
    Object.freeze(items);
    return items;
  }

  if (value !== null && typeof value === 'object') {
    const copy: { [key: string]: PropertyValue } = {};
    for (const [key, nested] of Object.entries(value)) {
      copy[key] = freezeValue(nested);
    }
    return Object.freeze(copy);
  }

  return value;
}
