import { CorrelatedEvents } from './correlated-events.js';
import {
  freezeProperties,
  LEVEL_VALUES,
  levelFromValue,
  toIsoTimestamp,
  type CaptureInput,
  type CapturedEvent
} from './event.js';
import { correlationContext, type CorrelationContext } from './scope.js';
import type { CorrelationToken } from './token.js';

export type EventCaptureStoreOptions = {
  context?: CorrelationContext;
  now?: () => Date;
};

export type QueryOptions = {
  /** Also return events captured in scopes nested inside the token's scope. */
  includeNested?: boolean;
  /**
   * Also return events carrying a property named after the token, the way emitters that
   * cannot rely on the active scope stamp their output (see `correlationMarker`).
   */
  matchPropertyMarker?: boolean;
};

/**
 * Append-only, process-lifetime collection of captured log events.
 *
 * Each capture reads the active lineage and appends in the same synchronous call, so an
 * event's tag is fixed when it becomes visible. Queries copy the matching slice.
 */
export class EventCaptureStore {
  private readonly events: CapturedEvent[] = [];
  private readonly byToken = new Map<CorrelationToken, CapturedEvent[]>();
  private readonly context: CorrelationContext;
  private readonly now: () => Date;

  constructor(options: EventCaptureStoreOptions = {}) {
    this.context = options.context ?? correlationContext;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.events.length;
  }

  capture(input: CaptureInput): CapturedEvent {
    const lineage = this.context.lineage();
    const token = lineage[0] ?? null;
    const levelValue = typeof input.level === 'number' ? input.level : LEVEL_VALUES[input.level];

    const event: CapturedEvent = Object.freeze({
      sequence: this.events.length + 1,
      timestamp: toIsoTimestamp(input.timestamp, this.now),
      level: levelFromValue(levelValue),
      levelValue,
      message: input.message ?? '',
      properties: freezeProperties(input.properties),
      token,
      lineage: Object.freeze(lineage)
    });

    this.events.push(event);

    if (token) {
      const tagged = this.byToken.get(token) ?? [];
      tagged.push(event);
      this.byToken.set(token, tagged);
    }

    return event;
  }

  query(token: CorrelationToken, options: QueryOptions = {}): CorrelatedEvents {
    const { includeNested = false, matchPropertyMarker = false } = options;

    if (!includeNested && !matchPropertyMarker) {
      return new CorrelatedEvents(token, this.byToken.get(token) ?? []);
    }

    return new CorrelatedEvents(
      token,
      this.events.filter(
        (event) =>
          event.token === token ||
          (includeNested && event.lineage.includes(token)) ||
          (matchPropertyMarker && Object.hasOwn(event.properties, token))
      )
    );
  }

  untagged(): readonly CapturedEvent[] {
    return Object.freeze(this.events.filter((event) => event.token === null));
  }
}

/**
 * Bindings that stamp a token onto a logger's output as a property name, for code running
 * where the active scope does not reach. Pair with `matchPropertyMarker` when querying.
 */
export function correlationMarker(token: CorrelationToken): Record<string, null> {
  return { [token]: null };
}
