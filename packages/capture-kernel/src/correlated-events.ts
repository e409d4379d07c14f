import type { CaptureLevel, CapturedEvent } from './event.js';
import type { CorrelationToken } from './token.js';

type EventPredicate = (event: CapturedEvent) => boolean;

/** Read-only snapshot of the events captured for one correlation token. */
export class CorrelatedEvents implements Iterable<CapturedEvent> {
  private readonly events: readonly CapturedEvent[];

  constructor(
    readonly token: CorrelationToken,
    events: readonly CapturedEvent[]
  ) {
    this.events = Object.freeze([...events]);
  }

  get length(): number {
    return this.events.length;
  }

  isEmpty(): boolean {
    return this.events.length === 0;
  }

  toArray(): readonly CapturedEvent[] {
    return this.events;
  }

  messages(): string[] {
    return this.events.map((event) => event.message);
  }

  some(predicate: EventPredicate): boolean {
    return this.events.some(predicate);
  }

  every(predicate: EventPredicate): boolean {
    return this.events.every(predicate);
  }

  find(predicate: EventPredicate): CapturedEvent | undefined {
    return this.events.find(predicate);
  }

  filter(predicate: EventPredicate): CorrelatedEvents {
    return new CorrelatedEvents(this.token, this.events.filter(predicate));
  }

  atLevel(level: CaptureLevel): CorrelatedEvents {
    return this.filter((event) => event.level === level);
  }

  withMessage(pattern: string | RegExp): CorrelatedEvents {
    return this.filter((event) =>
      typeof pattern === 'string' ? event.message === pattern : pattern.test(event.message)
    );
  }

  [Symbol.iterator](): Iterator<CapturedEvent> {
    return this.events[Symbol.iterator]();
  }
}
