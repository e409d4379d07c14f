import type { DestinationStream, LevelWithSilent, LoggerOptions } from '@correlator/shared';

import { CAPTURE_FIELDS, LEVEL_VALUES, parseLogLine, type CaptureLevel } from './event.js';
import type { EventCaptureStore } from './store.js';

export type EchoTarget = {
  write(line: string): unknown;
};

export type CaptureDestinationOptions = {
  echo?: EchoTarget | null;
  echoLevel?: LevelWithSilent;
  onMalformed?: (line: string) => void;
};

/**
 * pino options for loggers writing into a {@link CaptureDestination}. pino's own fields go under
 * {@link CAPTURE_FIELDS}, so payload keys such as `level`, `time` or `msg` reach the store as
 * properties. Every level is enabled.
 */
export const captureLoggerOptions = {
  level: 'trace',
  base: null,
  messageKey: CAPTURE_FIELDS.message,
  timestamp: () => `,"${CAPTURE_FIELDS.time}":${Date.now()}`,
  formatters: {
    level: (_label: string, value: number) => ({ [CAPTURE_FIELDS.level]: value })
  }
} satisfies LoggerOptions;

/**
 * pino destination that records every line it receives in an {@link EventCaptureStore}.
 *
 * pino calls `write` synchronously from the logging call, so the store sees the emitter's
 * execution context and tags the event with the scope active there.
 */
export class CaptureDestination implements DestinationStream {
  private dropped = 0;
  private echo: EchoTarget | null;
  private echoLevel: LevelWithSilent;
  private readonly onMalformed?: (line: string) => void;

  constructor(
    private readonly store: EventCaptureStore,
    options: CaptureDestinationOptions = {}
  ) {
    this.echo = options.echo ?? null;
    this.echoLevel = options.echoLevel ?? 'silent';
    this.onMalformed = options.onMalformed;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get echoTarget(): EchoTarget | null {
    return this.echo;
  }

  write(line: string): void {
    const input = parseLogLine(line);

    if (input) {
      this.store.capture(input);
    } else {
      this.dropped += 1;
      this.onMalformed?.(line);
    }

    if (this.echo && this.shouldEcho(input ? input.level : null)) {
      this.echo.write(line);
    }
  }

  configureEcho(echo: EchoTarget | null, echoLevel: LevelWithSilent): void {
    this.echo = echo;
    this.echoLevel = echoLevel;
  }

  // Lines that could not be parsed are echoed whenever echoing is on.
  private shouldEcho(level: CaptureLevel | number | null): boolean {
    const echoLevel = this.echoLevel;

    if (echoLevel === 'silent') {
      return false;
    }

    if (level === null) {
      return true;
    }

    const value = typeof level === 'number' ? level : LEVEL_VALUES[level];
    return value >= LEVEL_VALUES[echoLevel];
  }
}
