import {
  createLogger,
  loadEnv,
  stdoutDestination,
  type DestinationStream,
  type LevelWithSilent,
  type Logger
} from '@correlator/shared';

import type { CorrelatedEvents } from './correlated-events.js';
import { CaptureDestination, captureLoggerOptions, type EchoTarget } from './destination.js';
import { CorrelationError } from './errors.js';
import { correlationContext, type CorrelationContext, type CorrelationScope } from './scope.js';
import { EventCaptureStore, type QueryOptions } from './store.js';
import type { CorrelationToken } from './token.js';

export type CaptureOptions = {
  /** Where captured lines are mirrored. Defaults to stdout when `echoLevel` is not `silent`. */
  echo?: EchoTarget | null;
  /** Defaults to `CAPTURE_ECHO_LEVEL`. */
  echoLevel?: LevelWithSilent;
};

export type CaptureRuntime = {
  readonly store: EventCaptureStore;
  readonly destination: CaptureDestination;
  readonly logger: Logger;
  readonly context: CorrelationContext;
};

let runtime: CaptureRuntime | null = null;
let diagnostics: Logger | null = null;
let stdout: DestinationStream | null = null;

// Kept apart from the capture logger so the correlator's own output never lands in the store.
function getDiagnostics(): Logger {
  if (!diagnostics) {
    diagnostics = createLogger({ service: 'log-correlator', level: loadEnv().LOG_LEVEL });
  }

  return diagnostics;
}

function resolveEcho(echo: EchoTarget | null | undefined, echoLevel: LevelWithSilent): EchoTarget | null {
  if (echo !== undefined) {
    return echo;
  }

  if (echoLevel === 'silent') {
    return null;
  }

  // Reused across echo reconfigurations.
  if (!stdout) {
    stdout = stdoutDestination();
  }

  return stdout;
}

/**
 * Installs the process-wide capture pipeline and returns it.
 *
 * Only the first call creates anything. Later calls return the same runtime, with the same
 * logger and every event captured so far; options given to them only reconfigure echoing.
 */
export function initializeCapture(options: CaptureOptions = {}): CaptureRuntime {
  if (runtime) {
    if (options.echo !== undefined || options.echoLevel !== undefined) {
      const echoLevel = options.echoLevel ?? loadEnv().CAPTURE_ECHO_LEVEL;
      runtime.destination.configureEcho(resolveEcho(options.echo, echoLevel), echoLevel);
    }

    getDiagnostics().debug({ capturedEvents: runtime.store.size }, 'capture already initialized');
    return runtime;
  }

  const echoLevel = options.echoLevel ?? loadEnv().CAPTURE_ECHO_LEVEL;
  const store = new EventCaptureStore({ context: correlationContext });
  const destination = new CaptureDestination(store, {
    echo: resolveEcho(options.echo, echoLevel),
    echoLevel,
    onMalformed: (line) => {
      getDiagnostics().warn({ line }, 'dropped log line that is not a pino record');
    }
  });

  const logger = createLogger(captureLoggerOptions, destination);

  runtime = { store, destination, logger, context: correlationContext };
  getDiagnostics().debug({ echoLevel }, 'capture initialized');

  return runtime;
}

export function isCaptureInitialized(): boolean {
  return runtime !== null;
}

function requireRuntime(operation: string): CaptureRuntime {
  if (!runtime) {
    throw new CorrelationError(
      'CAPTURE_NOT_INITIALIZED',
      `${operation} requires initializeCapture() to be called first.`
    );
  }

  return runtime;
}

export function getCaptureLogger(): Logger {
  return requireRuntime('getCaptureLogger').logger;
}

export function correlatedEvents(token: CorrelationToken, options?: QueryOptions): CorrelatedEvents {
  return requireRuntime('correlatedEvents').store.query(token, options);
}

export function beginCorrelationScope(): CorrelationScope {
  return correlationContext.begin();
}

export function withCorrelationScope<T>(fn: (scope: CorrelationScope) => T | Promise<T>): Promise<T> {
  return correlationContext.run(fn);
}

export function activeCorrelationToken(): CorrelationToken | null {
  return correlationContext.activeToken();
}
