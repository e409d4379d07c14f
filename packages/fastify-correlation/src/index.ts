import type { IncomingMessage } from 'node:http';

import type { FastifyInstance } from 'fastify';

import {
  correlationContext,
  correlationMarker,
  type CorrelationContext,
  type CorrelationScope
} from '@correlator/capture-kernel';

declare module 'fastify' {
  interface FastifyRequest {
    correlationScope: CorrelationScope | null;
  }
}

export const DEFAULT_CORRELATION_HEADER = 'x-correlation-token';

export type CorrelationScopeHookOptions = {
  header?: string;
  context?: CorrelationContext;
};

/**
 * Runs every request in its own correlation scope and returns the token in a response header.
 *
 * Handler and hook output is tagged with the token. Fastify writes `incoming request` before
 * the scope is entered and `request completed` after it is released, so those lines are
 * untagged; `request.log` carries `correlationMarker(token)` as a binding, and
 * `correlatedEvents(token, { matchPropertyMarker: true })` returns them together with the
 * tagged ones. Register before the routes: Fastify picks the child logger factory up at
 * route registration.
 */
export function registerCorrelationScope(
  app: FastifyInstance,
  options: CorrelationScopeHookOptions = {}
): void {
  const header = options.header ?? DEFAULT_CORRELATION_HEADER;
  const context = options.context ?? correlationContext;
  const pending = new WeakMap<IncomingMessage, CorrelationScope>();
  const createChildLogger = app.childLoggerFactory;

  app.decorateRequest('correlationScope', null);

  // The request logger exists before any hook runs, so the scope is created with it.
  app.setChildLoggerFactory(function (logger, bindings, childOptions, rawRequest) {
    const scope = context.createScope();
    pending.set(rawRequest, scope);

    return createChildLogger.call(
      this,
      logger,
      { ...bindings, ...correlationMarker(scope.token) },
      childOptions,
      rawRequest
    );
  });

  app.addHook('onRequest', (request, reply, done) => {
    const scope = pending.get(request.raw) ?? context.createScope();
    pending.delete(request.raw);

    request.correlationScope = scope;
    reply.header(header, scope.token);

    // The rest of the lifecycle continues from inside the scope.
    context.attach(scope, () => done());
  });

  app.addHook('onResponse', (request, _reply, done) => {
    const scope = request.correlationScope;

    if (scope && !scope.released) {
      scope.release();
    }

    done();
  });
}
