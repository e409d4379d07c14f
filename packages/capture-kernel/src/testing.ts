import type { Logger } from '@correlator/shared';

import { initializeCapture } from './capture.js';
import type { CorrelatedEvents } from './correlated-events.js';
import type { CorrelationScope } from './scope.js';
import type { QueryOptions } from './store.js';
import type { CorrelationToken } from './token.js';

export type CorrelatedTestContext = {
  scope: CorrelationScope;
  token: CorrelationToken;
  logger: Logger;
  events(options?: QueryOptions): CorrelatedEvents;
};

/**
 * Wraps a test body so it runs in its own correlation scope.
 *
 * @example
 * it('logs the refund', withCorrelation(async ({ logger, events }) => {
 *   await refund(logger);
 *   expect(events().withMessage('refund issued').length).toBe(1);
 * }));
 */
export function withCorrelation<T>(
  fn: (context: CorrelatedTestContext) => T | Promise<T>
): () => Promise<T> {
  return () => {
    const { context, logger, store } = initializeCapture();

    return context.run((scope) =>
      fn({
        scope,
        token: scope.token,
        logger,
        events: (options) => store.query(scope.token, options)
      })
    );
  };
}
