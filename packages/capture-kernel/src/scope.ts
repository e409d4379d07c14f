import { AsyncLocalStorage } from 'node:async_hooks';

import { CorrelationError } from './errors.js';
import { createCorrelationToken, type CorrelationToken } from './token.js';

/**
 * `entered` scopes were pushed onto the calling execution context with `begin()` and must be
 * released from that context. `attached` scopes are activated for a callback through
 * `attach()`/`run()` and may be released by whoever owns them.
 */
export type ScopeBinding = 'entered' | 'attached';

type ScopeFrame = {
  readonly scope: CorrelationScope;
  readonly parent: ScopeFrame | undefined;
};

type ScopeOwner = {
  isScopeReleased(scope: CorrelationScope): boolean;
  releaseScope(scope: CorrelationScope): void;
};

export class CorrelationScope {
  readonly token: CorrelationToken;

  constructor(
    readonly parent: CorrelationScope | null,
    readonly binding: ScopeBinding,
    private readonly owner: ScopeOwner
  ) {
    this.token = createCorrelationToken();
  }

  get released(): boolean {
    return this.owner.isScopeReleased(this);
  }

  release(): void {
    this.owner.releaseScope(this);
  }
}

/**
 * Tracks the active correlation scope per execution context.
 *
 * Every async continuation inherits the frame that was current when it was created, so two
 * concurrent operations never observe each other's scope. Released scopes can linger in a
 * continuation's frame chain; lookups skip them, which gives release its "pop" semantics even
 * for continuations that outlive the scope.
 */
export class CorrelationContext {
  private readonly storage = new AsyncLocalStorage<ScopeFrame | undefined>();
  private readonly releasedScopes = new WeakSet<CorrelationScope>();

  activeScope(): CorrelationScope | null {
    let frame = this.storage.getStore();

    while (frame && this.releasedScopes.has(frame.scope)) {
      frame = frame.parent;
    }

    return frame?.scope ?? null;
  }

  activeToken(): CorrelationToken | null {
    return this.activeScope()?.token ?? null;
  }

  /** Live tokens on the calling context, innermost first. */
  lineage(): CorrelationToken[] {
    const tokens: CorrelationToken[] = [];

    for (let frame = this.storage.getStore(); frame; frame = frame.parent) {
      if (!this.releasedScopes.has(frame.scope)) {
        tokens.push(frame.scope.token);
      }
    }

    return tokens;
  }

  begin(): CorrelationScope {
    const scope = new CorrelationScope(this.activeScope(), 'entered', this);
    this.storage.enterWith({ scope, parent: this.storage.getStore() });
    return scope;
  }

  createScope(): CorrelationScope {
    return new CorrelationScope(this.activeScope(), 'attached', this);
  }

  attach<T>(scope: CorrelationScope, fn: () => T): T {
    if (this.releasedScopes.has(scope)) {
      throw new CorrelationError(
        'SCOPE_ALREADY_RELEASED',
        `Correlation scope ${scope.token} was released and cannot be attached again.`
      );
    }

    return this.storage.run({ scope, parent: this.storage.getStore() }, fn);
  }

  async run<T>(fn: (scope: CorrelationScope) => T | Promise<T>): Promise<T> {
    const scope = this.createScope();

    try {
      return await this.attach(scope, () => fn(scope));
    } finally {
      // fn may end the scope itself
      if (!this.releasedScopes.has(scope)) {
        scope.release();
      }
    }
  }

  isScopeReleased(scope: CorrelationScope): boolean {
    return this.releasedScopes.has(scope);
  }

  releaseScope(scope: CorrelationScope): void {
    if (this.releasedScopes.has(scope)) {
      throw new CorrelationError(
        'SCOPE_ALREADY_RELEASED',
        `Correlation scope ${scope.token} was already released.`
      );
    }

    if (scope.binding === 'entered' && this.activeScope() !== scope) {
      throw new CorrelationError(
        'SCOPE_NOT_ACTIVE',
        `Correlation scope ${scope.token} is not the active scope of the calling context.`
      );
    }

    this.releasedScopes.add(scope);

    const frame = this.storage.getStore();
    if (scope.binding === 'entered' && frame?.scope === scope) {
      this.storage.enterWith(frame.parent);
    }
  }
}

export const correlationContext = new CorrelationContext();
