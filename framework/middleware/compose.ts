/**
 * Chain Composition
 *
 * Folds an ordered list of middleware into one handler. Control moves
 * forward only when a middleware calls `next()`; everything runs
 * synchronously on the caller's stack.
 */

import type { ComposedHandler, Context, Middleware, Next } from '../http/types.ts';

const noop: Next = () => {};

/**
 * Position within one run of a chain.
 *
 * `advance` is the continuation handed to every middleware. The index is
 * restored once the step it started returns, so calling `next()` a second
 * time runs the remainder of the chain again from the same place.
 */
export class ChainCursor<C extends Context = Context> {
  private index = 0;

  constructor(
    private readonly handlers: readonly Middleware<C>[],
    private readonly ctx: C
  ) {}

  /**
   * Current position in the chain
   */
  get position(): number {
    return this.index;
  }

  /**
   * Run the first middleware
   */
  start(): void {
    this.index = 0;
    this.handlers[0](this.ctx, this.advance);
  }

  /**
   * Continuation: run the middleware after the current one
   */
  readonly advance: Next = () => {
    const from = this.index;
    this.index = from + 1;
    try {
      if (this.index === this.handlers.length) {
        return;
      }
      this.handlers[this.index](this.ctx, this.advance);
    } finally {
      this.index = from;
    }
  };
}

/**
 * Compose middleware into a single handler
 */
export function compose<C extends Context>(handlers: readonly Middleware<C>[]): ComposedHandler<C> {
  const chain = [...handlers];

  if (chain.length === 0) {
    return () => {};
  }

  if (chain.length === 1) {
    const only = chain[0];
    return (ctx) => only(ctx, noop);
  }

  return (ctx) => new ChainCursor(chain, ctx).start();
}
