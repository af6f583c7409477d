/**
 * Middleware Pipeline
 *
 * Ordered stages run for every request. A router is mounted by adding its
 * `routes()` dispatcher as a stage; as a terminal handler it always lets
 * the pipeline continue, and later stages can check whether it answered.
 */

import type { ComposedHandler, Context, Middleware } from '../http/types.ts';
import { compose } from './compose.ts';
import { normalize, type HandlerSpec } from './normalize.ts';

/**
 * Middleware pipeline for request processing
 */
export class MiddlewarePipeline<C extends Context = Context> {
  private stages: Middleware<C>[] = [];
  private composed: ComposedHandler<C> | null = null;

  /**
   * Add a stage to the end of the pipeline
   */
  use(handler: HandlerSpec<C>): this {
    this.stages.push(normalize(handler));
    this.composed = null;
    return this;
  }

  /**
   * Add a stage at a specific position
   */
  useAt(index: number, handler: HandlerSpec<C>): this {
    this.stages.splice(index, 0, normalize(handler));
    this.composed = null;
    return this;
  }

  clear(): this {
    this.stages = [];
    this.composed = null;
    return this;
  }

  get length(): number {
    return this.stages.length;
  }

  /**
   * Run every stage against `ctx`
   */
  execute(ctx: C): void {
    this.compose()(ctx);
  }

  /**
   * The pipeline as one handler. Cached until the stages change.
   */
  compose(): ComposedHandler<C> {
    if (!this.composed) {
      this.composed = compose(this.stages);
    }
    return this.composed;
  }
}

/**
 * Create a middleware that runs conditionally
 */
export function conditional<C extends Context>(
  condition: (ctx: C) => boolean,
  middleware: Middleware<C>
): Middleware<C> {
  return (ctx, next) => {
    if (condition(ctx)) {
      middleware(ctx, next);
    } else {
      next();
    }
  };
}

/**
 * Create a middleware that runs for paths under a prefix
 */
export function forPath<C extends Context>(pathPrefix: string, middleware: Middleware<C>): Middleware<C> {
  return conditional((ctx) => ctx.path().startsWith(pathPrefix), middleware);
}

/**
 * Create a middleware that runs for specific methods
 */
export function forMethods<C extends Context>(methods: string[], middleware: Middleware<C>): Middleware<C> {
  const methodSet = new Set(methods.map((m) => m.toUpperCase()));
  return conditional((ctx) => methodSet.has(ctx.method()), middleware);
}
