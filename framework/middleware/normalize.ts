/**
 * Handler Normalization
 *
 * Routes and pipelines accept handlers in several shapes. Everything is
 * reduced here to the canonical `(ctx, next) => void` middleware before it
 * reaches the chain composer.
 *
 * Accepted shapes:
 * - a function taking `(ctx, next)`: used as-is
 * - a function taking `(ctx)`: runs, then the chain always continues
 * - `bound(instance, member)`: a method run on a given instance
 * - `unbound(Type, member)`: a method run on a fresh `new Type()` per call
 *
 * Plain functions are told apart by `fn.length`. A rest parameter or a
 * default on `next` (`(ctx, next = noop) => ...`) lowers the length below
 * two, so such a function is treated as terminal and the chain continues
 * even when it never calls `next`. Wrap it in `withNext` to keep the
 * continuation shape.
 *
 * @example
 * ```ts
 * class AuthGuard {
 *   constructor(private token: string) {}
 *   check(ctx: HttpContext, next: Next): void {
 *     if (ctx.header('authorization') === this.token) next();
 *     else ctx.status(401);
 *   }
 * }
 *
 * router.get('/admin', bound(new AuthGuard('t'), AuthGuard.prototype.check), showAdmin);
 * ```
 */

import type { Context, Middleware, Next, TerminalHandler } from '../http/types.ts';

export type HandlerShape = 'continuation' | 'terminal';

/**
 * A method as taken from a class prototype, in either shape
 */
export type MemberFunction<T, C extends Context = Context> =
  | ((this: T, ctx: C, next: Next) => void)
  | ((this: T, ctx: C) => void);

export interface ContinuationHandler<C extends Context = Context> {
  kind: 'continuation';
  fn: Middleware<C>;
}

export interface TerminalFunctionHandler<C extends Context = Context> {
  kind: 'terminal';
  fn: TerminalHandler<C>;
}

export interface BoundHandler<C extends Context = Context> {
  kind: 'bound';
  shape: HandlerShape;
  /** Null when the instance was null: the member is skipped */
  run: Middleware<C> | null;
}

/**
 * Member run on a fresh default instance per call. State kept on the
 * instance never survives between requests, so only stateless handler
 * types belong here.
 */
export interface UnboundHandler<C extends Context = Context> {
  kind: 'unbound';
  shape: HandlerShape;
  run: Middleware<C>;
}

export type TaggedHandler<C extends Context = Context> =
  | ContinuationHandler<C>
  | TerminalFunctionHandler<C>
  | BoundHandler<C>
  | UnboundHandler<C>;

/**
 * Anything a route or pipeline accepts as a handler
 */
export type HandlerSpec<C extends Context = Context> =
  | Middleware<C>
  | TerminalHandler<C>
  | TaggedHandler<C>;

function isTerminalFunction<C extends Context>(
  fn: Middleware<C> | TerminalHandler<C>
): fn is TerminalHandler<C> {
  return fn.length < 2;
}

function isTerminalMember<T, C extends Context>(
  member: MemberFunction<T, C>
): member is (this: T, ctx: C) => void {
  return member.length < 2;
}

function shapeOf<T, C extends Context>(member: MemberFunction<T, C>): HandlerShape {
  return isTerminalMember(member) ? 'terminal' : 'continuation';
}

function invokeMember<T, C extends Context>(
  target: T,
  member: MemberFunction<T, C>,
  ctx: C,
  next: Next
): void {
  if (isTerminalMember(member)) {
    member.call(target, ctx);
  } else {
    member.call(target, ctx, next);
  }
}

/**
 * Mark a function as continuation-shaped regardless of its declared arity
 */
export function withNext<C extends Context = Context>(fn: Middleware<C>): ContinuationHandler<C> {
  return { kind: 'continuation', fn };
}

/**
 * Mark a function as terminal regardless of its declared arity
 */
export function terminal<C extends Context = Context>(fn: TerminalHandler<C>): TerminalFunctionHandler<C> {
  return { kind: 'terminal', fn };
}

/**
 * Run `member` on `instance`. A null instance skips the member; for a
 * continuation-shaped member that also halts the chain.
 */
export function bound<T extends object, C extends Context = Context>(
  instance: T | null | undefined,
  member: MemberFunction<T, C>
): BoundHandler<C> {
  const target = instance ?? null;
  return {
    kind: 'bound',
    shape: shapeOf(member),
    run: target === null ? null : (ctx, next) => invokeMember(target, member, ctx, next),
  };
}

/**
 * Run `member` on `new Type()`, constructed again for every call
 */
export function unbound<T extends object, C extends Context = Context>(
  Type: new () => T,
  member: MemberFunction<T, C>
): UnboundHandler<C> {
  return {
    kind: 'unbound',
    shape: shapeOf(member),
    run: (ctx, next) => invokeMember(new Type(), member, ctx, next),
  };
}

/**
 * Reduce one handler to the canonical middleware shape
 */
export function normalize<C extends Context>(spec: HandlerSpec<C>): Middleware<C> {
  if (typeof spec === 'function') {
    if (isTerminalFunction(spec)) {
      const fn = spec;
      return (ctx, next) => {
        fn(ctx);
        next();
      };
    }
    return spec;
  }

  if (typeof spec !== 'object' || spec === null) {
    throw new TypeError(`Unsupported handler: ${describe(spec)}`);
  }

  switch (spec.kind) {
    case 'continuation':
      return spec.fn;
    case 'terminal': {
      const fn = spec.fn;
      return (ctx, next) => {
        fn(ctx);
        next();
      };
    }
    case 'bound': {
      const run = spec.run;
      if (spec.shape === 'continuation') {
        return (ctx, next) => {
          if (run) run(ctx, next);
        };
      }
      return (ctx, next) => {
        if (run) run(ctx, next);
        next();
      };
    }
    case 'unbound': {
      const run = spec.run;
      if (spec.shape === 'continuation') {
        return run;
      }
      return (ctx, next) => {
        run(ctx, next);
        next();
      };
    }
    default:
      throw new TypeError(`Unsupported handler: ${describe(spec)}`);
  }
}

/**
 * Normalize each handler independently, keeping order
 */
export function normalizeAll<C extends Context>(specs: readonly HandlerSpec<C>[]): Middleware<C>[] {
  return specs.map((spec) => normalize(spec));
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') {
    const kind = 'kind' in value ? String(value.kind) : undefined;
    return kind ? `object of kind "${kind}"` : 'object';
  }
  return typeof value;
}
