/**
 * Router
 *
 * Exact-match router. Each `(method, prefix + path)` pair maps to one
 * composed middleware chain; `routes()` turns the router into a single
 * stage that can sit in a pipeline or inside another router.
 *
 * Routes are meant to be registered up front and then served. Nothing
 * guards against registering while requests are dispatched.
 */

import {
  HTTP_METHODS,
  UNHANDLED_STATUS,
  type ComposedHandler,
  type Context,
  type HttpMethod,
} from '../http/types.ts';
import { compose } from '../middleware/compose.ts';
import { normalizeAll, type HandlerSpec } from '../middleware/normalize.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { setRouteAttribute } from '../telemetry/otel.ts';
import { DispatchTable, routeKey } from './table.ts';

export const DEFAULT_REDIRECT_STATUS = 301;

export interface RouterOptions {
  prefix?: string;
  logger?: Logger;
}

/**
 * URL Router
 */
export class Router<C extends Context = Context> {
  private basePrefix: string;
  private readonly table = new DispatchTable<C>();
  private readonly logger: Logger;

  constructor(prefixOrOptions: string | RouterOptions = {}) {
    const options = typeof prefixOrOptions === 'string' ? { prefix: prefixOrOptions } : prefixOrOptions;
    this.basePrefix = options.prefix ?? '';
    this.logger = (options.logger ?? getLogger()).child({ component: 'router' });
  }

  /**
   * Replace the prefix. Routes registered earlier keep the prefix they
   * were registered under, while lookups only accept request paths under
   * the current one.
   */
  prefix(prefix: string): this {
    this.basePrefix = prefix;
    return this;
  }

  getPrefix(): string {
    return this.basePrefix;
  }

  get(path: string, handler: HandlerSpec<C>, ...handlers: HandlerSpec<C>[]): this {
    return this.register('GET', path, [handler, ...handlers]);
  }

  post(path: string, handler: HandlerSpec<C>, ...handlers: HandlerSpec<C>[]): this {
    return this.register('POST', path, [handler, ...handlers]);
  }

  put(path: string, handler: HandlerSpec<C>, ...handlers: HandlerSpec<C>[]): this {
    return this.register('PUT', path, [handler, ...handlers]);
  }

  head(path: string, handler: HandlerSpec<C>, ...handlers: HandlerSpec<C>[]): this {
    return this.register('HEAD', path, [handler, ...handlers]);
  }

  del(path: string, handler: HandlerSpec<C>, ...handlers: HandlerSpec<C>[]): this {
    return this.register('DEL', path, [handler, ...handlers]);
  }

  /**
   * Register one chain under every verb. The chain is composed once and
   * the same handler is stored for each verb.
   */
  all(path: string, handler: HandlerSpec<C>, ...handlers: HandlerSpec<C>[]): this {
    const composed = compose(normalizeAll([handler, ...handlers]));
    for (const method of HTTP_METHODS) {
      this.add(method, path, composed);
    }
    return this;
  }

  /**
   * Answer every verb on `path` with a redirect to `destination`
   */
  redirect(path: string, destination: string, status: number = DEFAULT_REDIRECT_STATUS): this {
    return this.all(path, (ctx: C) => {
      ctx.redirect(destination);
      ctx.status(status);
    });
  }

  /**
   * Keys of every registered route, in registration order
   */
  getRoutes(): string[] {
    return this.table.keys();
  }

  /**
   * Dispatcher for this router. It does nothing for a context some earlier
   * stage already handled, and nothing on a miss.
   */
  routes(): ComposedHandler<C> {
    return (ctx) => {
      if (ctx.status() !== UNHANDLED_STATUS) {
        return;
      }

      // The request path is the full path; only paths under the current
      // prefix can match.
      const path = ctx.path();
      if (!path.startsWith(this.basePrefix)) {
        this.logger.debug('Route miss', { path, prefix: this.basePrefix });
        return;
      }

      const key = routeKey(ctx.method(), this.basePrefix, path.slice(this.basePrefix.length));
      const handler = this.table.lookup(key);

      if (!handler) {
        this.logger.debug('Route miss', { key });
        return;
      }

      this.logger.debug('Route match', { key });
      setRouteAttribute(path, ctx.method());
      handler(ctx);
    };
  }

  private register(method: HttpMethod, path: string, handlers: HandlerSpec<C>[]): this {
    this.add(method, path, compose(normalizeAll(handlers)));
    return this;
  }

  private add(method: HttpMethod, path: string, handler: ComposedHandler<C>): void {
    const key = routeKey(method, this.basePrefix, path);
    if (this.table.register(key, handler)) {
      this.logger.debug('Route registered', { key });
    } else {
      // First registration wins; the duplicate is dropped.
      this.logger.debug('Duplicate route ignored', { key });
    }
  }
}
