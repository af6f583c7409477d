/**
 * Dispatch Table
 *
 * Exact-match map from route key to composed handler.
 */

import type { ComposedHandler, Context } from '../http/types.ts';

export const ROUTE_KEY_SEPARATOR = '+';

/**
 * Build a route key. Plain concatenation: no decoding, no trailing-slash
 * folding, no case folding.
 */
export function routeKey(method: string, prefix: string, path: string): string {
  return method + ROUTE_KEY_SEPARATOR + prefix + path;
}

export class DispatchTable<C extends Context = Context> {
  private handlers = new Map<string, ComposedHandler<C>>();

  /**
   * Insert a handler unless the key is taken. The first registration for a
   * key is kept; later ones are ignored and reported by a `false` return.
   */
  register(key: string, handler: ComposedHandler<C>): boolean {
    if (this.handlers.has(key)) {
      return false;
    }
    this.handlers.set(key, handler);
    return true;
  }

  lookup(key: string): ComposedHandler<C> | undefined {
    return this.handlers.get(key);
  }

  has(key: string): boolean {
    return this.handlers.has(key);
  }

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Registered keys in insertion order
   */
  keys(): string[] {
    return [...this.handlers.keys()];
  }
}
