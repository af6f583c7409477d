/**
 * HTTP Type Definitions
 */

/**
 * Status a context carries until some handler produces a response
 */
export const UNHANDLED_STATUS = 404;

/**
 * Per-request state shared by every handler in a dispatch
 */
export interface Context {
  method(): string;
  path(): string;
  status(): number;
  status(code: number): void;
  redirect(destination: string): void;
}

/**
 * Continuation: runs the remainder of the current chain
 */
export type Next = () => void;

/**
 * Canonical middleware signature
 */
export type Middleware<C extends Context = Context> = (ctx: C, next: Next) => void;

/**
 * Handler that never sees the continuation; the chain always falls through it
 */
export type TerminalHandler<C extends Context = Context> = (ctx: C) => void;

/**
 * Single callable produced by composing a chain
 */
export type ComposedHandler<C extends Context = Context> = (ctx: C) => void;

/**
 * Verbs a router registers under. `DEL` is the router's name for DELETE.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'HEAD' | 'DEL';

export const HTTP_METHODS: readonly HttpMethod[] = ['DEL', 'GET', 'HEAD', 'POST', 'PUT'];
