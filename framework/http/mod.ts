/**
 * HTTP Layer
 *
 * Context type, the in-memory HttpContext, and the node:http adapter.
 */

export {
  Server,
  createContext,
  writeResponse,
  toRouterMethod,
  requestPath,
  type ServerOptions,
  type RequestLike,
  type ResponseWriter,
} from './server.ts';
export { HttpContext, type HttpContextInit } from './context.ts';
export { UNHANDLED_STATUS, HTTP_METHODS } from './types.ts';
export type {
  Context,
  Middleware,
  Next,
  TerminalHandler,
  ComposedHandler,
  HttpMethod,
} from './types.ts';
