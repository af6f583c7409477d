/**
 * Switchyard
 *
 * Exact-match HTTP routing with synchronous, continuation-driven
 * middleware chains, on node:http.
 *
 * @module switchyard
 */

// HTTP
export {
  Server,
  HttpContext,
  createContext,
  writeResponse,
  toRouterMethod,
  requestPath,
  UNHANDLED_STATUS,
  HTTP_METHODS,
  type Context,
  type Middleware,
  type Next,
  type TerminalHandler,
  type ComposedHandler,
  type HttpMethod,
  type HttpContextInit,
  type ServerOptions,
  type RequestLike,
  type ResponseWriter,
} from './http/mod.ts';

// Middleware
export {
  compose,
  ChainCursor,
  normalize,
  normalizeAll,
  withNext,
  terminal,
  bound,
  unbound,
  MiddlewarePipeline,
  conditional,
  forPath,
  forMethods,
  loggingMiddleware,
  type HandlerSpec,
  type HandlerShape,
  type MemberFunction,
  type TaggedHandler,
  type LoggingOptions,
} from './middleware/mod.ts';

// Router
export {
  Router,
  DispatchTable,
  routeKey,
  ROUTE_KEY_SEPARATOR,
  DEFAULT_REDIRECT_STATUS,
  type RouterOptions,
} from './router/mod.ts';

// Configuration
export { Config, ConfigError, loadConfig, type ConfigOptions } from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  isLogLevel,
  setOTELEnabled,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
} from './telemetry/mod.ts';
