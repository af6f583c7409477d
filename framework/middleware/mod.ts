/**
 * Middleware Layer
 *
 * Handler normalization, chain composition, and the outer pipeline.
 */

export { compose, ChainCursor } from './compose.ts';
export {
  normalize,
  normalizeAll,
  withNext,
  terminal,
  bound,
  unbound,
  type HandlerSpec,
  type HandlerShape,
  type MemberFunction,
  type TaggedHandler,
  type ContinuationHandler,
  type TerminalFunctionHandler,
  type BoundHandler,
  type UnboundHandler,
} from './normalize.ts';
export { MiddlewarePipeline, conditional, forPath, forMethods } from './pipeline.ts';
export { loggingMiddleware, type LoggingOptions } from './logging.ts';
