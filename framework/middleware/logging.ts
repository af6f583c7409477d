/**
 * Logging Middleware
 *
 * Logs each request on the way in and its status on the way out.
 */

import type { Context, Middleware } from '../http/types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export interface LoggingOptions {
  logRequest?: boolean;
  logResponse?: boolean;
  excludePaths?: string[];
  logger?: Logger;
}

const DEFAULT_OPTIONS = {
  logRequest: true,
  logResponse: true,
  excludePaths: ['/health', '/ready', '/favicon.ico'],
};

/**
 * Create logging middleware
 */
export function loggingMiddleware<C extends Context = Context>(options: LoggingOptions = {}): Middleware<C> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logger = (opts.logger ?? getLogger()).child({ component: 'http' });

  return (ctx, next) => {
    const method = ctx.method();
    const path = ctx.path();

    if (opts.excludePaths.some((excluded) => path.startsWith(excluded))) {
      next();
      return;
    }

    const startTime = performance.now();

    if (opts.logRequest) {
      logger.info(`→ ${method} ${path}`);
    }

    next();

    if (opts.logResponse) {
      const duration = Math.round((performance.now() - startTime) * 100) / 100;
      logger.info(`← ${method} ${path} ${ctx.status()}`, { status: ctx.status(), duration });
    }
  };
}
