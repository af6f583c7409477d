/**
 * Application Routes
 */

import { Router, type HttpContext, type Logger } from '../../framework/mod.ts';
import { apiRoutes } from './api.ts';

export interface RouteOptions {
  apiToken: string;
  prefix?: string;
  redirectStatus?: number;
  logger?: Logger;
}

/**
 * Build the application routers, in the order they should run as
 * pipeline stages
 */
export function registerRoutes(options: RouteOptions): Router<HttpContext>[] {
  const site = new Router<HttpContext>({ prefix: options.prefix, logger: options.logger })
    .get('/', (ctx: HttpContext) => {
      ctx.status(200);
      ctx.body('switchyard');
    })
    .head('/health', (ctx: HttpContext) => ctx.status(204))
    .get('/health', (ctx: HttpContext) => {
      ctx.status(200);
      ctx.body('ok');
    })
    .redirect('/home', '/', options.redirectStatus);

  return [site, apiRoutes(options.apiToken, options.logger)];
}
