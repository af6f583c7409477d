/**
 * API Routes
 *
 * Routes under /api, registered on a router of their own.
 */

import { Router, bound, type HttpContext, type Logger, type Next } from '../../framework/mod.ts';

/**
 * Rejects requests whose bearer token does not match
 */
export class TokenGuard {
  constructor(private readonly token: string) {}

  check(ctx: HttpContext, next: Next): void {
    if (ctx.header('authorization') === `Bearer ${this.token}`) {
      next();
      return;
    }
    ctx.status(401);
    ctx.body('Unauthorized');
  }
}

function json(ctx: HttpContext, status: number, payload: unknown): void {
  ctx.status(status);
  ctx.set('Content-Type', 'application/json');
  ctx.body(JSON.stringify(payload));
}

export function apiRoutes(token: string, logger?: Logger): Router<HttpContext> {
  const guard = new TokenGuard(token);

  return new Router<HttpContext>({ prefix: '/api', logger })
    .get('/status', (ctx: HttpContext) => json(ctx, 200, { ok: true }))
    .get('/me', bound(guard, TokenGuard.prototype.check), (ctx: HttpContext) => {
      json(ctx, 200, { user: 'admin' });
    })
    .post('/echo', (ctx: HttpContext) => {
      json(ctx, 200, { method: ctx.method(), path: ctx.path() });
    });
}
