/**
 * HTTP Server
 *
 * Adapts `node:http` to the framework: one HttpContext per request, run
 * through the middleware pipeline, then written back to the socket.
 */

import { createServer, STATUS_CODES, type IncomingHttpHeaders, type Server as NodeServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { randomUUID } from 'node:crypto';
import { HttpContext } from './context.ts';
import { MiddlewarePipeline } from '../middleware/pipeline.ts';
import type { HandlerSpec } from '../middleware/normalize.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { recordSpanException, withServerSpan } from '../telemetry/otel.ts';

export interface ServerOptions {
  port?: number;
  host?: string;
  logger?: Logger;
}

/**
 * The parts of an incoming request the server reads
 */
export interface RequestLike {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/**
 * The parts of a server response the server writes
 */
export interface ResponseWriter {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
}

/**
 * Router verb for a wire method. Routers register DELETE as `DEL`.
 */
export function toRouterMethod(method: string): string {
  const upper = method.toUpperCase();
  return upper === 'DELETE' ? 'DEL' : upper;
}

/**
 * Path portion of a request target, kept exactly as sent
 */
export function requestPath(url: string): string {
  const end = url.search(/[?#]/);
  const path = end === -1 ? url : url.slice(0, end);
  return path === '' ? '/' : path;
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

/**
 * Build a context from a Node request
 */
export function createContext(req: RequestLike): HttpContext {
  return new HttpContext({
    method: toRouterMethod(req.method ?? 'GET'),
    path: requestPath(req.url ?? '/'),
    headers: flattenHeaders(req.headers),
  });
}

/**
 * Write a finished context to the response. An unhandled context is
 * answered with its status text.
 */
export function writeResponse(ctx: HttpContext, res: ResponseWriter): void {
  const status = ctx.status();
  res.statusCode = status;

  const location = ctx.location();
  if (location !== null) {
    res.setHeader('Location', location);
  }

  for (const [name, value] of ctx.headers()) {
    res.setHeader(name, value);
  }

  let body = ctx.body();
  if (body === '' && !ctx.handled) {
    body = STATUS_CODES[status] ?? '';
  }
  if (ctx.method() === 'HEAD') {
    body = '';
  }

  res.end(body);
}

/**
 * HTTP Server
 */
export class Server {
  private readonly pipeline = new MiddlewarePipeline<HttpContext>();
  private readonly options: Required<Omit<ServerOptions, 'logger'>>;
  private readonly logger: Logger;
  private server?: NodeServer;

  constructor(options: ServerOptions = {}) {
    this.options = {
      port: options.port ?? 8000,
      host: options.host ?? '0.0.0.0',
    };
    this.logger = (options.logger ?? getLogger()).child({ component: 'server' });
  }

  /**
   * Append a pipeline stage
   */
  use(handler: HandlerSpec<HttpContext>): this {
    this.pipeline.use(handler);
    return this;
  }

  /**
   * Request listener: run the pipeline and write the result. Errors thrown
   * by a stage are logged and answered with 500.
   */
  handle(req: RequestLike, res: ResponseWriter): void {
    const ctx = createContext(req);
    const requestLogger = this.logger.child({ requestId: randomUUID(), method: ctx.method(), path: ctx.path() });

    try {
      withServerSpan(
        `${ctx.method()} ${ctx.path()}`,
        { 'http.method': ctx.method(), 'http.target': ctx.path() },
        () => this.pipeline.execute(ctx)
      );
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      requestLogger.error('Request failed', failure);
      recordSpanException(failure);
      res.statusCode = 500;
      res.setHeader('Content-Type', 'text/plain; charset=utf-8');
      res.end('Internal Server Error');
      return;
    }

    writeResponse(ctx, res);
  }

  /**
   * Start listening. Resolves once the socket is bound.
   */
  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => this.handle(req, res));
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP socket'));
          return;
        }
        this.logger.info(`Listening on http://${address.address}:${address.port}`);
        resolve(address);
      });
      this.server = server;
    });
  }

  /**
   * Stop accepting connections
   */
  close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = undefined;
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
