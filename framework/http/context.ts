/**
 * HTTP Context
 *
 * In-memory request/response state handed through a dispatch.
 */

import { UNHANDLED_STATUS, type Context } from './types.ts';

export interface HttpContextInit {
  method: string;
  path: string;
  headers?: Record<string, string>;
}

/**
 * Concrete context used by the server and in tests
 */
export class HttpContext implements Context {
  private _method: string;
  private _path: string;
  private _status: number = UNHANDLED_STATUS;
  private _location: string | null = null;
  private _body = '';
  private requestHeaders: Map<string, string>;
  private responseHeaders = new Map<string, string>();

  constructor(init: HttpContextInit) {
    this._method = init.method;
    this._path = init.path;
    this.requestHeaders = new Map(
      Object.entries(init.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value])
    );
  }

  method(): string {
    return this._method;
  }

  path(): string {
    return this._path;
  }

  status(): number;
  status(code: number): void;
  status(code?: number): number | void {
    if (code === undefined) {
      return this._status;
    }
    this._status = code;
  }

  redirect(destination: string): void {
    this._location = destination;
  }

  /**
   * Redirect target set by a handler, or null
   */
  location(): string | null {
    return this._location;
  }

  body(): string;
  body(value: string): void;
  body(value?: string): string | void {
    if (value === undefined) {
      return this._body;
    }
    this._body = value;
  }

  /**
   * Read a request header (case-insensitive)
   */
  header(name: string): string | null {
    return this.requestHeaders.get(name.toLowerCase()) ?? null;
  }

  /**
   * Set a response header
   */
  set(name: string, value: string): void {
    this.responseHeaders.set(name, value);
  }

  /**
   * Response headers in the order they were set
   */
  headers(): Map<string, string> {
    return new Map(this.responseHeaders);
  }

  /**
   * Whether some handler has produced a response
   */
  get handled(): boolean {
    return this._status !== UNHANDLED_STATUS;
  }
}
