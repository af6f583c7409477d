/**
 * Shared test fixtures
 */

import { HttpContext } from '../../framework/http/context.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';

export function createTestContext(method: string, path: string, headers?: Record<string, string>): HttpContext {
  return new HttpContext({ method, path, headers });
}

/**
 * Logger that keeps entries in memory instead of printing them
 */
export function createMemoryLogger(level: LogEntry['level'] = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, output: (entry) => entries.push(entry) });
  return { logger, entries };
}

export const silentLogger = new Logger({ output: () => {} });
