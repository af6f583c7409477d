/**
 * Application Entry Point
 */

import {
  Logger,
  Server,
  isLogLevel,
  loadConfig,
  loggingMiddleware,
  setOTELEnabled,
} from './framework/mod.ts';
import { registerRoutes } from './src/routes/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Logging and telemetry
  const level = config.getString('logLevel', 'info');
  const logger = new Logger({
    level: isLogLevel(level) ? level : 'info',
    format: config.getString('logFormat', 'pretty') === 'json' ? 'json' : 'pretty',
  });
  setOTELEnabled(config.getBoolean('otel.enabled', false));

  // 3. Server and global middleware
  const server = new Server({
    port: config.getNumber('port', 8000),
    host: config.getString('host', '0.0.0.0'),
    logger,
  });
  server.use(loggingMiddleware({ logger }));

  // 4. Routes
  const routers = registerRoutes({
    apiToken: process.env.API_TOKEN ?? 'change-me',
    prefix: config.getString('router.prefix', ''),
    redirectStatus: config.getNumber('router.redirectStatus', 301),
    logger,
  });
  for (const router of routers) {
    server.use(router.routes());
  }

  // 5. Start server
  await server.listen();
}

main().catch((error: unknown) => {
  console.error('Failed to start:', error);
  process.exit(1);
});
