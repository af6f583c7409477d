/**
 * Telemetry
 *
 * Structured logging and OpenTelemetry span helpers.
 */

export {
  Logger,
  getLogger,
  setLogger,
  formatPretty,
  isLogLevel,
  LOG_LEVEL_NAMES,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';
export {
  isOTELEnabled,
  setOTELEnabled,
  getOTELConfig,
  getActiveSpan,
  setRouteAttribute,
  recordSpanException,
  getOTELTracer,
  withServerSpan,
  type OTELConfig,
} from './otel.ts';
