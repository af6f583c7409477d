/**
 * OpenTelemetry Integration
 *
 * Thin helpers over `@opentelemetry/api`. Without a registered SDK the API
 * hands out no-op tracers, so every helper here is safe to call
 * unconditionally.
 *
 * @module
 */

import {
  trace,
  SpanKind,
  SpanStatusCode,
  type Attributes,
  type Span,
  type Tracer,
} from '@opentelemetry/api';

export interface OTELConfig {
  enabled: boolean;
  serviceName: string;
}

let enabledOverride: boolean | undefined;

/**
 * Check whether span annotation is enabled. An explicit `setOTELEnabled`
 * wins over the OTEL_ENABLED environment variable.
 */
export function isOTELEnabled(): boolean {
  return enabledOverride ?? process.env.OTEL_ENABLED === 'true';
}

export function setOTELEnabled(enabled: boolean | undefined): void {
  enabledOverride = enabled;
}

export function getOTELConfig(): OTELConfig {
  return {
    enabled: isOTELEnabled(),
    serviceName: process.env.OTEL_SERVICE_NAME ?? 'switchyard',
  };
}

/**
 * Currently active span, or undefined when disabled or outside a span
 */
export function getActiveSpan(): Span | undefined {
  if (!isOTELEnabled()) return undefined;
  return trace.getActiveSpan();
}

/**
 * Record the matched route on the active span and rename it after the route
 */
export function setRouteAttribute(route: string, method: string): void {
  const span = getActiveSpan();
  if (span) {
    span.setAttribute('http.route', route);
    span.updateName(`${method} ${route}`);
  }
}

/**
 * Record an exception on the active span and mark it failed
 */
export function recordSpanException(error: Error): void {
  const span = getActiveSpan();
  if (span) {
    span.recordException(error);
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  }
}

let tracer: Tracer | undefined;

export function getOTELTracer(): Tracer {
  if (!tracer) {
    tracer = trace.getTracer(getOTELConfig().serviceName);
  }
  return tracer;
}

/**
 * Run a synchronous function inside a new active server span. When
 * disabled the function runs directly.
 */
export function withServerSpan<T>(name: string, attributes: Attributes, fn: () => T): T {
  if (!isOTELEnabled()) {
    return fn();
  }

  return getOTELTracer().startActiveSpan(
    name,
    { kind: SpanKind.SERVER, attributes },
    (span) => {
      try {
        return fn();
      } catch (error) {
        if (error instanceof Error) {
          span.recordException(error);
        }
        span.setStatus({ code: SpanStatusCode.ERROR });
        throw error;
      } finally {
        span.end();
      }
    }
  );
}
