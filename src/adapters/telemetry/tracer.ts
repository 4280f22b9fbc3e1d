/**
 * OpenTelemetry Tracer
 *
 * Spans for queries and statement executions. Without a registered SDK the
 * API hands out no-op spans, so tracing costs nothing until the host
 * application installs one.
 */

import {
  SpanKind,
  SpanStatusCode,
  trace,
  type Attributes,
  type Span,
} from "@opentelemetry/api";

const TRACER_NAME = "dbd-mysql";
const TRACER_VERSION = "0.1.0";

export function getTracer() {
  return trace.getTracer(TRACER_NAME, TRACER_VERSION);
}

/**
 * Execute a function within a client span
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return getTracer().startActiveSpan(
    name,
    { kind: SpanKind.CLIENT, attributes },
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
        if (error instanceof Error) span.recordException(error);
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

/**
 * Attributes describing a statement sent to MySQL
 */
export function statementAttributes(
  statement: string,
  operation: "query" | "execute",
): Attributes {
  return {
    "db.system": "mysql",
    "db.operation": operation,
    "db.statement": statement,
  };
}
