/**
 * OpenTelemetry tracing for vows.
 *
 * Turns lifecycle events into spans: one per vow (`vow <label>`) and one per
 * combinator call (`vow.all`, `vow.race`, ...). Plug `handleEvent` into a runtime's
 * `onEvent`.
 */

import { SpanStatusCode, trace, type AttributeValue } from "@opentelemetry/api";
import { isUnexpectedError } from "./core";
import type { VowEvent } from "./events";

/** The part of an OpenTelemetry `Span` the handler uses. */
export interface OtelSpanLike {
  setAttribute(key: string, value: AttributeValue): unknown;
  setStatus(status: { code: SpanStatusCode; message?: string }): unknown;
  addEvent(name: string, attributes?: Record<string, AttributeValue>): unknown;
  recordException(exception: Error): unknown;
  end(endTime?: number): void;
}

/** The part of an OpenTelemetry `Tracer` the handler uses. */
export interface OtelTracerLike {
  startSpan(
    name: string,
    options?: { startTime?: number; attributes?: Record<string, AttributeValue> }
  ): OtelSpanLike;
}

export interface OtelEventHandlerConfig {
  /** Tracer to start spans on (default: `trace.getTracer(serviceName)`) */
  tracer?: OtelTracerLike;
  /** Tracer name when no tracer is given (default: "vowkit") */
  serviceName?: string;
  /** Attributes added to every span */
  attributes?: Record<string, AttributeValue>;
  /** Start a span for every vow, not only for combinators (default: true) */
  traceVows?: boolean;
}

export interface OtelEventHandler {
  handleEvent: (event: VowEvent) => void;
  /** Spans started and not yet ended */
  getActiveSpansCount: () => { vows: number; scopes: number };
}

function describeError(error: unknown): string {
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "type" in error && typeof error.type === "string") {
    return error.type;
  }
  return String(error);
}

/** The Error behind a rejection, if there is one to record. */
function exceptionOf(error: unknown): Error | undefined {
  if (error instanceof Error) return error;
  if (isUnexpectedError(error)) {
    const payload =
      error.cause.type === "UNCAUGHT_EXCEPTION" ? error.cause.thrown : error.cause.reason;
    return payload instanceof Error ? payload : undefined;
  }
  return undefined;
}

/**
 * Create an event handler that records spans.
 *
 * @example
 * ```typescript
 * import { trace } from "@opentelemetry/api";
 *
 * const tracing = createOtelEventHandler({ tracer: trace.getTracer("checkout") });
 * const runtime = createVowRuntime({ onEvent: tracing.handleEvent });
 * ```
 */
export function createOtelEventHandler(config: OtelEventHandlerConfig = {}): OtelEventHandler {
  const {
    tracer = trace.getTracer(config.serviceName ?? "vowkit"),
    attributes = {},
    traceVows = true,
  } = config;

  const vowSpans = new Map<string, OtelSpanLike>();
  const scopeSpans = new Map<string, OtelSpanLike>();

  const endVow = (vowId: string, ts: number, finish: (span: OtelSpanLike) => void) => {
    const span = vowSpans.get(vowId);
    if (!span) return;
    finish(span);
    span.end(ts);
    vowSpans.delete(vowId);
  };

  const handleEvent = (event: VowEvent): void => {
    switch (event.type) {
      case "vow_created": {
        if (!traceVows) return;
        const span = tracer.startSpan(event.label !== undefined ? `vow ${event.label}` : "vow", {
          startTime: event.ts,
          attributes: {
            ...attributes,
            "vow.id": event.vowId,
            ...(event.label !== undefined ? { "vow.label": event.label } : {}),
          },
        });
        vowSpans.set(event.vowId, span);
        return;
      }

      case "vow_adopted": {
        const span = vowSpans.get(event.vowId);
        if (!span) return;
        if (event.sourceId !== undefined) {
          span.setAttribute("vow.adopted_from", event.sourceId);
        } else {
          span.setAttribute("vow.adopted_thenable", true);
        }
        return;
      }

      case "settle_ignored":
        vowSpans.get(event.vowId)?.addEvent("vow.settle_ignored", { "vow.attempted": event.attempted });
        return;

      case "vow_fulfilled":
        endVow(event.vowId, event.ts, (span) => {
          span.setAttribute("vow.duration_ms", event.durationMs);
          span.setStatus({ code: SpanStatusCode.OK });
        });
        return;

      case "vow_rejected":
        endVow(event.vowId, event.ts, (span) => {
          span.setAttribute("vow.duration_ms", event.durationMs);
          span.setAttribute("vow.unexpected", event.unexpected);
          const exception = exceptionOf(event.error);
          if (exception) span.recordException(exception);
          span.setStatus({ code: SpanStatusCode.ERROR, message: describeError(event.error) });
        });
        return;

      case "scope_start": {
        const span = tracer.startSpan(`vow.${event.scopeType}`, {
          startTime: event.ts,
          attributes: {
            ...attributes,
            "vow.scope.id": event.scopeId,
            "vow.scope.size": event.size,
            ...(event.label !== undefined ? { "vow.label": event.label } : {}),
          },
        });
        scopeSpans.set(event.scopeId, span);
        return;
      }

      case "scope_end": {
        const span = scopeSpans.get(event.scopeId);
        if (!span) return;
        span.setAttribute("vow.duration_ms", event.durationMs);
        if (event.winnerIndex !== undefined) {
          span.setAttribute("vow.scope.winner_index", event.winnerIndex);
        }
        span.setStatus({ code: SpanStatusCode.OK });
        span.end(event.ts);
        scopeSpans.delete(event.scopeId);
        return;
      }
    }
  };

  return {
    handleEvent,
    getActiveSpansCount: () => ({ vows: vowSpans.size, scopes: scopeSpans.size }),
  };
}
