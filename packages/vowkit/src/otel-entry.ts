/**
 * vowkit/otel
 *
 * OpenTelemetry integration: spans for vows and combinators.
 *
 * @example
 * ```typescript
 * import { createOtelEventHandler } from "vowkit/otel";
 * import { createVowRuntime } from "vowkit";
 * import { trace } from "@opentelemetry/api";
 *
 * const tracing = createOtelEventHandler({ tracer: trace.getTracer("my-service") });
 * const runtime = createVowRuntime({ onEvent: tracing.handleEvent });
 * ```
 */

export {
  // Types
  type OtelEventHandlerConfig,
  type OtelEventHandler,
  type OtelSpanLike,
  type OtelTracerLike,

  // Functions
  createOtelEventHandler,
} from "./otel";
