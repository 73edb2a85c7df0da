/**
 * vowkit/testing
 *
 * Deterministic vow testing: run scheduled work step by step, record events,
 * and assert outcomes.
 *
 * @example
 * ```typescript
 * import { createTestRuntime, unwrapFulfilled } from "vowkit/testing";
 *
 * const { runtime, scheduler, recorder } = createTestRuntime();
 * const doubled = runtime.resolve(21).then((n) => n * 2);
 *
 * scheduler.flush();
 * expect(doubled.outcome).toEqual({ ok: true, value: 42 });
 * ```
 */

export {
  // Types
  type ManualScheduler,
  type EventRecorder,
  type TestRuntime,
  type AssertionResult,
  type EventAssertionOptions,

  // Harness
  createManualScheduler,
  createEventRecorder,
  createTestClock,
  createSequentialIds,
  createTestRuntime,

  // Assertions
  assertEventSequence,
  expectFulfilled,
  expectRejected,
  unwrapFulfilled,
  unwrapRejected,

  // Debug helpers
  formatOutcome,
  formatValue,
  formatEvent,
  formatEvents,
} from "./testing";
