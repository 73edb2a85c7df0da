/**
 * vowkit/scheduler
 *
 * Where vow work runs, and duration parsing for `delay()`.
 *
 * @example
 * ```typescript
 * import { macrotaskScheduler } from "vowkit/scheduler";
 * import { createVowRuntime } from "vowkit";
 *
 * // yield to I/O between vow steps
 * const runtime = createVowRuntime({ scheduler: macrotaskScheduler });
 * ```
 */

export {
  type Scheduler,
  microtaskScheduler,
  macrotaskScheduler,
  inlineScheduler,
} from "./scheduler";

export { type DurationInput, MAX_DURATION_MS, parseDurationString, toMillis } from "./duration";
