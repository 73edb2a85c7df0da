/**
 * vowkit
 *
 * Vows: asynchronous results that settle once, chain with then/catch, and report
 * their outcome as a `Result` instead of throwing.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { vow, all, type Vow } from "vowkit";
 *
 * const loadUser = (id: string): Vow<User, "NOT_FOUND"> =>
 *   vow((resolve, reject) => {
 *     const user = users.get(id);
 *     user ? resolve(user) : reject("NOT_FOUND");
 *   });
 *
 * const result = await all([loadUser("1"), loadUser("2")]).await();
 * if (result.ok) {
 *   const [first, second] = result.value;
 * }
 * ```
 *
 * ## Entry Points
 *
 * - `vowkit` - Vowkit namespace, the default runtime's functions, `createVowRuntime`
 * - `vowkit/core` - Result types and helpers only
 * - `vowkit/scheduler` - Schedulers and duration parsing
 * - `vowkit/otel` - OpenTelemetry span handler
 * - `vowkit/testing` - Manual scheduler, event recorder and assertions
 */

import * as core from "./core";
import { createVowRuntime } from "./runtime";
import { Vow, isThenable, isVow, recovered, isRecovered } from "./vow";

// =============================================================================
// Default runtime
// =============================================================================

/**
 * The runtime behind the root functions: microtask scheduler, `UnexpectedError`
 * for thrown exceptions and foreign rejections, no event handler.
 */
export const defaultRuntime = createVowRuntime();

export const {
  vow,
  resolve,
  reject,
  deferred,
  attempt,
  fromPromise,
  fromResult,
  delay,
  all,
  allSettled,
  race,
  any,
} = defaultRuntime;

// =============================================================================
// Vowkit namespace (single export)
// =============================================================================

const Vowkit = {
  ...core,
  Vow,
  isVow,
  isThenable,
  recovered,
  isRecovered,
  createVowRuntime,
  vow,
  resolve,
  reject,
  deferred,
  attempt,
  fromPromise,
  fromResult,
  delay,
  all,
  allSettled,
  race,
  any,
} as const;

export { Vowkit };

// =============================================================================
// Named value exports
// =============================================================================

export {
  UNEXPECTED_ERROR,
  PROMISE_REJECTED,
  EMPTY_INPUT,
  ok,
  err,
  isOk,
  isErr,
  isUnexpectedError,
  isPromiseRejectedError,
  isEmptyInputError,
  defaultCatchUnexpected,
  toPromiseRejectedError,
  emptyInputError,
  UnwrapError,
  unwrap,
  unwrapOr,
  match,
} from "./core";

export { Vow, RECOVERED, recovered, isRecovered, isVow, isThenable } from "./vow";
export { createVowRuntime, bindRuntime } from "./runtime";
export { createVowContext } from "./context";
export { microtaskScheduler, macrotaskScheduler, inlineScheduler } from "./scheduler";

// =============================================================================
// Type exports
// =============================================================================

export type {
  Ok,
  Err,
  Result,
  AsyncResult,
  UnexpectedError,
  UnexpectedCause,
  PromiseRejectedError,
  EmptyInputError,
  ExtractValue,
  ExtractError,
} from "./core";

export type {
  VowState,
  VowResolve,
  VowReject,
  VowExecutor,
  VowOptions,
  Deferred,
  Recovered,
  ValueOf,
  ErrorOf,
  RecoveredValueOf,
  StillFailingOf,
} from "./vow";

export type { AllValues, AnyError, SettledOutcomes } from "./combinators";
export type { VowRuntime, AttemptOptions } from "./runtime";
export type {
  VowContext,
  VowRuntimeOptions,
  VowRuntimeOptionsWithCatch,
  VowRuntimeOptionsWithoutCatch,
} from "./context";
export type { Scheduler } from "./scheduler";
export type { DurationInput } from "./duration";
export type { VowEvent, VowEventType, VowEventHandler, ScopeType, SettleAttempt } from "./events";
