/**
 * Runtimes bind a context (scheduler, unexpected-error mapper, clock, event handler)
 * to the vow constructors and combinators.
 *
 * The package root exports the functions of a default runtime. Create your own when
 * you need a different scheduler, a custom error mapper or lifecycle events.
 *
 * @example
 * ```typescript
 * const runtime = createVowRuntime({
 *   catchUnexpected: (cause) => ({ type: "DEFECT" as const, cause }),
 *   onEvent: (event) => logger.debug(event),
 * });
 *
 * const order = runtime.vow<Order, "OUT_OF_STOCK">((resolve, reject) => { ... });
 * // Vow<Order, "OUT_OF_STOCK", { type: "DEFECT"; cause: UnexpectedCause }>
 * ```
 */

import { err, type EmptyInputError, type Result, type UnexpectedError } from "./core";
import {
  createVowContext,
  type VowContext,
  type VowRuntimeOptions,
  type VowRuntimeOptionsWithCatch,
  type VowRuntimeOptionsWithoutCatch,
} from "./context";
import * as combinators from "./combinators";
import type { AllValues, AnyError, SettledOutcomes } from "./combinators";
import { toMillis, type DurationInput } from "./duration";
import {
  Vow,
  type Deferred,
  type ErrorOf,
  type ValueOf,
  type VowExecutor,
  type VowOptions,
} from "./vow";

export type AttemptOptions<E> = VowOptions & {
  /** Maps a throw (or a rejection of a returned thenable) into the typed error channel */
  onError: (cause: unknown) => E;
};

export interface VowRuntime<U = UnexpectedError> {
  readonly context: VowContext<U>;

  /** Create a vow; the executor runs on the scheduler, never inside this call. */
  vow<T, E = unknown>(executor: VowExecutor<T, E, U>, options?: VowOptions): Vow<T, E, U>;

  /** A vow for `value`. Plain values fulfill immediately; vows and thenables are adopted. */
  resolve<V>(value: V, options?: VowOptions): Vow<ValueOf<V>, ErrorOf<V>, U>;

  /** A vow already rejected with `error`. */
  reject<E>(error: E, options?: VowOptions): Vow<never, E, U>;

  /** A pending vow plus the functions that settle it. */
  deferred<T, E = unknown>(options?: VowOptions): Deferred<T, E, U>;

  /** Run `fn` on the scheduler; throws become unexpected errors. */
  attempt<R>(fn: () => R, options?: VowOptions): Vow<ValueOf<R>, ErrorOf<R>, U>;
  /** Run `fn` on the scheduler; throws are mapped by `onError`. */
  attempt<R, E>(fn: () => R, options: AttemptOptions<E>): Vow<ValueOf<R>, ErrorOf<R> | E, U>;

  /** Adopt a native promise; its rejection becomes an unexpected error. */
  fromPromise<T>(promise: PromiseLike<T>, options?: VowOptions): Vow<T, never, U>;
  /** Adopt a native promise; its rejection is mapped by `onError`. */
  fromPromise<T, E>(
    promise: PromiseLike<T>,
    onError: (reason: unknown) => E,
    options?: VowOptions
  ): Vow<T, E, U>;

  /** A vow already settled with a Result's value or error. */
  fromResult<T, E>(result: Result<T, E>, options?: VowOptions): Vow<T, E, U>;

  /** Fulfills after `duration` (milliseconds or "100ms", "5s", ...). */
  delay(duration: DurationInput): Vow<undefined, never, U>;
  delay<T>(duration: DurationInput, value: T, options?: VowOptions): Vow<T, never, U>;

  all<const T extends readonly unknown[]>(
    inputs: T,
    options?: VowOptions
  ): Vow<AllValues<T>, AnyError<T>, U>;
  allSettled<const T extends readonly unknown[]>(
    inputs: T,
    options?: VowOptions
  ): Vow<SettledOutcomes<T, U>, never, U>;
  race<const T extends readonly unknown[]>(
    inputs: T,
    options?: VowOptions
  ): Vow<ValueOf<T[number]>, AnyError<T> | EmptyInputError, U>;
  any<const T extends readonly unknown[]>(
    inputs: T,
    options?: VowOptions
  ): Vow<ValueOf<T[number]>, AnyError<T> | EmptyInputError, U>;
}

/**
 * Create a runtime.
 *
 * Without `catchUnexpected`, thrown exceptions and foreign rejections become
 * `UnexpectedError`; with it, they become whatever it returns.
 */
export function createVowRuntime(options?: VowRuntimeOptionsWithoutCatch): VowRuntime<UnexpectedError>;
export function createVowRuntime<U>(options: VowRuntimeOptionsWithCatch<U>): VowRuntime<U>;
export function createVowRuntime<U>(options: VowRuntimeOptions<U> = {}): VowRuntime<U | UnexpectedError> {
  const context: VowContext<U | UnexpectedError> =
    options.catchUnexpected !== undefined
      ? createVowContext<U>({ ...options, catchUnexpected: options.catchUnexpected })
      : createVowContext({ ...options, catchUnexpected: undefined });
  return bindRuntime(context);
}

/** Bind every constructor and combinator to an existing context. */
export function bindRuntime<U>(context: VowContext<U>): VowRuntime<U> {
  function attempt<R>(fn: () => R, options?: VowOptions): Vow<ValueOf<R>, ErrorOf<R>, U>;
  function attempt<R, E>(fn: () => R, options: AttemptOptions<E>): Vow<ValueOf<R>, ErrorOf<R> | E, U>;
  function attempt<R, E>(
    fn: () => R,
    options: VowOptions & { onError?: (cause: unknown) => E } = {}
  ): Vow<ValueOf<R>, ErrorOf<R> | E, U> {
    const { onError, ...vowOptions } = options;
    return Vow.attempt<ValueOf<R>, ErrorOf<R> | E, U>(fn, context, vowOptions, onError);
  }

  function fromPromise<T>(promise: PromiseLike<T>, options?: VowOptions): Vow<T, never, U>;
  function fromPromise<T, E>(
    promise: PromiseLike<T>,
    onError: (reason: unknown) => E,
    options?: VowOptions
  ): Vow<T, E, U>;
  function fromPromise<T, E>(
    promise: PromiseLike<T>,
    onErrorOrOptions?: ((reason: unknown) => E) | VowOptions,
    options?: VowOptions
  ): Vow<T, E, U> | Vow<T, never, U> {
    if (typeof onErrorOrOptions === "function") {
      return Vow.follow<T, E, U>(promise, context, options, onErrorOrOptions);
    }
    return Vow.follow<T, E, U>(promise, context, onErrorOrOptions);
  }

  function delay(duration: DurationInput): Vow<undefined, never, U>;
  function delay<T>(duration: DurationInput, value: T, options?: VowOptions): Vow<T, never, U>;
  function delay<T>(
    duration: DurationInput,
    value?: T,
    options?: VowOptions
  ): Vow<T | undefined, never, U> {
    const millis = toMillis(duration);
    return Vow.create<T | undefined, never, U>(
      (resolve) => {
        setTimeout(() => resolve(value), millis);
      },
      context,
      options
    );
  }

  return {
    context,
    vow: <T, E = unknown>(executor: VowExecutor<T, E, U>, options?: VowOptions) =>
      Vow.create<T, E, U>(executor, context, options),
    resolve: <V>(value: V, options?: VowOptions) =>
      Vow.follow<ValueOf<V>, ErrorOf<V>, U>(value, context, options),
    reject: <E>(error: E, options?: VowOptions) =>
      Vow.settled<never, E, U>(err(error), context, options),
    deferred: <T, E = unknown>(options?: VowOptions) => Vow.deferred<T, E, U>(context, options),
    attempt,
    fromPromise,
    fromResult: <T, E>(result: Result<T, E>, options?: VowOptions) =>
      Vow.settled<T, E, U>(result, context, options),
    delay,
    all: <const T extends readonly unknown[]>(inputs: T, options?: VowOptions) =>
      combinators.all(inputs, context, options),
    allSettled: <const T extends readonly unknown[]>(inputs: T, options?: VowOptions) =>
      combinators.allSettled(inputs, context, options),
    race: <const T extends readonly unknown[]>(inputs: T, options?: VowOptions) =>
      combinators.race(inputs, context, options),
    any: <const T extends readonly unknown[]>(inputs: T, options?: VowOptions) =>
      combinators.any(inputs, context, options),
  };
}
